import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import {
  BilibiliCatalogAdapter,
  CatalogApiError,
} from '../../../src/infrastructure/adapters/catalog/bilibili-catalog.adapter';
import { HttpClientService } from '../../../src/shared/http/http-client.service';
import { createSilentLogger, createTestConfig, createTestConfigService } from '../helpers/mock-factories';

describe('BilibiliCatalogAdapter', () => {
  const origin = 'https://api.catalog.test';
  let agent: MockAgent;
  let adapter: BilibiliCatalogAdapter;

  const collect = async (iterable: AsyncIterable<string>) => {
    const items: string[] = [];
    for await (const item of iterable) items.push(item);
    return items;
  };

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    const config = createTestConfig({
      env: { BILI_API_BASE_URL: `${origin}/`, BILI_DEDEUSERID: '777' },
    });
    adapter = new BilibiliCatalogAdapter(
      new HttpClientService(createSilentLogger(), agent),
      createTestConfigService(config),
    );
  });

  afterEach(async () => {
    await agent.close();
  });

  describe('listItemIds', () => {
    it('should yield only video resources', async () => {
      agent
        .get(origin)
        .intercept({ path: '/x/v3/fav/resource/ids', query: { media_id: 'fav1', platform: 'web' } })
        .reply(200, {
          code: 0,
          data: [
            { id: 1, type: 2, bvid: 'BV1' },
            { id: 2, type: 12, bvid: 'AU2' },
            { id: 3, type: 2, bv_id: 'BV3' },
          ],
        });

      await expect(collect(adapter.listItemIds('fav1'))).resolves.toEqual(['BV1', 'BV3']);
    });

    it('should raise on a non-zero API code', async () => {
      agent
        .get(origin)
        .intercept({ path: '/x/v3/fav/resource/ids', query: { media_id: 'fav1', platform: 'web' } })
        .reply(200, { code: -101, message: 'not logged in' });

      await expect(collect(adapter.listItemIds('fav1'))).rejects.toThrow(
        'Catalog API fav/resource/ids returned code -101: not logged in',
      );
    });
  });

  describe('getItemInfo', () => {
    it('should map the view payload', async () => {
      agent
        .get(origin)
        .intercept({ path: '/x/web-interface/view', query: { bvid: 'BV1' } })
        .reply(200, { code: 0, data: { aid: 1001, title: 'A video', videos: 3 } });

      await expect(adapter.getItemInfo('BV1')).resolves.toEqual({
        aid: 1001,
        title: 'A video',
        parts: 3,
      });
    });

    it('should return null for items the catalog no longer serves', async () => {
      agent
        .get(origin)
        .intercept({ path: '/x/web-interface/view', query: { bvid: 'BV404' } })
        .reply(200, { code: -404, message: 'not found' });

      await expect(adapter.getItemInfo('BV404')).resolves.toBeNull();
    });
  });

  describe('write actions', () => {
    it('should move an item with the csrf token and account id', async () => {
      let form: URLSearchParams | undefined;
      agent
        .get(origin)
        .intercept({
          path: '/x/v3/fav/resource/move',
          method: 'POST',
          body: (body) => {
            form = new URLSearchParams(body);
            return true;
          },
        })
        .reply(200, { code: 0 });

      await adapter.moveItem(1001, 'fav1', 'fav2');

      expect(form?.get('resources')).toBe('1001:2');
      expect(form?.get('src_media_id')).toBe('fav1');
      expect(form?.get('tar_media_id')).toBe('fav2');
      expect(form?.get('csrf')).toBe('test-csrf');
      expect(form?.get('mid')).toBe('777');
    });

    it('should remove an item from its collection', async () => {
      let form: URLSearchParams | undefined;
      agent
        .get(origin)
        .intercept({
          path: '/x/v3/fav/resource/batch-del',
          method: 'POST',
          body: (body) => {
            form = new URLSearchParams(body);
            return true;
          },
        })
        .reply(200, { code: 0 });

      await adapter.removeItem(1001, 'fav1');

      expect(form?.get('media_id')).toBe('fav1');
      expect(form?.get('resources')).toBe('1001:2');
    });

    it('should raise on an HTTP error status', async () => {
      agent
        .get(origin)
        .intercept({ path: '/x/v3/fav/resource/batch-del', method: 'POST' })
        .reply(403, 'forbidden');

      const result = adapter.removeItem(1001, 'fav1');

      await expect(result).rejects.toBeInstanceOf(CatalogApiError);
      await expect(result).rejects.toThrow('Catalog API fav/resource/batch-del returned code 403: HTTP error');
    });
  });
});
