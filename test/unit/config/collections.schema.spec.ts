import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_API_COLLECTION_PATH,
  loadCollections,
  parseCollections,
} from '../../../src/config/collections.schema';

describe('collections.schema', () => {
  describe('parseCollections', () => {
    it('should treat a bare string entry as a destination path', () => {
      const collections = parseCollections({ collections: { fav1: 'downloads/{YYYY}' } });

      expect(collections[0]).toEqual({ id: 'fav1', path: 'downloads/{YYYY}', postprocess: [] });
    });

    it('should add the API collection when the document omits it', () => {
      const collections = parseCollections({ collections: { fav1: 'downloads' } });

      expect(collections).toContainEqual({
        id: '-1',
        path: DEFAULT_API_COLLECTION_PATH,
        postprocess: [],
      });
    });

    it('should keep an explicitly configured API collection', () => {
      const collections = parseCollections({ collections: { '-1': 'inbox/' } });

      expect(collections).toEqual([{ id: '-1', path: 'inbox/', postprocess: [] }]);
    });

    it('should read object entries with postprocess actions', () => {
      const collections = parseCollections({
        collections: {
          fav1: {
            path: 'downloads',
            name: '{title}',
            postprocess: [{ action: 'move', targetCollectionId: 42 }, { action: 'remove' }],
          },
        },
      });

      expect(collections[0]).toEqual({
        id: 'fav1',
        path: 'downloads',
        name: '{title}',
        postprocess: [{ action: 'move', targetCollectionId: '42' }, { action: 'remove' }],
      });
    });

    it('should reject unknown postprocess actions', () => {
      expect(() =>
        parseCollections({ collections: { fav1: { path: 'x', postprocess: [{ action: 'archive' }] } } }),
      ).toThrow('Collections file validation failed');
    });

    it('should reject empty paths', () => {
      expect(() => parseCollections({ collections: { fav1: '' } })).toThrow(
        'Collections file validation failed',
      );
    });
  });

  describe('loadCollections', () => {
    it('should fall back to the API collection alone when the file is missing', () => {
      const collections = loadCollections(join(tmpdir(), 'favsync-missing', 'collections.json'));

      expect(collections).toEqual([{ id: '-1', path: DEFAULT_API_COLLECTION_PATH, postprocess: [] }]);
    });

    it('should parse the file from disk', () => {
      const dir = mkdtempSync(join(tmpdir(), 'favsync-config-'));
      const file = join(dir, 'collections.json');
      writeFileSync(file, JSON.stringify({ collections: { fav9: 'media' } }));

      expect(loadCollections(file).map((collection) => collection.id)).toEqual(['fav9', '-1']);
    });
  });
});
