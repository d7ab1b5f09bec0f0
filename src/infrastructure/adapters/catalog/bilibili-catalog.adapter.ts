import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { CatalogActionsPort } from '../../../application/ports/output/catalog-actions.port';
import {
  CatalogItemInfo,
  CatalogSourcePort,
} from '../../../application/ports/output/catalog-source.port';
import { AppConfig, CatalogCredentials } from '../../../config/configuration';
import { HttpClientService, HttpResponse } from '../../../shared/http/http-client.service';

/** Resource type of a video in favorite-list write endpoints */
const VIDEO_RESOURCE_TYPE = 2;

const envelopeSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  data: z.unknown().optional(),
});

const favoriteIdsSchema = z.array(
  z.object({
    id: z.number(),
    type: z.number(),
    bvid: z.string().optional(),
    bv_id: z.string().optional(),
  }),
);

const videoViewSchema = z.object({
  aid: z.number(),
  title: z.string(),
  videos: z.number().int().min(1).default(1),
});

export class CatalogApiError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly code: number,
    message?: string,
  ) {
    super(`Catalog API ${endpoint} returned code ${code}${message ? `: ${message}` : ''}`);
    this.name = 'CatalogApiError';
  }
}

/**
 * Bilibili Catalog Adapter
 * Implements CatalogSourcePort and CatalogActionsPort over the web API
 * with cookie credentials
 */
@Injectable()
export class BilibiliCatalogAdapter implements CatalogSourcePort, CatalogActionsPort {
  private readonly logger = new Logger(BilibiliCatalogAdapter.name);
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly credentials: CatalogCredentials;

  constructor(
    private readonly http: HttpClientService,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {
    const catalog = this.configService.get('catalog', { infer: true });
    this.apiBaseUrl = catalog.apiBaseUrl.replace(/\/+$/, '');
    this.credentials = catalog.credentials;
    this.timeoutMs = this.configService.get('sync', { infer: true }).requestTimeoutSeconds * 1000;
  }

  /**
   * Only video resources are listed; other favorite types have no bvid.
   */
  async *listItemIds(collectionId: string): AsyncIterable<string> {
    const url = `${this.apiBaseUrl}/x/v3/fav/resource/ids?media_id=${encodeURIComponent(collectionId)}&platform=web`;
    const data = this.unwrap('fav/resource/ids', await this.http.get(url, this.requestOptions()));
    const resources = favoriteIdsSchema.parse(data ?? []);

    for (const resource of resources) {
      const bvid = resource.bvid || resource.bv_id;
      if (resource.type === VIDEO_RESOURCE_TYPE && bvid) {
        yield bvid;
      }
    }
  }

  async getItemInfo(itemId: string): Promise<CatalogItemInfo | null> {
    const url = `${this.apiBaseUrl}/x/web-interface/view?bvid=${encodeURIComponent(itemId)}`;
    const response = await this.http.get(url, this.requestOptions());
    const envelope = envelopeSchema.parse(response.body);

    if (envelope.code !== 0) {
      this.logger.warn(`Item ${itemId} unavailable (code ${envelope.code})`);
      return null;
    }

    const view = videoViewSchema.parse(envelope.data);
    return { aid: view.aid, title: view.title, parts: view.videos };
  }

  async moveItem(aid: number, fromCollectionId: string, toCollectionId: string): Promise<void> {
    const form: Record<string, string> = {
      src_media_id: fromCollectionId,
      tar_media_id: toCollectionId,
      resources: `${aid}:${VIDEO_RESOURCE_TYPE}`,
      platform: 'web',
      csrf: this.credentials.biliJct,
    };
    if (this.credentials.dedeuserid) {
      form.mid = this.credentials.dedeuserid;
    }

    const response = await this.http.postForm(
      `${this.apiBaseUrl}/x/v3/fav/resource/move`,
      form,
      this.requestOptions(),
    );
    this.unwrap('fav/resource/move', response);
    this.logger.log(`Moved ${aid} from ${fromCollectionId} to ${toCollectionId}`);
  }

  async removeItem(aid: number, collectionId: string): Promise<void> {
    const response = await this.http.postForm(
      `${this.apiBaseUrl}/x/v3/fav/resource/batch-del`,
      {
        media_id: collectionId,
        resources: `${aid}:${VIDEO_RESOURCE_TYPE}`,
        platform: 'web',
        csrf: this.credentials.biliJct,
      },
      this.requestOptions(),
    );
    this.unwrap('fav/resource/batch-del', response);
    this.logger.log(`Removed ${aid} from ${collectionId}`);
  }

  private unwrap(endpoint: string, response: HttpResponse): unknown {
    if (response.statusCode >= 400) {
      throw new CatalogApiError(endpoint, response.statusCode, 'HTTP error');
    }
    const envelope = envelopeSchema.parse(response.body);
    if (envelope.code !== 0) {
      throw new CatalogApiError(endpoint, envelope.code, envelope.message);
    }
    return envelope.data;
  }

  private requestOptions() {
    return {
      timeout: this.timeoutMs,
      headers: {
        Cookie: this.cookieHeader(),
        Referer: 'https://www.bilibili.com',
      },
    };
  }

  private cookieHeader(): string {
    const cookies: Array<[string, string | undefined]> = [
      ['SESSDATA', this.credentials.sessdata],
      ['bili_jct', this.credentials.biliJct],
      ['buvid3', this.credentials.buvid3],
      ['DedeUserID', this.credentials.dedeuserid],
      ['ac_time_value', this.credentials.acTimeValue],
    ];
    return cookies
      .filter((cookie): cookie is [string, string] => Boolean(cookie[1]))
      .map(([name, value]) => `${name}=${value}`)
      .join('; ');
  }
}
