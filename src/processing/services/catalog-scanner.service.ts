import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CatalogSourcePort } from '../../application/ports/output/catalog-source.port';
import { CATALOG_SOURCE_PORT } from '../../application/ports/output/injection-tokens';
import { AppConfig } from '../../config/configuration';
import { NaturalKey, isCatalogCollection } from '../../domain/value-objects/task-key.vo';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

/**
 * Walks every configured catalog collection (negative ids are local) and
 * yields the (item, collection) pairs currently listed. A collection whose listing fails
 * is logged and skipped for this scan.
 */
@Injectable()
export class CatalogScannerService {
  private readonly collectionIds: string[];

  constructor(
    @Inject(CATALOG_SOURCE_PORT) private readonly catalogSource: CatalogSourcePort,
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    this.collectionIds = this.configService
      .get('collections', { infer: true })
      .map((collection) => collection.id)
      .filter(isCatalogCollection);
    this.logger.setContext(CatalogScannerService.name);
  }

  async *scan(): AsyncGenerator<NaturalKey> {
    for (const collectionId of this.collectionIds) {
      let listed = 0;
      try {
        for await (const itemId of this.catalogSource.listItemIds(collectionId)) {
          listed++;
          yield { itemId, collectionId };
        }
        this.logger.debug({ collectionId, listed }, 'Collection scanned');
      } catch (error) {
        this.logger.warn(
          { collectionId, listed, error: error instanceof Error ? error.message : String(error) },
          'Collection listing failed, skipping it this cycle',
        );
      }
    }
  }
}
