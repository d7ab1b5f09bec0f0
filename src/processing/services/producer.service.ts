import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AdmitDiscoveredItemUseCase } from '../../application/use-cases/admit-discovered-item.use-case';
import { AdmissionOutcome } from '../../application/ports/input/admit-discovered-item.port';
import { AppConfig } from '../../config/configuration';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { CatalogScannerService } from './catalog-scanner.service';
import { PollingLoopBase } from './polling-loop.base';

type CycleSummary = Record<AdmissionOutcome | 'errors', number>;

/**
 * Producer loop: turns what the catalog lists into PENDING jobs and reopens
 * FAILED ones that are due for a retry.
 */
@Injectable()
export class ProducerService extends PollingLoopBase {
  constructor(
    private readonly scanner: CatalogScannerService,
    private readonly admitItem: AdmitDiscoveredItemUseCase,
    configService: ConfigService<AppConfig, true>,
    logger: PinoLoggerService,
  ) {
    super(logger, {
      name: 'producer',
      intervalMs: configService.get('sync', { infer: true }).intervalSeconds * 1000,
    });
    this.logger.setContext(ProducerService.name);
  }

  protected async runCycle(): Promise<void> {
    const summary: CycleSummary = {
      created: 0,
      retried: 0,
      already_exists: 0,
      skipped: 0,
      retry_deferred: 0,
      retries_exhausted: 0,
      errors: 0,
    };

    for await (const pair of this.scanner.scan()) {
      try {
        const result = await this.admitItem.execute(pair);
        summary[result.outcome]++;
      } catch (error) {
        summary.errors++;
        this.logger.error(
          {
            itemId: pair.itemId,
            collectionId: pair.collectionId,
            error: error instanceof Error ? error.message : String(error),
          },
          'Failed to admit catalog item',
        );
      }
    }

    this.logger.info({ ...summary }, 'Producer cycle finished');
  }
}
