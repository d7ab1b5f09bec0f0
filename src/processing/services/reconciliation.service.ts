import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ReconcileJobsUseCase } from '../../application/use-cases/reconcile-jobs.use-case';
import { AppConfig } from '../../config/configuration';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { PollingLoopBase } from './polling-loop.base';

/**
 * Reconciliation loop. Sweeps are best effort; a failed sweep is only logged.
 */
@Injectable()
export class ReconciliationService extends PollingLoopBase {
  constructor(
    private readonly reconcileJobs: ReconcileJobsUseCase,
    configService: ConfigService<AppConfig, true>,
    logger: PinoLoggerService,
  ) {
    super(logger, {
      name: 'reconciliation',
      intervalMs: configService.get('reconcile', { infer: true }).intervalSeconds * 1000,
    });
    this.logger.setContext(ReconciliationService.name);
  }

  protected async runCycle(): Promise<void> {
    await this.reconcileJobs.execute();
  }
}
