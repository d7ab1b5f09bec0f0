import { BeforeApplicationShutdown, Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecuteJobUseCase } from '../../application/use-cases/execute-job.use-case';
import { JobRepositoryPort } from '../../application/ports/output/job-repository.port';
import { JobPoolPort } from '../../application/ports/output/job-pool.port';
import { JOB_POOL_PORT, JOB_REPOSITORY_PORT } from '../../application/ports/output/injection-tokens';
import { AppConfig } from '../../config/configuration';
import { JobEntity } from '../../domain/entities/job.entity';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { PollingLoopBase } from './polling-loop.base';

/**
 * Consumer loop: claims PENDING jobs with a compare-and-set write and hands
 * them to the executor without waiting for them. Only as many jobs as the pool
 * has free permits are claimed per cycle.
 */
@Injectable()
export class ConsumerService extends PollingLoopBase implements BeforeApplicationShutdown {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    @Inject(JOB_REPOSITORY_PORT) private readonly jobRepository: JobRepositoryPort,
    @Inject(JOB_POOL_PORT) private readonly jobPool: JobPoolPort,
    private readonly executeJob: ExecuteJobUseCase,
    configService: ConfigService<AppConfig, true>,
    logger: PinoLoggerService,
  ) {
    super(logger, {
      name: 'consumer',
      intervalMs: configService.get('sync', { infer: true }).consumerPollIntervalMs,
      errorBackoffMs: configService.get('sync', { infer: true }).consumerErrorBackoffMs,
    });
    this.logger.setContext(ConsumerService.name);
  }

  /**
   * Executions that started before shutdown still write their outcome.
   */
  async beforeApplicationShutdown(): Promise<void> {
    await this.drain();
  }

  /**
   * Resolves once every dispatched execution has settled
   */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  protected async runCycle(): Promise<void> {
    const stats = this.jobPool.getStats();
    const freePermits = stats.maxConcurrent - stats.activeJobs - stats.queuedJobs;
    if (freePermits <= 0) {
      return;
    }

    const pending = await this.jobRepository.listPending(freePermits);
    for (const job of pending) {
      const claimed = await this.jobRepository.transition(job.taskKey, JobStatus.PENDING, {
        status: JobStatus.EXECUTING,
      });
      if (!claimed) {
        this.logger.debug({ taskKey: job.taskKey }, 'Claim lost, job taken elsewhere');
        continue;
      }

      this.dispatch(claimed);
    }
  }

  private dispatch(job: JobEntity): void {
    const jobLogger = this.logger.withJobId(job.id);
    jobLogger.info({ label: JobEntity.label(job), attempt: job.attempts }, 'Job claimed');

    const execution: Promise<void> = this.executeJob
      .execute(job)
      .then(
        (result) => jobLogger.debug({ outcome: result.outcome }, 'Job execution finished'),
        (error: unknown) =>
          jobLogger.error(
            { error: error instanceof Error ? error.message : String(error) },
            'Job execution crashed',
          ),
      )
      .finally(() => {
        this.inFlight.delete(execution);
      });
    this.inFlight.add(execution);
  }
}
