import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import {
  JobPoolPort,
  JobPoolStats,
  PoolTaskOptions,
} from '../application/ports/output/job-pool.port';
import { ExecutionCancelledError, JobTimeoutError } from '../domain/errors/job.errors';

/**
 * Task waiting for a permit. `start` runs it once dispatched.
 */
interface QueuedTask {
  options: PoolTaskOptions;
  start: () => void;
  reject: (error: Error) => void;
  queuedAt: Date;
}

/**
 * Task holding a permit. `cancel` settles it immediately and aborts its signal;
 * the permit itself is returned once the work has wound down.
 */
interface RunningTask {
  options: PoolTaskOptions;
  cancel: (error: Error) => void;
  startedAt: Date;
}

/**
 * Job Pool Service
 *
 * Bounded execution stage for sync jobs: a counting semaphore with
 * `maxConcurrentTasks` permits and a FIFO queue of waiters.
 *
 * ## Guarantees:
 * - At most `maxConcurrent` units of work are alive at once; extra submissions
 *   wait in submission order.
 * - Every task is bounded by its own timeout. When it elapses the task's
 *   AbortSignal fires and the caller gets a JobTimeoutError right away.
 * - The permit stays taken until the aborted work settles, or until
 *   `abortGraceMs` has passed, so a downloader still being killed is counted.
 * - The permit is released on success, failure, timeout and cancellation.
 *
 * ## Shutdown:
 * Queued tasks are rejected with ExecutionCancelledError. Running tasks get
 * `shutdownGraceMs` to finish before they are cancelled the same way.
 */
@Injectable()
export class JobPoolService implements JobPoolPort, OnModuleDestroy {
  private taskQueue: QueuedTask[] = [];

  private runningTasks: Map<number, RunningTask> = new Map();

  private nextRunId = 0;

  private isShuttingDown = false;

  private idleWaiters: Array<() => void> = [];

  private readonly maxConcurrent: number;

  private readonly abortGraceMs: number;

  private readonly shutdownGraceMs = 10000;

  private completedJobsCount = 0;

  private failedJobsCount = 0;

  private timedOutJobsCount = 0;

  private totalProcessingTimeMs = 0;

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    const sync = this.configService.get('sync', { infer: true });
    this.maxConcurrent = sync.maxConcurrentTasks;
    this.abortGraceMs = sync.abortGraceMs;
    this.logger.setContext(JobPoolService.name);
  }

  async onModuleDestroy(): Promise<void> {
    await this.shutdown();
  }

  run<T>(options: PoolTaskOptions, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
    if (this.isShuttingDown) {
      return Promise.reject(new ExecutionCancelledError(options.label));
    }

    return new Promise<T>((resolve, reject) => {
      const queuedTask: QueuedTask = {
        options,
        start: () => {
          this.execute(options, work).then(resolve, reject);
        },
        reject,
        queuedAt: new Date(),
      };

      if (this.runningTasks.size < this.maxConcurrent) {
        queuedTask.start();
      } else {
        this.taskQueue.push(queuedTask);
        this.logger.debug(
          { key: options.key, queueLength: this.taskQueue.length },
          'Job queued, all permits in use',
        );
      }
    });
  }

  private async execute<T>(
    options: PoolTaskOptions,
    work: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const runId = this.nextRunId++;
    const controller = new AbortController();
    const startedAt = new Date();
    let timer: NodeJS.Timeout | undefined;
    let workSettled = false;

    const guard = new Promise<never>((_, rejectGuard) => {
      const cancel = (error: Error) => {
        controller.abort(error);
        rejectGuard(error);
      };
      this.runningTasks.set(runId, { options, cancel, startedAt });
      timer = setTimeout(
        () => cancel(new JobTimeoutError(options.label, options.timeoutMs / 1000)),
        options.timeoutMs,
      );
    });

    const outcome = new Promise<T>((resolve, reject) => {
      work(controller.signal).then(resolve, reject);
    });
    const settled = outcome.then(
      () => {
        workSettled = true;
      },
      () => {
        workSettled = true;
      },
    );

    try {
      const result = await Promise.race([outcome, guard]);
      this.completedJobsCount++;
      return result;
    } catch (error) {
      if (error instanceof JobTimeoutError) {
        this.timedOutJobsCount++;
        this.logger.warn({ key: options.key, timeoutMs: options.timeoutMs }, 'Job timed out');
      } else {
        this.failedJobsCount++;
      }
      throw error;
    } finally {
      clearTimeout(timer);
      this.totalProcessingTimeMs += Date.now() - startedAt.getTime();
      if (workSettled) {
        this.release(runId);
      } else {
        this.releaseWhenSettled(runId, options, settled);
      }
    }
  }

  /**
   * Holds the permit of aborted work until it settles or the grace runs out
   */
  private releaseWhenSettled(runId: number, options: PoolTaskOptions, settled: Promise<void>): void {
    this.logger.debug(
      { key: options.key, abortGraceMs: this.abortGraceMs },
      'Aborted work still running, holding its permit',
    );

    let graceTimer: NodeJS.Timeout | undefined;
    const graceElapsed = new Promise<'grace'>((resolve) => {
      graceTimer = setTimeout(() => resolve('grace'), this.abortGraceMs);
    });

    Promise.race([settled.then(() => 'settled' as const), graceElapsed])
      .then((reason) => {
        if (reason === 'grace') {
          this.logger.warn(
            { key: options.key, abortGraceMs: this.abortGraceMs },
            'Aborted work ignored its signal, releasing its permit anyway',
          );
        }
      })
      .catch((error: unknown) => {
        this.logger.error({ key: options.key, error: String(error) }, 'Permit hold failed');
      })
      .finally(() => {
        clearTimeout(graceTimer);
        this.release(runId);
      });
  }

  private release(runId: number): void {
    this.runningTasks.delete(runId);
    this.processNextInQueue();
    this.notifyIfIdle();
  }

  private processNextInQueue(): void {
    if (this.isShuttingDown || this.runningTasks.size >= this.maxConcurrent) return;

    const queuedTask = this.taskQueue.shift();
    if (!queuedTask) return;

    this.logger.debug(
      { key: queuedTask.options.key, waitedMs: Date.now() - queuedTask.queuedAt.getTime() },
      'Dispatching queued job',
    );
    queuedTask.start();
  }

  private notifyIfIdle(): void {
    if (this.runningTasks.size > 0 || this.taskQueue.length > 0) return;

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }

  isTracked(key: string): boolean {
    for (const running of this.runningTasks.values()) {
      if (running.options.key === key) return true;
    }
    return this.taskQueue.some((queued) => queued.options.key === key);
  }

  getStats(): JobPoolStats {
    const finished = this.completedJobsCount + this.failedJobsCount + this.timedOutJobsCount;
    return {
      maxConcurrent: this.maxConcurrent,
      activeJobs: this.runningTasks.size,
      queuedJobs: this.taskQueue.length,
      completedJobs: this.completedJobsCount,
      failedJobs: this.failedJobsCount,
      timedOutJobs: this.timedOutJobsCount,
      averageProcessingTimeMs: finished > 0 ? this.totalProcessingTimeMs / finished : 0,
    };
  }

  isAcceptingWork(): boolean {
    return !this.isShuttingDown;
  }

  waitForIdle(): Promise<void> {
    if (this.runningTasks.size === 0 && this.taskQueue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    this.logger.info(
      { running: this.runningTasks.size, queued: this.taskQueue.length },
      'Shutting down job pool',
    );

    const queued = this.taskQueue;
    this.taskQueue = [];
    for (const task of queued) {
      task.reject(new ExecutionCancelledError(task.options.label));
    }

    if (this.runningTasks.size > 0) {
      let graceTimer: NodeJS.Timeout | undefined;
      const graceElapsed = new Promise<void>((resolve) => {
        graceTimer = setTimeout(resolve, this.shutdownGraceMs);
      });
      await Promise.race([this.waitForIdle(), graceElapsed]);
      clearTimeout(graceTimer);

      for (const running of this.runningTasks.values()) {
        running.cancel(new ExecutionCancelledError(running.options.label));
      }
      await this.waitForIdle();
    }

    this.notifyIfIdle();
    this.logger.info('Job pool shut down');
  }
}
