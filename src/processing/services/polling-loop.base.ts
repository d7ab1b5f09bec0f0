import { OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

export interface PollingLoopConfig {
  name: string;
  intervalMs: number;
  /** Pause after a failed cycle; defaults to intervalMs */
  errorBackoffMs?: number;
  enabled?: boolean;
}

/**
 * Long-lived loop: run a cycle, sleep, repeat until stopped. A failing cycle
 * is logged and followed by the error backoff; it never ends the loop.
 */
export abstract class PollingLoopBase implements OnApplicationBootstrap, OnModuleDestroy {
  private isRunning = false;
  private loopPromise: Promise<void> | null = null;
  private wakeUp: (() => void) | null = null;

  protected readonly name: string;
  protected readonly intervalMs: number;
  protected readonly errorBackoffMs: number;
  protected readonly enabled: boolean;

  constructor(
    protected readonly logger: PinoLoggerService,
    config: PollingLoopConfig,
  ) {
    this.name = config.name;
    this.intervalMs = config.intervalMs;
    this.errorBackoffMs = config.errorBackoffMs ?? config.intervalMs;
    this.enabled = config.enabled ?? true;
  }

  onApplicationBootstrap(): void {
    if (this.enabled) {
      this.start();
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  start(): void {
    if (this.isRunning) {
      return;
    }

    this.isRunning = true;
    this.logger.info({ loop: this.name, intervalMs: this.intervalMs }, 'Starting loop');
    this.loopPromise = this.loop();
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.logger.info({ loop: this.name }, 'Stopping loop');
    this.isRunning = false;
    this.wakeUp?.();

    // Wait for the current cycle to complete
    if (this.loopPromise) {
      await this.loopPromise;
      this.loopPromise = null;
    }
  }

  get running(): boolean {
    return this.isRunning;
  }

  /**
   * One cycle with the loop's error handling. Returns false when it failed.
   */
  async runOnce(): Promise<boolean> {
    try {
      await this.runCycle();
      return true;
    } catch (error) {
      this.logger.error(
        {
          loop: this.name,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        },
        'Error in loop cycle',
      );
      return false;
    }
  }

  /**
   * Override this to implement the work of one cycle
   */
  protected abstract runCycle(): Promise<void>;

  private async loop(): Promise<void> {
    while (this.isRunning) {
      const succeeded = await this.runOnce();
      if (!this.isRunning) {
        break;
      }
      await this.delay(succeeded ? this.intervalMs : this.errorBackoffMs);
    }
  }

  /**
   * Sleep that stop() cuts short
   */
  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wakeUp = null;
        resolve();
      }, ms);
      this.wakeUp = () => {
        clearTimeout(timer);
        this.wakeUp = null;
        resolve();
      };
    });
  }
}
