/**
 * Job Pool Statistics
 */
export interface JobPoolStats {
  maxConcurrent: number;
  activeJobs: number;
  queuedJobs: number;
  completedJobs: number;
  failedJobs: number;
  timedOutJobs: number;
  averageProcessingTimeMs: number;
}

export interface PoolTaskOptions {
  /** Key reported by isTracked while the task holds a permit or waits */
  key: string;
  label: string;
  timeoutMs: number;
}

/**
 * Job Pool Port (Driven Port)
 * Counting semaphore with FIFO waiters and a per-task timeout
 */
export interface JobPoolPort {
  /**
   * Run `work` once a permit is free. The signal aborts on timeout or
   * shutdown; the permit is released on every exit path, once the work has
   * settled or its abort grace has passed. Rejects with JobTimeoutError as
   * soon as the timeout elapses.
   */
  run<T>(options: PoolTaskOptions, work: (signal: AbortSignal) => Promise<T>): Promise<T>;

  isTracked(key: string): boolean;

  getStats(): JobPoolStats;

  /**
   * Wait until nothing is running or queued
   */
  waitForIdle(): Promise<void>;

  shutdown(): Promise<void>;
}
