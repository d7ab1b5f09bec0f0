export class DuplicateTaskKeyError extends Error {
  constructor(public readonly taskKey: string) {
    super(`Job already exists for key ${taskKey}`);
    this.name = 'DuplicateTaskKeyError';
  }
}

export class JobTimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutSeconds: number,
  ) {
    super(`Job ${label} timed out after ${timeoutSeconds}s`);
    this.name = 'JobTimeoutError';
  }
}

export class ItemUnavailableError extends Error {
  constructor(public readonly itemId: string) {
    super(`Item ${itemId} is unavailable in the catalog`);
    this.name = 'ItemUnavailableError';
  }
}

/**
 * Raised for work the job pool dropped or aborted while shutting down.
 */
export class ExecutionCancelledError extends Error {
  constructor(public readonly label: string) {
    super(`Job ${label} was cancelled by shutdown`);
    this.name = 'ExecutionCancelledError';
  }
}

export class JobNotFoundError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} not found`);
    this.name = 'JobNotFoundError';
  }
}

export class InvalidStatusChangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStatusChangeError';
  }
}
