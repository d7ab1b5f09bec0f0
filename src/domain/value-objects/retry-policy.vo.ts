/**
 * Bounds the automatic FAILED -> PENDING retry.
 */
export interface RetryPolicy {
  /** 0 disables the cap */
  readonly maxAttempts: number;
  readonly backoffBaseMs: number;
  readonly backoffMaxMs: number;
}

export function computeBackoffMs(policy: RetryPolicy, attempts: number): number {
  const raw = policy.backoffBaseMs * Math.pow(2, Math.max(0, attempts - 1));
  return Math.min(raw, policy.backoffMaxMs);
}

export function hasAttemptsLeft(policy: RetryPolicy, attempts: number): boolean {
  return policy.maxAttempts === 0 || attempts < policy.maxAttempts;
}
