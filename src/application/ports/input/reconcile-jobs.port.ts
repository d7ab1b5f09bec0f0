export interface ReconcileJobsResult {
  failedStuckJobs: number;
  prunedPendingJobs: number;
  completedByCollection: Record<string, number>;
}

/**
 * Reconcile Jobs Port (Driving Port / Use Case Interface)
 * One best-effort sweep over the job table
 */
export interface ReconcileJobsPort {
  execute(): Promise<ReconcileJobsResult>;
}
