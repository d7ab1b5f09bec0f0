/**
 * Use Cases Barrel Export
 */
export { SubmitJobUseCase } from './submit-job.use-case';
export { AdmitDiscoveredItemUseCase } from './admit-discovered-item.use-case';
export { ExecuteJobUseCase } from './execute-job.use-case';
export { OverrideJobStatusUseCase } from './override-job-status.use-case';
export { QueryJobsUseCase } from './query-jobs.use-case';
export { ReconcileJobsUseCase } from './reconcile-jobs.use-case';
