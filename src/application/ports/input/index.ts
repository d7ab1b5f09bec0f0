/**
 * Input Ports (Driving Ports / Use Case Interfaces) Barrel Export
 * These are the interfaces that define the application's use cases
 */
export {
  type SubmitJobPort,
  type SubmitJobCommand,
  type SubmitJobResult,
} from './submit-job.port';
export {
  type AdmitDiscoveredItemPort,
  type AdmitDiscoveredItemCommand,
  type AdmitDiscoveredItemResult,
  type AdmissionOutcome,
} from './admit-discovered-item.port';
export { type ExecuteJobPort, type ExecuteJobResult } from './execute-job.port';
export {
  type OverrideJobStatusPort,
  type OverrideJobStatusCommand,
} from './override-job-status.port';
export { type QueryJobsPort } from './query-jobs.port';
export { type ReconcileJobsPort, type ReconcileJobsResult } from './reconcile-jobs.port';
