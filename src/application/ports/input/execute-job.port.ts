import { JobEntity } from '../../../domain/entities/job.entity';

export interface ExecuteJobResult {
  /**
   * requeued: the pool shut down before the job finished.
   * superseded: the job left EXECUTING while it ran; its outcome was not written.
   */
  outcome: 'completed' | 'failed' | 'requeued' | 'superseded';
  job: JobEntity | null;
}

/**
 * Execute Job Port (Driving Port / Use Case Interface)
 * Runs one claimed job to a terminal status
 */
export interface ExecuteJobPort {
  execute(job: JobEntity): Promise<ExecuteJobResult>;
}
