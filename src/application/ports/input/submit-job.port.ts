import { JobEntity } from '../../../domain/entities/job.entity';

/**
 * Submit Job Command
 */
export interface SubmitJobCommand {
  itemId: string;
  /** Defaults to the API collection */
  collectionId?: string;
  selectedParts?: number[];
  nameTemplate?: string;
}

/**
 * Submit Job Result
 */
export interface SubmitJobResult {
  outcome: 'created' | 'updated';
  job: JobEntity;
  message: string;
}

/**
 * Submit Job Port (Driving Port / Use Case Interface)
 * Admits a job requested through the API, or refreshes the existing one
 */
export interface SubmitJobPort {
  execute(command: SubmitJobCommand): Promise<SubmitJobResult>;
}
