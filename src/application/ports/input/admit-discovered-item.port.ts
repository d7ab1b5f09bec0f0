import { JobEntity } from '../../../domain/entities/job.entity';

export interface AdmitDiscoveredItemCommand {
  itemId: string;
  collectionId: string;
}

export type AdmissionOutcome =
  | 'created'
  | 'retried'
  | 'already_exists'
  | 'skipped'
  | 'retry_deferred'
  | 'retries_exhausted';

export interface AdmitDiscoveredItemResult {
  outcome: AdmissionOutcome;
  job: JobEntity | null;
}

/**
 * Admit Discovered Item Port (Driving Port / Use Case Interface)
 * Producer-side admission of one (item, collection) pair
 */
export interface AdmitDiscoveredItemPort {
  execute(command: AdmitDiscoveredItemCommand): Promise<AdmitDiscoveredItemResult>;
}
