import { NaturalKey } from './task-key.vo';

export enum TaskType {
  MEDIA_DOWNLOAD = 'media_download',
}

/**
 * Download one catalog item into the destination configured for its
 * collection.
 */
export interface MediaDownloadPayload {
  readonly kind: TaskType.MEDIA_DOWNLOAD;
  readonly itemId: string;
  readonly collectionId: string;
  /** 1-based part numbers; all parts when absent */
  readonly selectedParts?: readonly number[];
  /** Overrides the collection's file name template */
  readonly nameTemplate?: string;
}

/**
 * Closed union over job kinds. Add a variant here and the exhaustive switches
 * below stop compiling until they handle it.
 */
export type JobPayload = MediaDownloadPayload;

export function naturalKeyOf(payload: JobPayload): NaturalKey {
  switch (payload.kind) {
    case TaskType.MEDIA_DOWNLOAD:
      return { itemId: payload.itemId, collectionId: payload.collectionId };
    default:
      return assertNever(payload.kind);
  }
}

export function describePayload(payload: JobPayload): string {
  switch (payload.kind) {
    case TaskType.MEDIA_DOWNLOAD:
      return `(${payload.itemId}, ${payload.collectionId})`;
    default:
      return assertNever(payload.kind);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}
