/**
 * Collection id under which API submissions are filed. Never scanned.
 */
export const API_COLLECTION_ID = '-1';

/**
 * Negative numeric ids are local-only collections (the API one among them);
 * the catalog has nothing to list for them.
 */
export function isCatalogCollection(collectionId: string): boolean {
  return !/^-\d+$/.test(collectionId.trim());
}

/**
 * Natural key of a media-download job: the catalog item and the collection it
 * was discovered in (or the API sentinel collection).
 */
export interface NaturalKey {
  readonly itemId: string;
  readonly collectionId: string;
}

/**
 * Canonical serialization of a natural key. Object keys are sorted so equal
 * keys always produce the same string, whatever order they were built in.
 */
export class TaskKeyVO {
  private constructor(private readonly _value: string) {}

  static fromNaturalKey(key: NaturalKey): TaskKeyVO {
    if (!key.itemId.trim()) {
      throw new Error('Natural key itemId cannot be empty');
    }
    if (!key.collectionId.trim()) {
      throw new Error('Natural key collectionId cannot be empty');
    }
    return new TaskKeyVO(canonicalize({ itemId: key.itemId, collectionId: key.collectionId }));
  }

  get value(): string {
    return this._value;
  }

  equals(other: TaskKeyVO): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}

function canonicalize(fields: Record<string, string>): string {
  const sorted: Record<string, string> = {};
  for (const name of Object.keys(fields).sort()) {
    sorted[name] = fields[name];
  }
  return JSON.stringify(sorted);
}
