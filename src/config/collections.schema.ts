import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { API_COLLECTION_ID } from '../domain/value-objects/task-key.vo';
import { PostprocessAction } from '../domain/value-objects/postprocess-action.vo';

export const DEFAULT_API_COLLECTION_PATH = 'sync/';

const postprocessSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('move'), targetCollectionId: z.coerce.string().min(1) }),
  z.object({ action: z.literal('remove') }),
]);

const collectionEntrySchema = z.union([
  z.string().min(1),
  z.object({
    path: z.string().min(1),
    name: z.string().min(1).optional(),
    postprocess: z.array(postprocessSchema).default([]),
  }),
]);

export const collectionsFileSchema = z.object({
  collections: z.record(collectionEntrySchema).default({}),
});

export type CollectionsFile = z.infer<typeof collectionsFileSchema>;

/**
 * A collection to sync and where its items land.
 */
export interface CollectionConfig {
  id: string;
  /** Destination directory; may contain {YYYY} {YY} {MM} {DD} {HH} {mm} {SS} */
  path: string;
  /** File name template passed to the downloader */
  name?: string;
  postprocess: PostprocessAction[];
}

/**
 * Flattens the collections document. A bare string entry is a path. The API
 * collection always exists, defaulting to `sync/`.
 */
export function resolveCollections(document: CollectionsFile): CollectionConfig[] {
  const resolved = Object.entries(document.collections).map(
    ([id, entry]): CollectionConfig =>
      typeof entry === 'string'
        ? { id, path: entry, postprocess: [] }
        : { id, path: entry.path, name: entry.name, postprocess: entry.postprocess },
  );

  if (!resolved.some((collection) => collection.id === API_COLLECTION_ID)) {
    resolved.push({ id: API_COLLECTION_ID, path: DEFAULT_API_COLLECTION_PATH, postprocess: [] });
  }

  return resolved;
}

export function parseCollections(raw: unknown): CollectionConfig[] {
  const result = collectionsFileSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Collections file validation failed:\n${errors}`);
  }

  return resolveCollections(result.data);
}

/**
 * A missing file means "API submissions only".
 */
export function loadCollections(filePath: string): CollectionConfig[] {
  if (!existsSync(filePath)) {
    return resolveCollections({ collections: {} });
  }
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
  return parseCollections(raw);
}
