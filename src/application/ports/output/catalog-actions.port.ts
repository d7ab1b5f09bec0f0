/**
 * Catalog Actions Port (Driven Port)
 * Write side of the external catalog, used by postprocess actions
 */
export interface CatalogActionsPort {
  moveItem(aid: number, fromCollectionId: string, toCollectionId: string): Promise<void>;

  removeItem(aid: number, collectionId: string): Promise<void>;
}
