export interface CatalogItemInfo {
  /** Numeric archive id required by the catalog's write endpoints */
  aid: number;
  title: string;
  parts: number;
}

/**
 * Catalog Source Port (Driven Port)
 * Read side of the external catalog
 */
export interface CatalogSourcePort {
  /**
   * Item ids currently in a collection. Each call is a fresh, finite listing;
   * it may throw independently of other collections.
   */
  listItemIds(collectionId: string): AsyncIterable<string>;

  /**
   * Item metadata, or null when the item no longer exists.
   */
  getItemInfo(itemId: string): Promise<CatalogItemInfo | null>;
}
