import { Injectable } from '@nestjs/common';
import {
  CatalogItemInfo,
  CatalogSourcePort,
} from '../../src/application/ports/output/catalog-source.port';
import { CatalogActionsPort } from '../../src/application/ports/output/catalog-actions.port';

export type RecordedCatalogAction =
  | { action: 'move'; aid: number; fromCollectionId: string; toCollectionId: string }
  | { action: 'remove'; aid: number; collectionId: string };

/**
 * In-Memory Catalog Adapter
 * Collections and item metadata set up by the test; write calls are recorded
 */
@Injectable()
export class InMemoryCatalogAdapter implements CatalogSourcePort, CatalogActionsPort {
  private collections: Map<string, string[]> = new Map();
  private items: Map<string, CatalogItemInfo> = new Map();
  private failingCollections: Set<string> = new Set();
  private actions: RecordedCatalogAction[] = [];

  async *listItemIds(collectionId: string): AsyncIterable<string> {
    if (this.failingCollections.has(collectionId)) {
      throw new Error(`Listing collection ${collectionId} failed`);
    }
    for (const itemId of this.collections.get(collectionId) ?? []) {
      yield itemId;
    }
  }

  async getItemInfo(itemId: string): Promise<CatalogItemInfo | null> {
    return this.items.get(itemId) ?? null;
  }

  async moveItem(aid: number, fromCollectionId: string, toCollectionId: string): Promise<void> {
    this.actions.push({ action: 'move', aid, fromCollectionId, toCollectionId });
  }

  async removeItem(aid: number, collectionId: string): Promise<void> {
    this.actions.push({ action: 'remove', aid, collectionId });
  }

  // Test helper methods

  setCollection(collectionId: string, itemIds: string[]): void {
    this.collections.set(collectionId, [...itemIds]);
  }

  /**
   * Registers item metadata; aid defaults to a number derived from the order of registration
   */
  setItem(itemId: string, info: Partial<CatalogItemInfo> = {}): void {
    this.items.set(itemId, {
      aid: info.aid ?? 1000 + this.items.size,
      title: info.title ?? `Title of ${itemId}`,
      parts: info.parts ?? 1,
    });
  }

  failCollection(collectionId: string): void {
    this.failingCollections.add(collectionId);
  }

  getRecordedActions(): RecordedCatalogAction[] {
    return [...this.actions];
  }
}
