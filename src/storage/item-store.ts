/**
 * Item Store
 * The narrow record-store contract the HTTP layer depends on
 */

import type { Item, ItemFilter, ItemPatch, StoreRow } from '../types/index.js';

/**
 * Table-scoped operations against the remote items table.
 * Every call resolves to the records it selected or affected, in store order,
 * and rejects with a StoreError when the store fails.
 */
export interface ItemStore {
  /** Select all records matching every filter entry (no entries: all records) */
  select(filter?: ItemFilter): Promise<StoreRow[]>;
  insert(item: Item): Promise<StoreRow[]>;
  update(patch: ItemPatch, filter: ItemFilter): Promise<StoreRow[]>;
  delete(filter: ItemFilter): Promise<StoreRow[]>;
}

/**
 * Filter entries that carry a value, in insertion order
 */
export function filterEntries(filter: ItemFilter = {}): Array<[string, string | number]> {
  const entries: Array<[string, string | number]> = [];
  for (const [column, value] of Object.entries(filter)) {
    if (value !== undefined) {
      entries.push([column, value]);
    }
  }
  return entries;
}
