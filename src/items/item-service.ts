/**
 * Item Service
 * Turns each API operation into a single store query and shapes the result
 */

import { RecordValidationError, toErrorDetails } from '../errors.js';
import type { ItemStore } from '../storage/item-store.js';
import {
  storedItemSchema,
  type Item,
  type ItemFilter,
  type ItemPatch,
  type ItemQueryEcho,
  type StoreRow,
  type StoredItem,
  type UpdateOutcome,
} from '../types/index.js';

export interface ItemQueryParams {
  name?: string;
  price?: number;
  count?: number;
  category?: Item['category'];
}

export interface QueryResult {
  query: ItemQueryEcho;
  selection: StoredItem[];
}

/**
 * Validate records read back from the store. One bad record fails the whole batch.
 */
export function parseStoredItems(rows: StoreRow[]): StoredItem[] {
  return rows.map((row, index) => {
    const parsed = storedItemSchema.safeParse(row);
    if (!parsed.success) {
      throw new RecordValidationError(toErrorDetails(parsed.error, ['record', index]));
    }
    return parsed.data;
  });
}

export class ItemService {
  constructor(private store: ItemStore) {}

  /**
   * All items, in store order
   */
  async listItems(): Promise<StoredItem[]> {
    const rows = await this.store.select();
    return parseStoredItems(rows);
  }

  /**
   * Items equal on every supplied field; omitted fields do not filter
   */
  async queryItems(params: ItemQueryParams): Promise<QueryResult> {
    const filter: ItemFilter = {};
    if (params.name !== undefined) filter.name = params.name;
    if (params.price !== undefined) filter.price = params.price;
    if (params.count !== undefined) filter.count = params.count;
    if (params.category !== undefined) filter.category = params.category;

    const rows = await this.store.select(filter);

    return {
      query: {
        name: params.name ?? null,
        price: params.price ?? null,
        count: params.count ?? null,
        category: params.category ?? null,
      },
      selection: parseStoredItems(rows),
    };
  }

  /**
   * Insert a validated item. Returns the input, not the stored record.
   */
  async addItem(item: Item): Promise<Item> {
    await this.store.insert(item);
    return item;
  }

  /**
   * Change only the supplied fields of an existing item
   */
  async updateItem(itemId: number, changes: ItemPatch): Promise<UpdateOutcome> {
    const existing = await this.store.select({ id: itemId });
    if (existing.length === 0) {
      return { status: 404, body: { message: 'Item not found' } };
    }

    const patch: ItemPatch = {};
    if (changes.name !== undefined) patch.name = changes.name;
    if (changes.price !== undefined) patch.price = changes.price;
    if (changes.count !== undefined) patch.count = changes.count;
    if (changes.category !== undefined) patch.category = changes.category;

    if (Object.keys(patch).length === 0) {
      return { status: 400, body: { message: 'No fields to update' } };
    }

    const updated = await this.store.update(patch, { id: itemId });
    if (updated.length === 0) {
      return { status: 400, body: { message: 'Item was not updated', data: updated } };
    }
    return { status: 200, body: { message: 'Item updated successfully', data: updated } };
  }

  /**
   * Remove an item. Resolves to the first deleted record, or an empty object when none matched.
   */
  async deleteItem(itemId: number): Promise<StoreRow> {
    const deleted = await this.store.delete({ id: itemId });
    return deleted[0] ?? {};
  }
}
