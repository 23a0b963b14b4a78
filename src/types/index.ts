/**
 * Core types for the Items API
 * The zod schemas are the source of truth; TypeScript types are inferred from them
 */

import { z } from 'zod';

// ============================================
// Category
// ============================================

/** Wire and storage values are always the lowercase strings */
export const CATEGORIES = ['tools', 'consumables'] as const;

export const categorySchema = z.enum(CATEGORIES);

export type Category = z.infer<typeof categorySchema>;

// ============================================
// Item
// ============================================

export const itemSchema = z.object({
  name: z.string().min(1),
  price: z.number().finite(),
  count: z.number().int().nonnegative(),
  category: categorySchema,
});

/** An item as supplied by a client, before the store assigns an id */
export type Item = z.infer<typeof itemSchema>;

export const storedItemSchema = itemSchema.extend({
  id: z.number().int(),
});

/** An item as read back from the store */
export type StoredItem = z.infer<typeof storedItemSchema>;

// ============================================
// Store rows
// ============================================

export type ItemColumn = keyof StoredItem;

/** Raw record returned by the store, not yet validated */
export type StoreRow = Record<string, unknown>;

/** Conjunction of equality filters; undefined entries impose no filter */
export type ItemFilter = { [K in ItemColumn]?: StoredItem[K] };

/** Fields to change in a partial update */
export type ItemPatch = Partial<Item>;

// ============================================
// Request shapes
// ============================================

/** Echo of the filter parameters received by GET /items/ */
export interface ItemQueryEcho {
  name: string | null;
  price: number | null;
  count: number | null;
  category: Category | null;
}

export interface UpdateOutcome {
  status: 200 | 400 | 404;
  body: { message: string; data?: StoreRow[] };
}
