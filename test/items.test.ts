/**
 * Tests for the Item Service
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ItemService, parseStoredItems } from '../src/items/item-service.js';
import { RecordValidationError } from '../src/errors.js';
import { InMemoryItemStore } from './fixtures/memory-store.js';
import { sampleItems } from './fixtures/items.js';

describe('ItemService', () => {
  let store: InMemoryItemStore;
  let service: ItemService;

  beforeEach(() => {
    store = new InMemoryItemStore(sampleItems);
    service = new ItemService(store);
  });

  describe('listItems', () => {
    it('returns every stored item in store order', async () => {
      const items = await service.listItems();

      expect(items).toEqual([
        { id: 1, name: 'Hammer', price: 9.99, count: 20, category: 'tools' },
        { id: 2, name: 'Pliers', price: 5.99, count: 20, category: 'tools' },
        { id: 3, name: 'Nails', price: 1.99, count: 100, category: 'consumables' },
      ]);
    });

    it('drops columns that are not part of an item', async () => {
      store = new InMemoryItemStore();
      store.putRaw({ id: 7, name: 'Saw', price: 14.5, count: 2, category: 'tools', created_at: '2024-01-01' });
      service = new ItemService(store);

      expect(await service.listItems()).toEqual([
        { id: 7, name: 'Saw', price: 14.5, count: 2, category: 'tools' },
      ]);
    });

    it('fails when a stored record has an unknown category', async () => {
      store.putRaw({ id: 10, name: 'Bucket', price: 3, count: 1, category: 'hardware' });

      await expect(service.listItems()).rejects.toBeInstanceOf(RecordValidationError);
    });
  });

  describe('queryItems', () => {
    it('filters by category', async () => {
      const result = await service.queryItems({ category: 'tools' });

      expect(result.selection.map(item => item.name)).toEqual(['Hammer', 'Pliers']);
      expect(result.query).toEqual({ name: null, price: null, count: null, category: 'tools' });
    });

    it('combines filters as a conjunction', async () => {
      const result = await service.queryItems({ count: 20, price: 5.99 });

      expect(result.selection.map(item => item.name)).toEqual(['Pliers']);
    });

    it('returns everything when no filter is given', async () => {
      const result = await service.queryItems({});

      expect(result.selection).toEqual(await service.listItems());
      expect(result.query).toEqual({ name: null, price: null, count: null, category: null });
    });

    it('passes only supplied fields to the store', async () => {
      const select = vi.spyOn(store, 'select');

      await service.queryItems({ name: 'Nails' });

      expect(select).toHaveBeenCalledWith({ name: 'Nails' });
    });

    it('returns an empty selection when nothing matches', async () => {
      const result = await service.queryItems({ name: 'Wrench' });

      expect(result.selection).toEqual([]);
    });
  });

  describe('addItem', () => {
    it('returns the input and stores it with a new id', async () => {
      const saw = { name: 'Saw', price: 14.5, count: 2, category: 'tools' as const };

      const added = await service.addItem(saw);
      const items = await service.listItems();

      expect(added).toEqual(saw);
      expect(items[3]).toEqual({ id: 4, ...saw });
    });
  });

  describe('updateItem', () => {
    it('reports a missing item before looking at the changes', async () => {
      expect(await service.updateItem(99, {})).toEqual({
        status: 404,
        body: { message: 'Item not found' },
      });
      expect(await service.updateItem(99, { name: 'Saw' })).toEqual({
        status: 404,
        body: { message: 'Item not found' },
      });
    });

    it('refuses an empty change set', async () => {
      const update = vi.spyOn(store, 'update');

      expect(await service.updateItem(1, {})).toEqual({
        status: 400,
        body: { message: 'No fields to update' },
      });
      expect(update).not.toHaveBeenCalled();
    });

    it('changes only the supplied fields', async () => {
      const outcome = await service.updateItem(3, { count: 250, category: 'tools' });

      expect(outcome).toEqual({
        status: 200,
        body: {
          message: 'Item updated successfully',
          data: [{ id: 3, name: 'Nails', price: 1.99, count: 250, category: 'tools' }],
        },
      });
    });

    it('reports an update that touched no rows', async () => {
      vi.spyOn(store, 'update').mockResolvedValue([]);

      expect(await service.updateItem(1, { price: 10 })).toEqual({
        status: 400,
        body: { message: 'Item was not updated', data: [] },
      });
    });
  });

  describe('deleteItem', () => {
    it('returns the deleted record', async () => {
      const deleted = await service.deleteItem(2);

      expect(deleted).toEqual({ id: 2, name: 'Pliers', price: 5.99, count: 20, category: 'tools' });
      expect((await service.listItems()).map(item => item.id)).toEqual([1, 3]);
    });

    it('returns an empty object when nothing matched', async () => {
      expect(await service.deleteItem(99)).toEqual({});
    });
  });
});

describe('parseStoredItems', () => {
  it('locates the offending record and field', () => {
    try {
      parseStoredItems([
        { id: 1, name: 'Hammer', price: 9.99, count: 20, category: 'tools' },
        { id: 2, name: 'Pliers', price: 5.99, count: -1, category: 'tools' },
      ]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RecordValidationError);
      if (error instanceof RecordValidationError) {
        expect(error.statusCode).toBe(500);
        expect(error.detail?.map(d => d.loc)).toEqual([['record', 1, 'count']]);
      }
    }
  });

  it('rejects a record without an id', () => {
    expect(() => parseStoredItems([{ name: 'Hammer', price: 9.99, count: 20, category: 'tools' }]))
      .toThrow(RecordValidationError);
  });
});
