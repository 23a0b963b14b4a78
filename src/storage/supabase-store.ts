/**
 * Supabase Item Store
 * Runs each ItemStore operation as a single PostgREST request through supabase-js
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import WebSocket from 'ws';
import { StoreError } from '../errors.js';
import type { Item, ItemFilter, ItemPatch, StoreRow } from '../types/index.js';
import { filterEntries, type ItemStore } from './item-store.js';

// ============================================
// Types
// ============================================

export interface SupabaseStoreConfig {
  url: string;
  key: string;
  /** Remote table name */
  table: string;
  /** Replacement fetch, used by tests to stay in process */
  fetch?: typeof fetch;
}

interface QueryResult {
  data: StoreRow[] | null;
  error: { message: string; code?: string } | null;
}

// ============================================
// Supabase Item Store
// ============================================

export class SupabaseItemStore implements ItemStore {
  private client: SupabaseClient;
  private table: string;

  constructor(config: SupabaseStoreConfig) {
    this.table = config.table;
    this.client = createClient(config.url, config.key, {
      auth: {
        persistSession: false,
        autoRefreshToken: false,
        detectSessionInUrl: false,
      },
      // Node 20 has no global WebSocket for the realtime client
      realtime: { transport: WebSocket },
      global: config.fetch ? { fetch: config.fetch } : undefined,
    });
  }

  async select(filter: ItemFilter = {}): Promise<StoreRow[]> {
    let query = this.client.from(this.table).select('*');
    for (const [column, value] of filterEntries(filter)) {
      query = query.eq(column, value);
    }
    return this.unwrap(await query, 'select');
  }

  async insert(item: Item): Promise<StoreRow[]> {
    const result = await this.client.from(this.table).insert(item).select();
    return this.unwrap(result, 'insert');
  }

  async update(patch: ItemPatch, filter: ItemFilter): Promise<StoreRow[]> {
    let query = this.client.from(this.table).update(patch);
    for (const [column, value] of filterEntries(filter)) {
      query = query.eq(column, value);
    }
    return this.unwrap(await query.select(), 'update');
  }

  async delete(filter: ItemFilter): Promise<StoreRow[]> {
    let query = this.client.from(this.table).delete();
    for (const [column, value] of filterEntries(filter)) {
      query = query.eq(column, value);
    }
    return this.unwrap(await query.select(), 'delete');
  }

  private unwrap(result: QueryResult, operation: string): StoreRow[] {
    if (result.error) {
      throw new StoreError(
        `${operation} on "${this.table}" failed: ${result.error.message}`,
        result.error.code,
        { cause: result.error },
      );
    }
    return result.data ?? [];
  }
}
