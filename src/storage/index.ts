/**
 * Storage Module Exports
 */

export { type ItemStore, filterEntries } from './item-store.js';

export { SupabaseItemStore, type SupabaseStoreConfig } from './supabase-store.js';
