export { projects, issues } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClientOptions, DbTransaction } from './client.js';
export { DrizzleSyncStore } from './sync-store.js';
export type { ProjectRow, IssueRow } from './sync-store.js';
export { toPersistenceError } from './pg-errors.js';
export { ensureSchema } from './migrate.js';
export { default as storePlugin } from './store-plugin.js';
export type { StorePluginOptions } from './store-plugin.js';
