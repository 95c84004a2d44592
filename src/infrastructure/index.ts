export { loadSyncConfig, ConfigError } from './config/index.js';
export type { SyncConfig, StoreDriver } from './config/index.js';
export {
  createDbClient,
  projects,
  issues,
  DrizzleSyncStore,
  toPersistenceError,
  ensureSchema,
  storePlugin,
} from './db/index.js';
export type { Database, DbClientOptions, DbTransaction, ProjectRow, IssueRow, StorePluginOptions } from './db/index.js';
export { MemorySyncStore, KeyedMutex } from './memory/index.js';
