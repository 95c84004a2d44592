export { loadSyncConfig, ConfigError } from './sync-config.js';
export type { SyncConfig, StoreDriver } from './sync-config.js';
