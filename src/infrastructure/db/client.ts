import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export interface DbClientOptions {
  databaseUrl: string;
  /** Upper bound on concurrent units of work; each holds one connection. */
  poolMax: number;
}

/**
 * Opens the postgres.js pool behind the sync store.
 *
 * Units of work hold their connection while they wait on an advisory
 * lock, so `poolMax` also caps how many webhooks can be in flight
 * against the database. Startup fails fast when the server is
 * unreachable rather than queueing deliveries behind a dead pool.
 */
export function createDbClient({ databaseUrl, poolMax }: DbClientOptions) {
  const sql = postgres(databaseUrl, {
    max: poolMax,
    connect_timeout: 5,
    idle_timeout: 30,
    onnotice: () => {},
  });

  return { sql, db: drizzle(sql, { schema }) };
}

export type Database = ReturnType<typeof createDbClient>['db'];

/** Handle passed to `db.transaction` callbacks. */
export type DbTransaction = Parameters<Parameters<Database['transaction']>[0]>[0];
