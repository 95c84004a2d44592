import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { SyncStore } from '../../domain/index.js';
import type { SyncConfig } from '../config/index.js';
import { MemorySyncStore } from '../memory/index.js';
import { createDbClient } from './client.js';
import { ensureSchema } from './migrate.js';
import { DrizzleSyncStore } from './sync-store.js';

export interface StorePluginOptions {
  config: Pick<SyncConfig, 'storeDriver' | 'databaseUrl' | 'databasePoolMax'>;
}

/**
 * Fastify plugin that owns the `SyncStore` lifecycle.
 *
 * Postgres: opens the pool, ensures the tables exist and closes the
 * pool on server shutdown. Memory: a process-local store.
 * Decorates `fastify.store`.
 */
async function storePlugin(fastify: FastifyInstance, opts: StorePluginOptions): Promise<void> {
  if (opts.config.storeDriver === 'memory') {
    fastify.decorate('store', new MemorySyncStore());
    fastify.log.warn('Using in-memory store; records are lost on restart');
    return;
  }

  const { sql, db } = createDbClient({
    databaseUrl: opts.config.databaseUrl,
    poolMax: opts.config.databasePoolMax,
  });

  await ensureSchema(sql);
  fastify.log.info('Database ready (projects + issues tables)');

  const store: SyncStore = new DrizzleSyncStore(db);
  fastify.decorate('store', store);

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });
}

export default fp(storePlugin, {
  name: 'store',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.store` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    store: SyncStore;
  }
}
