import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ingestWebhook } from '../../application/index.js';
import type { ProcessorRegistry } from '../../application/index.js';
import { PersistenceConflictError, PipelineTimeoutError } from '../../domain/index.js';
import type { SyncConfig } from '../../infrastructure/index.js';
import { withTimeout } from './timeout.js';

/** Seconds a sender should wait before retrying a 503. */
const RETRY_AFTER_SECONDS = 5;

export interface WebhookRouteOptions {
  registry: ProcessorRegistry;
  config: Pick<
    SyncConfig,
    'unsupportedEventPolicy' | 'deletePolicy' | 'stalenessMode' | 'pipelineTimeoutMs'
  >;
}

/**
 * Registers the webhook receiver.
 *
 * POST /api/v1/webhooks: one tracker notification per call.
 *
 * The body reaches the parser as raw bytes whatever the content type,
 * so content-type and JSON errors are reported by the pipeline itself.
 *
 * Accepted → 200, Rejected → 400, retriable store conflict or timeout
 * → 503 with Retry-After, anything else → 500.
 */
async function webhookRoutes(fastify: FastifyInstance, opts: WebhookRouteOptions): Promise<void> {
  const { registry, config } = opts;

  fastify.log.info({ eventTypes: registry.eventTypes() }, 'Webhook processors registered');

  // Encapsulated so the raw-body parser only applies to the webhook route.
  await fastify.register(async (scope) => {
    scope.removeAllContentTypeParsers();
    scope.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
      done(null, body);
    });

    scope.post(
      '/api/v1/webhooks',
      async (request: FastifyRequest, reply: FastifyReply) => {
        const body = request.body;

        try {
          const response = await withTimeout(
            ingestWebhook(
              {
                store: fastify.store,
                registry,
                log: request.log,
                unsupportedEventPolicy: config.unsupportedEventPolicy,
                reconcile: {
                  deletePolicy: config.deletePolicy,
                  stalenessMode: config.stalenessMode,
                  now: () => new Date(),
                },
              },
              {
                body: Buffer.isBuffer(body) ? body : '',
                contentType: request.headers['content-type'],
              },
            ),
            config.pipelineTimeoutMs,
          );

          return reply.status(response.status === 'Accepted' ? 200 : 400).send(response);
        } catch (err: unknown) {
          if (err instanceof PersistenceConflictError || err instanceof PipelineTimeoutError) {
            request.log.warn({ err }, 'Webhook failed with a retriable error');
            return reply
              .status(503)
              .header('retry-after', String(RETRY_AFTER_SECONDS))
              .send({ error: err.message, code: err.code });
          }

          request.log.error({ err }, 'Webhook failed');
          return reply.status(500).send({ error: 'Internal error' });
        }
      },
    );
  });
}

export default fp(webhookRoutes, {
  name: 'webhook-routes',
  dependencies: ['store'],
  fastify: '5.x',
});
