import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { getIssue, getProject } from '../../application/index.js';

/**
 * Read-only routes over the mirrored records.
 *
 * GET /api/v1/projects/:external_id: single project
 * GET /api/v1/issues/:external_id:   single issue
 * GET /api/v1/health:                store connectivity check
 */
async function queryRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/projects/:external_id',
    async (
      request: FastifyRequest<{ Params: { external_id: string } }>,
      reply: FastifyReply,
    ) => {
      const row = await getProject(fastify.store, request.params.external_id);
      if (row === null) {
        return reply.status(404).send({ error: 'Project not found' });
      }
      return reply.status(200).send(row);
    },
  );

  fastify.get(
    '/api/v1/issues/:external_id',
    async (
      request: FastifyRequest<{ Params: { external_id: string } }>,
      reply: FastifyReply,
    ) => {
      const row = await getIssue(fastify.store, request.params.external_id);
      if (row === null) {
        return reply.status(404).send({ error: 'Issue not found' });
      }
      return reply.status(200).send(row);
    },
  );

  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        await fastify.store.ping();
        return reply.status(200).send({ status: 'ok', store: 'ok' });
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Store health check failed');
        return reply.status(503).send({ status: 'degraded', store: 'unreachable' });
      }
    },
  );
}

export default fp(queryRoutes, {
  name: 'query-routes',
  dependencies: ['store'],
  fastify: '5.x',
});
