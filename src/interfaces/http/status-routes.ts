import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';

/**
 * Read-only status routes.
 *
 * GET /api/v1/status — session, cooldown, sensor and queue snapshot
 * GET /health        — liveness plus recorder connectivity
 */
async function statusRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get('/api/v1/status', async (_request, reply: FastifyReply) => {
    return reply.status(200).send(fastify.monitor.status());
  });

  fastify.get('/health', async (_request, reply: FastifyReply) => {
    const { running, recorderConnected } = fastify.monitor.status();
    return reply.status(200).send({
      status: 'ok',
      running,
      recorderConnected,
    });
  });
}

export default fp(statusRoutes, {
  name: 'status-routes',
  dependencies: ['monitor'],
  fastify: '5.x',
});
