import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  audioReadingSchema,
  signalParamsSchema,
  visionReadingSchema,
} from '../../application/signal-schema.js';

/**
 * Signal ingestion route for external detector processes.
 *
 * POST /api/v1/signals/:source — body `{ value }`; vision ≥ 0, audio in [0, 1].
 */
async function signalRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/signals/:source',
    async (request: FastifyRequest<{ Params: { source: string } }>, reply: FastifyReply) => {
      const params = signalParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({
          error: 'source must be one of: vision, audio',
        });
      }

      const { source } = params.data;
      const schema = source === 'audio' ? audioReadingSchema : visionReadingSchema;
      const body = schema.safeParse(request.body);

      if (!body.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: body.error.issues,
        });
      }

      fastify.monitor.sources[source].update(body.data.value);

      return reply.status(202).send({ status: 'accepted', source });
    },
  );
}

export default fp(signalRoutes, {
  name: 'signal-routes',
  dependencies: ['monitor'],
  fastify: '5.x',
});
