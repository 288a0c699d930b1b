import { fastify as createFastify } from 'fastify';
import type { FastifyInstance } from 'fastify';
import monitorPlugin from './monitor-plugin.js';
import type { MonitorHandle } from './monitor-plugin.js';
import signalRoutes from './signal-routes.js';
import statusRoutes from './status-routes.js';

export interface HttpServerOptions {
  monitor: MonitorHandle;
  /** `false` disables request logging (tests). */
  logLevel: string | false;
}

/**
 * Builds the HTTP interface. Listening is left to the caller.
 */
export async function buildHttpServer(options: HttpServerOptions): Promise<FastifyInstance> {
  const fastify = createFastify({
    logger: options.logLevel === false ? false : { level: options.logLevel },
  });

  await fastify.register(monitorPlugin, { monitor: options.monitor });
  await fastify.register(signalRoutes);
  await fastify.register(statusRoutes);

  return fastify;
}
