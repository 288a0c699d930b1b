import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { SourceKind } from '../../domain/index.js';
import type { OrchestratorStatus } from '../../application/orchestrator.js';

/** What the HTTP layer may touch: push readings in, read status out. */
export interface MonitorHandle {
  status(): OrchestratorStatus;
  sources: Readonly<Record<SourceKind, { update(value: number): void }>>;
}

export interface MonitorPluginOptions {
  monitor: MonitorHandle;
}

/**
 * Fastify plugin exposing the running monitor to routes.
 *
 * Decorates `fastify.monitor`.
 */
async function monitorPlugin(fastify: FastifyInstance, options: MonitorPluginOptions): Promise<void> {
  fastify.decorate('monitor', options.monitor);
}

export default fp(monitorPlugin, {
  name: 'monitor',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.monitor` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    monitor: MonitorHandle;
  }
}
