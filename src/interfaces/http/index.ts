export { buildHttpServer } from './server.js';
export type { HttpServerOptions } from './server.js';
export type { MonitorHandle } from './monitor-plugin.js';
