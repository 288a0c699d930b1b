export { loadConfig, obsUrl } from './load-config.js';
export type { AppConfig } from './load-config.js';
