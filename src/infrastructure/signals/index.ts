export { PushedSignalSource } from './pushed-signal-source.js';
export type { PushedReading } from './pushed-signal-source.js';
