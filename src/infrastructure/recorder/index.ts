export { ObsRecorderClient } from './obs-recorder-client.js';
export type { ObsRecorderClientOptions } from './obs-recorder-client.js';
