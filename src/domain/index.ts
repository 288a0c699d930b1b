export { SOURCE_KINDS } from './detection.js';
export type { SourceKind, DetectionEvent, ThresholdConfig, RawSignalSource } from './detection.js';
export type { SessionState, RetriggerPolicy, SessionOutcome, RecordingSession } from './session.js';
export {
  RecorderAppError,
  SourceUnavailableError,
  ConnectionError,
  RemoteBusyError,
  ConfigError,
} from './errors.js';
