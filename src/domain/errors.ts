/**
 * Error taxonomy for the recorder.
 *
 * Sensor and recorder errors are caught where they originate and turned
 * into retries or failed transitions. Only ConfigError ends the process.
 */
export abstract class RecorderAppError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A raw signal source could not produce a sample. Retried next tick. */
export class SourceUnavailableError extends RecorderAppError {
  readonly code = 'SOURCE_UNAVAILABLE';
}

/** The remote recorder is unreachable. */
export class ConnectionError extends RecorderAppError {
  readonly code = 'RECORDER_CONNECTION';
}

/** The remote recorder is already recording for a reason outside this process. */
export class RemoteBusyError extends RecorderAppError {
  readonly code = 'RECORDER_BUSY';
}

/** Invalid startup configuration. Fatal. */
export class ConfigError extends RecorderAppError {
  readonly code = 'CONFIG_INVALID';

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message);
  }
}
