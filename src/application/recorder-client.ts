/**
 * Boundary to the remote recorder.
 *
 * Implementations report failures with the domain errors:
 * - `connect()`, `isRecording()`, `stopRecording()` → ConnectionError
 * - `startRecording()` → RemoteBusyError | ConnectionError
 */
export interface RecorderClient {
  readonly connected: boolean;
  connect(): Promise<void>;
  startRecording(): Promise<void>;
  /**
   * Resolves once the recorder confirms the stop, with the output file
   * path when the recorder reports one.
   */
  stopRecording(): Promise<string | null>;
  isRecording(): Promise<boolean>;
  close(): Promise<void>;
}
