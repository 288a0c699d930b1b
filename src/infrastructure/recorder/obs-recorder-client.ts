import OBSWebSocket, { OBSWebSocketError } from 'obs-websocket-js';
import type { Logger } from 'pino';
import type { RecorderClient } from '../../application/recorder-client.js';
import { ConnectionError, RemoteBusyError } from '../../domain/index.js';

/** obs-websocket request status codes used below. */
const OUTPUT_RUNNING = 500;
const OUTPUT_NOT_RUNNING = 501;

export interface ObsRecorderClientOptions {
  url: string;
  password?: string;
  log: Logger;
}

/**
 * RecorderClient for OBS Studio over obs-websocket v5.
 *
 * - `startRecording()` checks GetRecordStatus first; an output that is
 *   already active belongs to someone else → RemoteBusyError.
 * - `stopRecording()` resolves with the output path once OBS confirms.
 *   A recording that is already stopped counts as confirmed.
 * - A dropped socket flips `connected`; the session manager reconnects on
 *   the next start attempt.
 */
export class ObsRecorderClient implements RecorderClient {
  private readonly obs: OBSWebSocket;
  private readonly options: ObsRecorderClientOptions;
  private readonly log: Logger;
  private isConnected = false;

  constructor(options: ObsRecorderClientOptions) {
    this.options = options;
    this.log = options.log;
    this.obs = new OBSWebSocket();

    this.obs.on('ConnectionClosed', (err) => {
      if (!this.isConnected) return;
      this.isConnected = false;
      this.log.warn({ code: err.code, reason: err.message }, 'OBS connection closed');
    });
    this.obs.on('RecordStateChanged', (event) => {
      this.log.debug({ state: event.outputState, active: event.outputActive }, 'OBS record state changed');
    });
  }

  get connected(): boolean {
    return this.isConnected;
  }

  async connect(): Promise<void> {
    const { url, password } = this.options;
    try {
      const { obsWebSocketVersion, negotiatedRpcVersion } = await this.obs.connect(
        url,
        password === '' ? undefined : password,
      );
      this.isConnected = true;
      this.log.info({ url, obsWebSocketVersion, negotiatedRpcVersion }, 'Connected to OBS');
    } catch (err: unknown) {
      this.isConnected = false;
      throw new ConnectionError(`Failed to connect to OBS at ${url}`, { cause: err });
    }

    try {
      const { recordDirectory } = await this.obs.call('GetRecordDirectory');
      this.log.info({ recordDirectory }, 'OBS recording directory');
    } catch (err: unknown) {
      this.log.warn({ err }, 'Could not read OBS recording directory');
    }
  }

  async startRecording(): Promise<void> {
    if (await this.isRecording()) {
      throw new RemoteBusyError('OBS is already recording');
    }

    try {
      await this.obs.call('StartRecord');
    } catch (err: unknown) {
      if (err instanceof OBSWebSocketError && err.code === OUTPUT_RUNNING) {
        throw new RemoteBusyError('OBS is already recording', { cause: err });
      }
      throw this.toConnectionError('StartRecord', err);
    }
    this.log.info('OBS recording started');
  }

  async stopRecording(): Promise<string | null> {
    try {
      const { outputPath } = await this.obs.call('StopRecord');
      this.log.info({ outputPath }, 'OBS recording stopped');
      return outputPath;
    } catch (err: unknown) {
      if (err instanceof OBSWebSocketError && err.code === OUTPUT_NOT_RUNNING) {
        this.log.info('OBS was not recording, nothing to stop');
        return null;
      }
      throw this.toConnectionError('StopRecord', err);
    }
  }

  async isRecording(): Promise<boolean> {
    try {
      const { outputActive } = await this.obs.call('GetRecordStatus');
      return outputActive;
    } catch (err: unknown) {
      throw this.toConnectionError('GetRecordStatus', err);
    }
  }

  /** Closes the socket, including a connect attempt still in progress. */
  async close(): Promise<void> {
    const wasConnected = this.isConnected;
    this.isConnected = false;
    await this.obs.disconnect();
    if (wasConnected) this.log.info('Disconnected from OBS');
  }

  private toConnectionError(request: string, err: unknown): ConnectionError {
    return new ConnectionError(`OBS request ${request} failed`, { cause: err });
  }
}
