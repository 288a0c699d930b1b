import { resolve } from 'node:path';
import type { RetriggerPolicy, ThresholdConfig } from '../../domain/index.js';
import { ConfigError } from '../../domain/index.js';
import { envSchema } from '../../application/config-schema.js';

/**
 * Fully resolved runtime configuration. All durations in milliseconds.
 */
export interface AppConfig {
  obs: { host: string; port: number; password: string };
  vision: ThresholdConfig;
  audio: ThresholdConfig;
  cooldownMs: number;
  recordingDurationMs: number;
  retriggerPolicy: RetriggerPolicy;
  stopGraceMs: number;
  recorderTimeoutMs: number;
  handlerTimeoutMs: number;
  signalStaleMs: number;
  busCapacity: number;
  statusIntervalMs: number;
  http: { enabled: boolean; host: string; port: number };
  logLevel: string;
  notificationsPath: string;
}

/**
 * Builds the runtime configuration from environment variables.
 *
 * Missing variables take their defaults; anything present but invalid is a
 * ConfigError listing every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;

  return {
    obs: { host: e.OBS_HOST, port: e.OBS_PORT, password: e.OBS_PASSWORD },
    vision: { threshold: e.VISION_THRESHOLD, sampleIntervalMs: e.VISION_SAMPLE_INTERVAL_MS },
    audio: { threshold: e.AUDIO_THRESHOLD, sampleIntervalMs: e.AUDIO_SAMPLE_INTERVAL_MS },
    cooldownMs: e.COOLDOWN_PERIOD * 1000,
    recordingDurationMs: e.RECORDING_DURATION * 1000,
    retriggerPolicy: e.RETRIGGER_POLICY,
    stopGraceMs: e.STOP_GRACE_MS,
    recorderTimeoutMs: e.RECORDER_TIMEOUT_MS,
    handlerTimeoutMs: e.HANDLER_TIMEOUT_MS,
    signalStaleMs: e.SIGNAL_STALE_MS,
    busCapacity: e.BUS_CAPACITY,
    statusIntervalMs: e.STATUS_INTERVAL_SECONDS * 1000,
    http: { enabled: e.HTTP_ENABLED, host: e.HOST, port: e.PORT },
    logLevel: e.LOG_LEVEL,
    notificationsPath: e.NOTIFICATIONS_CONFIG ?? resolve(process.cwd(), 'config', 'notifications.yaml'),
  };
}

/** `ws://host:port` address of the OBS WebSocket server. */
export function obsUrl(config: AppConfig['obs']): string {
  return `ws://${config.host}:${config.port}`;
}
