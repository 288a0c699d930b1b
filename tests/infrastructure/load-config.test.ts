import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { loadConfig, obsUrl } from '../../src/infrastructure/config/load-config.js';
import { ConfigError } from '../../src/domain/index.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      obs: { host: 'localhost', port: 4455, password: '' },
      vision: { threshold: 1000, sampleIntervalMs: 100 },
      audio: { threshold: 0.01, sampleIntervalMs: 50 },
      cooldownMs: 30_000,
      recordingDurationMs: 3_600_000,
      retriggerPolicy: 'extend',
      stopGraceMs: 10_000,
      recorderTimeoutMs: 10_000,
      handlerTimeoutMs: 5000,
      signalStaleMs: 2000,
      busCapacity: 16,
      statusIntervalMs: 30_000,
      http: { enabled: true, host: '0.0.0.0', port: 3000 },
      logLevel: 'info',
      notificationsPath: resolve(process.cwd(), 'config', 'notifications.yaml'),
    });
  });

  it('converts operator units to milliseconds', () => {
    const config = loadConfig({
      COOLDOWN_PERIOD: '10',
      RECORDING_DURATION: '1.5',
      STATUS_INTERVAL_SECONDS: '5',
    });

    expect(config.cooldownMs).toBe(10_000);
    expect(config.recordingDurationMs).toBe(1500);
    expect(config.statusIntervalMs).toBe(5000);
  });

  it('reads OBS connection settings', () => {
    const config = loadConfig({ OBS_HOST: 'studio.local', OBS_PORT: '4444', OBS_PASSWORD: 'test-secret' });

    expect(config.obs).toEqual({ host: 'studio.local', port: 4444, password: 'test-secret' });
    expect(obsUrl(config.obs)).toBe('ws://studio.local:4444');
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ OBS_PORT: '', VISION_THRESHOLD: '  ', RETRIGGER_POLICY: '' });

    expect(config.obs.port).toBe(4455);
    expect(config.vision.threshold).toBe(1000);
    expect(config.retriggerPolicy).toBe('extend');
  });

  it('parses the HTTP flag', () => {
    expect(loadConfig({ HTTP_ENABLED: 'false' }).http.enabled).toBe(false);
    expect(loadConfig({ HTTP_ENABLED: '0' }).http.enabled).toBe(false);
    expect(loadConfig({ HTTP_ENABLED: '1' }).http.enabled).toBe(true);
  });

  it('accepts the ignore retrigger policy and a notifications path', () => {
    const config = loadConfig({ RETRIGGER_POLICY: 'ignore', NOTIFICATIONS_CONFIG: '/etc/recorder/n.yaml' });

    expect(config.retriggerPolicy).toBe('ignore');
    expect(config.notificationsPath).toBe('/etc/recorder/n.yaml');
  });

  it('rejects invalid values with every offending variable', () => {
    let caught: unknown;
    try {
      loadConfig({ OBS_PORT: 'abc', AUDIO_THRESHOLD: '2', RETRIGGER_POLICY: 'restart' });
    } catch (err: unknown) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.code).toBe('CONFIG_INVALID');
    expect(caught.issues).toHaveLength(3);
    expect(caught.issues.map((issue) => issue.split(':')[0])).toEqual([
      'OBS_PORT',
      'AUDIO_THRESHOLD',
      'RETRIGGER_POLICY',
    ]);
    expect(caught.message.startsWith('Invalid configuration: OBS_PORT: ')).toBe(true);
  });

  it('rejects timer values setTimeout cannot honour', () => {
    expect(() => loadConfig({ VISION_SAMPLE_INTERVAL_MS: '2147483648' })).toThrow(ConfigError);
    expect(() => loadConfig({ STATUS_INTERVAL_SECONDS: '2147484' })).toThrow(ConfigError);
    expect(() => loadConfig({ HANDLER_TIMEOUT_MS: '3000000000' })).toThrow(ConfigError);
  });

  it('accepts the largest timer values', () => {
    const config = loadConfig({ AUDIO_SAMPLE_INTERVAL_MS: '2147483647', STATUS_INTERVAL_SECONDS: '2147483' });

    expect(config.audio.sampleIntervalMs).toBe(2_147_483_647);
    expect(config.statusIntervalMs).toBe(2_147_483_000);
  });

  it('rejects a zero recording duration', () => {
    expect(() => loadConfig({ RECORDING_DURATION: '0' })).toThrow(ConfigError);
  });
});
