import { Redis } from 'ioredis';
import { pino } from 'pino';
import type { FastifyInstance } from 'fastify';

import {
  CooldownGate,
  DetectionBus,
  Orchestrator,
  RecordingSessionManager,
  SensorPort,
} from './application/index.js';
import type { DetectionHandler } from './application/index.js';
import { ConfigError } from './domain/index.js';
import { loadConfig, obsUrl } from './infrastructure/config/index.js';
import type { AppConfig } from './infrastructure/config/index.js';
import {
  loadNotificationConfig,
  RedisDetectionHandler,
  SlackDetectionHandler,
} from './infrastructure/notifications/index.js';
import { ObsRecorderClient } from './infrastructure/recorder/index.js';
import { PushedSignalSource } from './infrastructure/signals/index.js';
import { buildHttpServer } from './interfaces/http/index.js';

/**
 * Recorder process.
 *
 * Order:
 * 1) Configuration (fatal on error)
 * 2) Recorder client → session manager → sensors
 * 3) Notification handlers
 * 4) HTTP interface
 * 5) Orchestrator run until SIGINT / SIGTERM
 * 6) Close HTTP and Redis, set exit code
 */
async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      pino().fatal({ issues: err.issues }, err.message);
      return 1;
    }
    throw err;
  }

  const log = pino({ level: config.logLevel });

  // --------------------------------------------------
  // Core
  // --------------------------------------------------

  const recorder = new ObsRecorderClient({
    url: obsUrl(config.obs),
    password: config.obs.password,
    log: log.child({ component: 'recorder' }),
  });

  const session = new RecordingSessionManager({
    recorder,
    recordingDurationMs: config.recordingDurationMs,
    retriggerPolicy: config.retriggerPolicy,
    stopGraceMs: config.stopGraceMs,
    requestTimeoutMs: config.recorderTimeoutMs,
    log: log.child({ component: 'session' }),
  });

  const bus = new DetectionBus(config.busCapacity);
  const gate = new CooldownGate(config.cooldownMs);

  const sources = {
    vision: new PushedSignalSource('vision', config.signalStaleMs),
    audio: new PushedSignalSource('audio', config.signalStaleMs),
  };

  const sensors = [
    new SensorPort({
      source: 'vision',
      signal: sources.vision,
      config: config.vision,
      bus,
      log: log.child({ component: 'sensor', source: 'vision' }),
    }),
    new SensorPort({
      source: 'audio',
      signal: sources.audio,
      config: config.audio,
      bus,
      log: log.child({ component: 'sensor', source: 'audio' }),
    }),
  ];

  // --------------------------------------------------
  // Notification handlers
  // --------------------------------------------------

  const notifConfig = loadNotificationConfig(config.notificationsPath);
  log.info({ notifConfig }, 'Notification config loaded');

  const handlers: DetectionHandler[] = [];
  let redis: Redis | null = null;

  if (notifConfig.slack.enabled) {
    handlers.push(
      new SlackDetectionHandler(
        notifConfig.slack,
        log.child({ component: 'slack' }),
        config.handlerTimeoutMs,
      ),
    );
  }

  if (notifConfig.redis.enabled) {
    redis = new Redis(notifConfig.redis.url, {
      enableReadyCheck: true,
      lazyConnect: true,
    });
    redis.on('error', (err: unknown) => log.warn({ err }, 'Redis connection error'));
    try {
      await redis.connect();
      log.info('Redis connected');
      handlers.push(
        new RedisDetectionHandler(redis, notifConfig.redis.channel, log.child({ component: 'redis' })),
      );
    } catch (err: unknown) {
      log.warn({ err }, 'Redis unavailable, detection publishing disabled');
      redis.disconnect();
      redis = null;
    }
  }

  const orchestrator = new Orchestrator({
    recorder,
    session,
    sensors,
    bus,
    gate,
    handlers,
    statusIntervalMs: config.statusIntervalMs,
    handlerTimeoutMs: config.handlerTimeoutMs,
    recorderTimeoutMs: config.recorderTimeoutMs,
    log: log.child({ component: 'orchestrator' }),
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  let http: FastifyInstance | null = null;

  if (config.http.enabled) {
    http = await buildHttpServer({
      monitor: { status: () => orchestrator.status(), sources },
      logLevel: config.logLevel,
    });
    await http.listen({ host: config.http.host, port: config.http.port });
  }

  // --------------------------------------------------
  // Run until interrupted
  // --------------------------------------------------

  const ac = new AbortController();
  const shutdown = (signal: NodeJS.Signals): void => {
    if (ac.signal.aborted) return;
    log.info({ signal }, 'Received shutdown signal');
    ac.abort();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const exitCode = await orchestrator.run(ac.signal);

  if (http) {
    await http.close();
  }
  if (redis) {
    await redis.quit().catch((err: unknown) => log.warn({ err }, 'Redis quit failed'));
  }

  process.off('SIGINT', shutdown);
  process.off('SIGTERM', shutdown);
  return exitCode;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('Fatal: recorder crashed', err);
    process.exit(1);
  },
);
