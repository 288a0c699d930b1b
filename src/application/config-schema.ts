import { z } from 'zod';

/** Treats unset and empty environment variables the same way. */
const emptyToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

/** Largest delay setTimeout honours; anything above fires after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).default(fallback));

const timerMs = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(MAX_TIMER_MS).default(fallback));

const nonNegativeNumber = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().finite().min(0).default(fallback));

const booleanFlag = (fallback: boolean) =>
  z.preprocess(
    emptyToUndefined,
    z.enum(['true', 'false', '1', '0']).default(fallback ? 'true' : 'false'),
  ).transform((value) => value === 'true' || value === '1');

/**
 * Zod schema for the process environment.
 *
 * Durations follow the operator-facing units: cooldown and recording
 * duration in seconds, sampling and grace periods in milliseconds.
 */
export const envSchema = z.object({
  OBS_HOST: z.preprocess(emptyToUndefined, z.string().min(1).default('localhost')),
  OBS_PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(65535).default(4455)),
  OBS_PASSWORD: z.string().optional().default(''),

  VISION_THRESHOLD: nonNegativeNumber(1000),
  VISION_SAMPLE_INTERVAL_MS: timerMs(100),
  AUDIO_THRESHOLD: z.preprocess(
    emptyToUndefined,
    z.coerce.number().finite().min(0).max(1).default(0.01),
  ),
  AUDIO_SAMPLE_INTERVAL_MS: timerMs(50),

  COOLDOWN_PERIOD: nonNegativeNumber(30),
  RECORDING_DURATION: z.preprocess(
    emptyToUndefined,
    z.coerce.number().finite().positive().default(3600),
  ),
  RETRIGGER_POLICY: z.preprocess(emptyToUndefined, z.enum(['extend', 'ignore']).default('extend')),
  STOP_GRACE_MS: timerMs(10_000),
  RECORDER_TIMEOUT_MS: timerMs(10_000),
  HANDLER_TIMEOUT_MS: timerMs(5000),
  SIGNAL_STALE_MS: positiveInt(2000),
  BUS_CAPACITY: positiveInt(16),
  STATUS_INTERVAL_SECONDS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().min(1).max(Math.floor(MAX_TIMER_MS / 1000)).default(30),
  ),

  HTTP_ENABLED: booleanFlag(true),
  HOST: z.preprocess(emptyToUndefined, z.string().min(1).default('0.0.0.0')),
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).max(65535).default(3000)),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
  NOTIFICATIONS_CONFIG: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
});

export type EnvInput = z.infer<typeof envSchema>;
