import { z } from 'zod';
import { SOURCE_KINDS } from '../domain/index.js';

/** Route parameter naming the sensor a reading belongs to. */
export const signalParamsSchema = z.object({
  source: z.enum(SOURCE_KINDS),
});

/** Motion intensity: any non-negative magnitude (e.g. changed-pixel area). */
export const visionReadingSchema = z.object({
  value: z.number().finite().min(0),
});

/** Audio level, normalized to [0, 1]. */
export const audioReadingSchema = z.object({
  value: z.number().finite().min(0).max(1),
});

export type SignalParams = z.infer<typeof signalParamsSchema>;
export type SignalReading = z.infer<typeof visionReadingSchema>;
