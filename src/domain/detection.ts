/**
 * Core domain types for activity detection and recording sessions.
 *
 * These types carry no framework dependencies. Timestamps are epoch
 * milliseconds throughout.
 */

export const SOURCE_KINDS = ['vision', 'audio'] as const;

/** Which sensor produced a detection. */
export type SourceKind = (typeof SOURCE_KINDS)[number];

/**
 * A rising-edge detection emitted by a sensor.
 *
 * Produced only when a sample crosses from below to at/above the
 * sensor's threshold. Never mutated after creation.
 */
export interface DetectionEvent {
  readonly source: SourceKind;
  readonly observedAt: number;
  /** Raw metric that crossed the threshold (motion area, audio level). */
  readonly metric: number;
}

/** Per-sensor comparator and sampling cadence. Fixed for a sensor's lifetime. */
export interface ThresholdConfig {
  readonly threshold: number;
  readonly sampleIntervalMs: number;
}

/** Pluggable producer of raw sensor values. */
export interface RawSignalSource {
  /** Fails with SourceUnavailableError when no reading can be taken. */
  sample(): number | Promise<number>;
}
