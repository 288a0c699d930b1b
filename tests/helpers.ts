import { vi } from 'vitest';
import type { RecorderClient } from '../src/application/recorder-client.js';
import type { DetectionEvent } from '../src/domain/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  const log = {
    fatal: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as import('pino').Logger;
}

/**
 * Factory for detection events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<DetectionEvent> = {}): DetectionEvent {
  return {
    source: overrides.source ?? 'vision',
    observedAt: overrides.observedAt ?? 0,
    metric: overrides.metric ?? 1500,
  };
}

/** Seconds → epoch ms from a zero origin, for readable scenarios. */
export const sec = (s: number): number => s * 1000;

/**
 * In-process recorder stand-in. Every method is a spy; behaviour is
 * adjusted per test with mockImplementation / mockRejectedValueOnce.
 */
export class FakeRecorder implements RecorderClient {
  connected = false;
  recording = false;

  connect = vi.fn(async (): Promise<void> => {
    this.connected = true;
  });

  startRecording = vi.fn(async (): Promise<void> => {
    this.recording = true;
  });

  stopRecording = vi.fn(async (): Promise<string | null> => {
    this.recording = false;
    return '/recordings/test.mkv';
  });

  isRecording = vi.fn(async (): Promise<boolean> => this.recording);

  close = vi.fn(async (): Promise<void> => {
    this.connected = false;
  });
}
