import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SensorPort } from '../../src/application/sensor-port.js';
import { DetectionBus } from '../../src/application/detection-bus.js';
import { SourceUnavailableError } from '../../src/domain/index.js';
import type { DetectionEvent, RawSignalSource } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

const FIXED_NOW = new Date('2026-03-01T08:00:00Z').getTime();

/** Replays a script of values; `Error` entries are thrown. Repeats the last entry forever. */
function scriptedSource(script: Array<number | Error>): RawSignalSource & { calls: number } {
  const source = {
    calls: 0,
    sample(): number {
      const entry = script[Math.min(source.calls, script.length - 1)];
      source.calls++;
      if (entry === undefined) throw new SourceUnavailableError('empty script');
      if (entry instanceof Error) throw entry;
      return entry;
    },
  };
  return source;
}

function makePort(signal: RawSignalSource, bus = new DetectionBus(), sampleIntervalMs = 1) {
  const log = fakeLogger();
  const port = new SensorPort({
    source: 'audio',
    signal,
    config: { threshold: 0.5, sampleIntervalMs },
    bus,
    log,
    nowFn: () => FIXED_NOW,
  });
  return { port, bus, log };
}

async function sampleAll(port: SensorPort, count: number) {
  const results: Array<DetectionEvent | null> = [];
  for (let i = 0; i < count; i++) results.push(await port.sampleOnce());
  return results;
}

describe('SensorPort', () => {
  describe('edge detection', () => {
    it('emits only on below → at/above transitions', async () => {
      const { port } = makePort(scriptedSource([0.1, 0.6, 0.7, 0.8, 0.2, 0.5, 0.5, 0.1]));

      const results = await sampleAll(port, 8);

      expect(results.map((r) => r !== null)).toEqual([false, true, false, false, false, true, false, false]);
    });

    it('treats the state before the first sample as below', async () => {
      const { port } = makePort(scriptedSource([0.9]));

      const event = await port.sampleOnce();

      expect(event).toEqual({ source: 'audio', observedAt: FIXED_NOW, metric: 0.9 });
    });

    it('fires at exactly the threshold', async () => {
      const { port } = makePort(scriptedSource([0.49, 0.5]));

      const results = await sampleAll(port, 2);

      expect(results[1]?.metric).toBe(0.5);
    });

    it('never fires while the signal stays below threshold', async () => {
      const { port } = makePort(scriptedSource([0, 0.1, 0.2, 0.49, 0.3]));

      const results = await sampleAll(port, 5);

      expect(results.every((r) => r === null)).toBe(true);
    });

    it('keeps the edge state across a failed sample', async () => {
      const { port } = makePort(
        scriptedSource([0.9, new SourceUnavailableError('gap'), 0.9, 0.1, 0.9]),
      );

      const results = await sampleAll(port, 5);

      // 0.9 after the gap is still "sustained", not a new edge
      expect(results.map((r) => r !== null)).toEqual([true, false, false, false, true]);
    });
  });

  describe('failures', () => {
    it('logs unavailable samples at debug and counts them', async () => {
      const { port, log } = makePort(scriptedSource([new SourceUnavailableError('no data')]));

      await expect(port.sampleOnce()).resolves.toBeNull();

      expect(log.debug).toHaveBeenCalledWith(
        expect.objectContaining({ source: 'audio', err: expect.any(SourceUnavailableError) }),
        'Sample unavailable, retrying next tick',
      );
      expect(port.stats().failures).toBe(1);
    });

    it('logs unexpected errors at warn', async () => {
      const { port, log } = makePort(scriptedSource([new Error('device read failed')]));

      await port.sampleOnce();

      expect(log.warn).toHaveBeenCalledWith(
        expect.objectContaining({ err: expect.any(Error) }),
        'Sample failed, retrying next tick',
      );
    });

    it('ignores non-finite samples', async () => {
      const { port } = makePort(scriptedSource([Number.NaN, 0.9]));

      const results = await sampleAll(port, 2);

      expect(results[0]).toBeNull();
      expect(results[1]).not.toBeNull();
      expect(port.stats()).toMatchObject({ samples: 1, failures: 1 });
    });
  });

  describe('lifecycle', () => {
    let bus: DetectionBus;

    beforeEach(() => {
      bus = new DetectionBus(8);
    });

    it('keeps sampling after failures and pushes edges onto the bus', async () => {
      const source = scriptedSource([
        new SourceUnavailableError('warming up'),
        0.1,
        0.8,
        0.9,
        0.1,
        0.7,
        0.1,
      ]);
      const { port } = makePort(source, bus);

      port.start();
      await vi.waitFor(() => expect(source.calls).toBeGreaterThanOrEqual(7));
      await port.stop();

      const events = bus.drain();
      expect(events.map((e) => e.metric)).toEqual([0.8, 0.7]);
      expect(port.stats()).toMatchObject({ emitted: 2, running: false });
    });

    it('start() on a running port is a no-op', async () => {
      const source = scriptedSource([0.1]);
      const { port, log } = makePort(source, bus);

      port.start();
      port.start();

      expect(log.debug).toHaveBeenCalledWith({ source: 'audio' }, 'Sensor already running');
      await port.stop();
    });

    it('stop() twice is safe and emits nothing afterwards', async () => {
      const source = scriptedSource([0.1, 0.9]);
      const { port } = makePort(source, bus);

      port.start();
      await vi.waitFor(() => expect(bus.size).toBe(1));
      await port.stop();
      await port.stop();

      const callsAfterStop = source.calls;
      await new Promise((r) => setTimeout(r, 10));

      expect(source.calls).toBe(callsAfterStop);
      expect(bus.drain()).toHaveLength(1);
    });

    it('stop() on a never-started port resolves', async () => {
      const { port } = makePort(scriptedSource([0.1]), bus);
      await expect(port.stop()).resolves.toBeUndefined();
    });

    it('stop() returns while a push is blocked on a full bus', async () => {
      const full = new DetectionBus(1);
      await full.push({ source: 'vision', observedAt: 0, metric: 1 });
      const { port } = makePort(scriptedSource([0.9]), full);

      port.start();
      await vi.waitFor(() => expect(port.stats().samples).toBe(1));
      await port.stop();

      expect(full.drain()).toHaveLength(1);
      expect(port.stats().emitted).toBe(0);
    });

    it('a sample resolving after stop() leaves the edge state untouched', async () => {
      let release: (value: number) => void = () => undefined;
      let calls = 0;
      const source: RawSignalSource = {
        sample: () => {
          calls++;
          if (calls === 1) return new Promise<number>((resolve) => { release = resolve; });
          return 0.9;
        },
      };
      const { port } = makePort(source, bus);

      port.start();
      await vi.waitFor(() => expect(calls).toBe(1));
      await port.stop();

      release(0.9);
      await new Promise((r) => setTimeout(r, 0));
      expect(port.stats()).toMatchObject({ samples: 0, above: false });

      port.start();
      await vi.waitFor(() => expect(bus.size).toBe(1));
      await port.stop();

      expect(bus.drain().map((e) => e.metric)).toEqual([0.9]);
    });

    it('stop() returns while a sample is hanging', async () => {
      const hanging: RawSignalSource = { sample: () => new Promise<number>(() => undefined) };
      const { port } = makePort(hanging, bus);

      port.start();
      await new Promise((r) => setTimeout(r, 5));

      await expect(port.stop()).resolves.toBeUndefined();
      expect(port.running).toBe(false);
    });
  });
});
