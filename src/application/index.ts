export { DetectionBus } from './detection-bus.js';
export type { TakeOptions } from './detection-bus.js';
export { SensorPort } from './sensor-port.js';
export type { SensorPortOptions, SensorStats } from './sensor-port.js';
export { CooldownGate } from './cooldown-gate.js';
export type { CooldownDecision } from './cooldown-gate.js';
export { RecordingSessionManager } from './recording-session-manager.js';
export type { RecordingSessionManagerOptions } from './recording-session-manager.js';
export type { RecorderClient } from './recorder-client.js';
export { runDetectionHandlers, DEFAULT_HANDLER_TIMEOUT_MS } from './detection-handler.js';
export type { DetectionHandler, DetectionContext } from './detection-handler.js';
export { Orchestrator, EXIT_OK, EXIT_RECORDER_UNREACHABLE } from './orchestrator.js';
export type { ManagedSensor, OrchestratorDeps, OrchestratorStatus } from './orchestrator.js';
export { envSchema, MAX_TIMER_MS } from './config-schema.js';
export type { EnvInput } from './config-schema.js';
export { signalParamsSchema, visionReadingSchema, audioReadingSchema } from './signal-schema.js';
export type { SignalParams, SignalReading } from './signal-schema.js';
export { sleep, withTimeout, untilAborted } from './timing.js';
export type { TimeoutResult } from './timing.js';
