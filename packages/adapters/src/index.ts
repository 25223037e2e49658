// ─── Store ────────────────────────────────────────────────────────────────────
export { InMemoryTelemetryStore } from './memory/in-memory-telemetry.store.js';

// ─── Ingestion ────────────────────────────────────────────────────────────────
export {
  StreamIngestionAdapter,
  connectDiagnostics,
  toAttitude,
  toBattery,
  toPosition,
} from './ingestion/stream-ingestion.adapter.js';
export type { StreamAdapterPhase, StreamIngestionOptions } from './ingestion/stream-ingestion.adapter.js';
export { SocketLineIngestionAdapter } from './ingestion/socket-line-ingestion.adapter.js';
export type { SocketLineIngestionOptions } from './ingestion/socket-line-ingestion.adapter.js';
export { ConnectTimeoutError, RateNegotiationError, StreamFaultError } from './ingestion/errors.js';
export type { TelemetryStreamName } from './ingestion/errors.js';
export { consumeJsonLines } from './ingestion/json-lines.js';
export { frameToPatch } from './ingestion/frame.js';
export { roundTo } from './ingestion/rounding.js';

// ─── MAVSDK (gRPC) ────────────────────────────────────────────────────────────
export { MavsdkGrpcSource, DEFAULT_PROTO_DIR, loadMavsdkServices } from './mavsdk/mavsdk-grpc.source.js';
export type { MavsdkGrpcSourceOptions, MavsdkServices } from './mavsdk/mavsdk-grpc.source.js';

// ─── Streams / Clock / RNG ────────────────────────────────────────────────────
export { AsyncQueue } from './streams/async-queue.js';
export {
  DeterministicClock,
  SeededRng,
  wallClockNow,
} from './clock/deterministic-clock.js';
export type { Clock } from './clock/deterministic-clock.js';
