import type { TelemetryKey, TelemetryPatch, TelemetryState } from '../../entities/telemetry-state.js';

/**
 * Single source of truth for the latest telemetry.
 *
 * Both calls are atomic with respect to each other: a reader sees a patch
 * either fully applied or not at all. Returned objects are copies.
 */
export interface TelemetryStorePort {
  get(): TelemetryState;
  get<K extends TelemetryKey>(...keys: K[]): Pick<TelemetryState, K>;
  patch(update: TelemetryPatch): void;
}

/** Read-only view handed to the serving side. */
export type TelemetryReaderPort = Pick<TelemetryStorePort, 'get'>;
