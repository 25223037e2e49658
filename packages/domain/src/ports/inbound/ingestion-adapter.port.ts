import type { TelemetryStorePort } from '../outbound/telemetry-store.port.js';

export type IngestionBackend = 'mavsdk' | 'socket';

/**
 * The one writer of the telemetry store. Exactly one adapter is active per
 * process, selected at startup.
 */
export interface IngestionAdapter {
  readonly backend: IngestionBackend;
  /** Connection address or socket path, as shown on the status endpoint. */
  readonly sourceAddress: string;
  /**
   * Runs until the adapter ends. Resolves on a clean stop or a terminal
   * connect failure; rejects on an unrecoverable fault after connecting.
   */
  start(store: TelemetryStorePort): Promise<void>;
  stop(): Promise<void>;
}
