import type {
  Attitude,
  Battery,
  IsoTimestamp,
  Position,
} from '../../entities/telemetry-state.js';
import type { IngestionBackend } from './ingestion-adapter.port.js';

export interface TelemetrySnapshot {
  position: Position;
  attitude: Attitude;
  battery: Battery;
  last_updated: IsoTimestamp | null;
}

export interface ServiceStatus {
  connected: boolean;
  connecting: boolean;
  started_at: IsoTimestamp | null;
  last_updated: IsoTimestamp | null;
  fault: string | null;
  backend: IngestionBackend;
  source_address: string;
  push_rate_hz: number;
}

/** Static part of the status response, fixed at startup. */
export interface StatusConfig {
  backend: IngestionBackend;
  sourceAddress: string;
  pushRateHz: number;
}

export interface TelemetryQueryPort {
  full(): TelemetrySnapshot;
  position(): { position: Position };
  attitude(): { attitude: Attitude };
  battery(): { battery: Battery };
  status(): ServiceStatus;
}
