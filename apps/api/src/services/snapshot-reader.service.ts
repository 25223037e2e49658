import type {
  ServiceStatus,
  StatusConfig,
  TelemetryQueryPort,
  TelemetryReaderPort,
  TelemetrySnapshot,
} from '@telemetry-relay/domain';

/** Read-only views over the live store, shaped for the HTTP surface. */
export class SnapshotReaderService implements TelemetryQueryPort {
  constructor(
    private readonly store: TelemetryReaderPort,
    private readonly config: StatusConfig,
  ) {}

  full(): TelemetrySnapshot {
    return this.store.get('position', 'attitude', 'battery', 'last_updated');
  }

  position() {
    return this.store.get('position');
  }

  attitude() {
    return this.store.get('attitude');
  }

  battery() {
    return this.store.get('battery');
  }

  status(): ServiceStatus {
    const live = this.store.get('connected', 'connecting', 'started_at', 'last_updated', 'fault');
    return {
      ...live,
      backend: this.config.backend,
      source_address: this.config.sourceAddress,
      push_rate_hz: this.config.pushRateHz,
    };
  }
}
