import { setTimeout as delay } from 'node:timers/promises';
import type {
  Attitude,
  AttitudeSample,
  Battery,
  BatterySample,
  IngestionAdapter,
  Position,
  PositionSample,
  RateMetric,
  TelemetrySourcePort,
  TelemetryStorePort,
} from '@telemetry-relay/domain';
import { wallClockNow, type Clock } from '../clock/deterministic-clock.js';
import { ConnectTimeoutError, StreamFaultError, type TelemetryStreamName } from './errors.js';
import { roundTo } from './rounding.js';

const TAG = '[ingest:mavsdk]';

/** Rate for the slow-moving vehicle status metrics. */
const STATUS_RATE_HZ = 1;

export type StreamAdapterPhase =
  | 'idle'
  | 'connecting'
  | 'streaming'
  | 'timed_out'
  | 'faulted'
  | 'stopped';

export interface StreamIngestionOptions {
  /** Connection address handed to the source, e.g. `udpin://0.0.0.0:14551` or `serial:///dev/ttyACM0:57600` */
  address: string;
  connectTimeoutMs: number;
  telemetryRateHz: number;
  /** Warm-up between rate negotiation and the first subscription. */
  settleMs: number;
  clock?: Clock;
}

export function toPosition(sample: PositionSample): Position {
  return {
    latitude_deg: roundTo(sample.latitudeDeg, 7),
    longitude_deg: roundTo(sample.longitudeDeg, 7),
    absolute_altitude_m: roundTo(sample.absoluteAltitudeM, 2),
    relative_altitude_m: roundTo(sample.relativeAltitudeM, 2),
  };
}

export function toAttitude(sample: AttitudeSample): Attitude {
  return {
    roll_deg: roundTo(sample.rollDeg, 2),
    pitch_deg: roundTo(sample.pitchDeg, 2),
    yaw_deg: roundTo(sample.yawDeg, 2),
  };
}

export function toBattery(sample: BatterySample): Battery {
  return {
    voltage_v: roundTo(sample.voltageV, 2),
    remaining_percent: roundTo(sample.remainingPercent, 4),
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Troubleshooting hints printed when the heartbeat never arrives. */
export function connectDiagnostics(address: string): string[] {
  if (address.startsWith('serial')) {
    return [
      '1. Check that the flight controller is powered and the USB cable is seated',
      '2. Verify the serial device exists (ls /dev/ttyACM* /dev/ttyUSB*)',
      '3. Check the baud rate (57600, 115200 and 921600 are common)',
      `4. Current address: ${address}`,
    ];
  }
  return [
    '1. Forward MAVLink from the ground station to this host (UDP output to 127.0.0.1:14551)',
    '2. Or try a different port (14550, 14540)',
    '3. Make sure the vehicle or SITL is connected to the ground station first',
  ];
}

/**
 * Ingests from a push-style source: connect, wait for a heartbeat, ask for
 * update rates, then run one producer loop per telemetry stream.
 *
 * A connect timeout is terminal for the instance and a mid-stream fault is
 * never retried; both are recorded in the store's `fault` field.
 */
export class StreamIngestionAdapter implements IngestionAdapter {
  readonly backend = 'mavsdk';
  private currentPhase: StreamAdapterPhase = 'idle';
  private readonly stopSignal = new AbortController();
  private readonly clock: Clock;

  constructor(
    private readonly source: TelemetrySourcePort,
    private readonly options: StreamIngestionOptions,
  ) {
    this.clock = options.clock ?? wallClockNow;
  }

  get sourceAddress(): string {
    return this.options.address;
  }

  get phase(): StreamAdapterPhase {
    return this.currentPhase;
  }

  async start(store: TelemetryStorePort): Promise<void> {
    if (this.currentPhase !== 'idle') {
      throw new Error(`stream adapter cannot start from phase "${this.currentPhase}"`);
    }
    const { address, connectTimeoutMs } = this.options;

    this.currentPhase = 'connecting';
    store.patch({ connected: false, connecting: true });

    try {
      await this.source.connect(address);
    } catch (err) {
      await this.fail(store, `connect failed: ${errorMessage(err)}`);
      throw err;
    }
    console.log(`${TAG} listening on ${address}`);
    console.log(`${TAG} waiting up to ${connectTimeoutMs / 1000}s for heartbeat`);

    let heartbeat: boolean;
    try {
      heartbeat = await this.waitForHeartbeat(connectTimeoutMs);
    } catch (err) {
      await this.fail(store, `connection state failed: ${errorMessage(err)}`);
      throw err;
    }
    if (this.isStopped()) {
      store.patch({ connecting: false });
      return;
    }

    if (!heartbeat) {
      this.currentPhase = 'timed_out';
      const timeout = new ConnectTimeoutError(address, connectTimeoutMs);
      store.patch({ connected: false, connecting: false, fault: timeout.message });
      console.error(`${TAG} ✗ ${timeout.message}`);
      console.error('  Troubleshooting:');
      for (const line of connectDiagnostics(address)) console.error(`  ${line}`);
      await this.source.close();
      return;
    }

    store.patch({ connected: true, connecting: false, started_at: this.clock().toISOString() });
    console.log(`${TAG} ✓ connected, requesting telemetry rates`);

    await this.negotiateRates();

    try {
      await delay(this.options.settleMs, undefined, { signal: this.stopSignal.signal });
    } catch (err) {
      if (this.isStopped()) return;
      throw err;
    }

    await this.runProducers(store);
  }

  async stop(): Promise<void> {
    const previous = this.currentPhase;
    this.currentPhase = 'stopped';
    this.stopSignal.abort();
    if (previous !== 'idle') await this.source.close();
  }

  private isStopped(): boolean {
    return this.currentPhase === 'stopped';
  }

  /** Terminal failure before streaming: record it and release the source. */
  private async fail(store: TelemetryStorePort, fault: string): Promise<void> {
    if (!this.isStopped()) this.currentPhase = 'faulted';
    store.patch({ connected: false, connecting: false, fault });
    console.error(`${TAG} ✗ ${fault}`);
    await this.source.close().catch((err: unknown) => {
      console.warn(`${TAG} source did not close cleanly: ${errorMessage(err)}`);
    });
  }

  /** Resolves true on the first `isConnected`, false on timeout or end of stream. */
  private async waitForHeartbeat(timeoutMs: number): Promise<boolean> {
    const states = this.source.connectionState()[Symbol.asyncIterator]();
    const timer = new AbortController();

    const connected = (async () => {
      for (;;) {
        const result = await states.next();
        if (result.done) return false;
        if (result.value.isConnected) return true;
      }
    })();

    try {
      return await Promise.race([connected, delay(timeoutMs, false, { signal: timer.signal })]);
    } finally {
      timer.abort();
      if (states.return) {
        states.return().catch((err: unknown) => {
          console.warn(`${TAG} connection-state stream did not close cleanly`, err);
        });
      }
    }
  }

  private async negotiateRates(): Promise<void> {
    const rateHz = this.options.telemetryRateHz;
    const requests: Array<[RateMetric, number]> = [
      ['position', rateHz],
      ['battery', rateHz],
      ['attitude_euler', rateHz],
      ['velocity_ned', rateHz],
      ['gps_info', rateHz],
      ['home', STATUS_RATE_HZ],
      ['in_air', STATUS_RATE_HZ],
      ['landed_state', STATUS_RATE_HZ],
    ];

    try {
      for (const [metric, hz] of requests) {
        await this.source.setRate(metric, hz);
      }
      console.log(`${TAG} ✓ telemetry rates set to ${rateHz} Hz`);
    } catch (err) {
      console.warn(`${TAG} ⚠ could not set telemetry rates: ${errorMessage(err)}`);
      console.warn(`${TAG}   (fine for SITL, but real hardware may only stream at its default rate)`);
    }
  }

  private async runProducers(store: TelemetryStorePort): Promise<void> {
    this.currentPhase = 'streaming';
    console.log(`${TAG} ✓ streaming telemetry`);

    const producers = [
      this.produce('position', this.source.position(), (s) => store.patch({ position: toPosition(s) })),
      this.produce('attitude', this.source.attitudeEuler(), (s) => store.patch({ attitude: toAttitude(s) })),
      this.produce('battery', this.source.battery(), (s) => store.patch({ battery: toBattery(s) })),
    ];

    try {
      await Promise.all(producers);
    } catch (err) {
      if (this.isStopped() || !(err instanceof StreamFaultError)) throw err;

      this.currentPhase = 'faulted';
      store.patch({ connected: false, fault: err.message });
      console.error(`${TAG} ✗ ${err.message}; ingestion stopped, not retrying`);
      await this.source.close();
      await Promise.allSettled(producers);
      throw err;
    }

    if (this.currentPhase === 'streaming') {
      this.currentPhase = 'faulted';
      store.patch({ connected: false, fault: 'telemetry streams ended' });
      console.error(`${TAG} ✗ telemetry streams ended; ingestion stopped, not retrying`);
    }
  }

  private async produce<T>(
    stream: TelemetryStreamName,
    samples: AsyncIterable<T>,
    apply: (sample: T) => void,
  ): Promise<void> {
    try {
      for await (const sample of samples) {
        if (this.currentPhase !== 'streaming') return;
        apply(sample);
      }
    } catch (err) {
      throw new StreamFaultError(stream, err);
    }
  }
}
