// ---------------------------------------------------------------------------
// Samples pushed by a live telemetry source (units as reported by the source)
// ---------------------------------------------------------------------------

export interface ConnectionStateSample {
  isConnected: boolean;
}

export interface PositionSample {
  latitudeDeg: number;
  longitudeDeg: number;
  absoluteAltitudeM: number;
  relativeAltitudeM: number;
}

export interface AttitudeSample {
  rollDeg: number;
  pitchDeg: number;
  yawDeg: number;
}

export interface BatterySample {
  voltageV: number;
  /** 0..1 fraction */
  remainingPercent: number;
}

export type RateMetric =
  | 'position'
  | 'battery'
  | 'attitude_euler'
  | 'velocity_ned'
  | 'gps_info'
  | 'home'
  | 'in_air'
  | 'landed_state';

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

/**
 * Push-style telemetry source (flight controller SDK, bridge, simulator).
 * Every stream is independent and may be consumed concurrently.
 */
export interface TelemetrySourcePort {
  connect(address: string): Promise<void>;
  connectionState(): AsyncIterable<ConnectionStateSample>;
  /** Best effort; rejects if the source refuses the rate. */
  setRate(metric: RateMetric, rateHz: number): Promise<void>;
  position(): AsyncIterable<PositionSample>;
  attitudeEuler(): AsyncIterable<AttitudeSample>;
  battery(): AsyncIterable<BatterySample>;
  /** Ends every open stream and releases the connection. */
  close(): Promise<void>;
}
