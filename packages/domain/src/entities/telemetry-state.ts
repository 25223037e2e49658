/** ISO-8601 UTC timestamp, e.g. `2026-01-01T12:00:00.000Z` */
export type IsoTimestamp = string;

export interface Position {
  readonly latitude_deg: number | null;
  readonly longitude_deg: number | null;
  readonly absolute_altitude_m: number | null;
  readonly relative_altitude_m: number | null;
}

export interface Attitude {
  readonly roll_deg: number | null;
  readonly pitch_deg: number | null;
  readonly yaw_deg: number | null;
}

export interface Battery {
  readonly voltage_v: number | null;
  /** 0..1 fraction, not a percentage despite the name */
  readonly remaining_percent: number | null;
}

/** Latest-value snapshot shared by the ingestion adapter and every reader. */
export interface TelemetryState {
  readonly connected: boolean;
  readonly connecting: boolean;
  readonly started_at: IsoTimestamp | null;
  /** Terminal ingestion failure, if any. Cleared only by a process restart. */
  readonly fault: string | null;
  readonly position: Position;
  readonly attitude: Attitude;
  readonly battery: Battery;
  readonly last_updated: IsoTimestamp | null;
}

export type TelemetryKey = keyof TelemetryState;

/** Groups a client can subscribe to on the stream. */
export const TELEMETRY_GROUPS = ['position', 'attitude', 'battery'] as const;
export type TelemetryGroup = (typeof TELEMETRY_GROUPS)[number];

/** Sentinel accepted in a subscribe list to lift the filter. */
export const SUBSCRIBE_ALL = 'all';

/**
 * A write to the store. Each key present replaces that whole top-level group;
 * `last_updated` is owned by the store and cannot be patched.
 */
export type TelemetryPatch = Partial<Omit<TelemetryState, 'last_updated'>>;

export const EMPTY_POSITION: Position = {
  latitude_deg: null,
  longitude_deg: null,
  absolute_altitude_m: null,
  relative_altitude_m: null,
};

export const EMPTY_ATTITUDE: Attitude = {
  roll_deg: null,
  pitch_deg: null,
  yaw_deg: null,
};

export const EMPTY_BATTERY: Battery = {
  voltage_v: null,
  remaining_percent: null,
};

export function initialTelemetryState(): TelemetryState {
  return {
    connected: false,
    connecting: false,
    started_at: null,
    fault: null,
    position: { ...EMPTY_POSITION },
    attitude: { ...EMPTY_ATTITUDE },
    battery: { ...EMPTY_BATTERY },
    last_updated: null,
  };
}

export function isTelemetryGroup(value: unknown): value is TelemetryGroup {
  return typeof value === 'string' && TELEMETRY_GROUPS.some((group) => group === value);
}
