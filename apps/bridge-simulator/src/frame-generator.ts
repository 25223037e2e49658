import { roundTo, type SeededRng } from '@telemetry-relay/adapters';
import type { Attitude, Battery, Position } from '@telemetry-relay/domain';

/** One line written to the bridge socket. `battery` is absent on some frames. */
export interface BridgeFrame {
  position: Position;
  attitude: Attitude;
  battery?: Battery;
}

export interface FrameGeneratorOptions {
  startLat: number;
  startLon: number;
  homeAltitudeM: number;
  /** Every Nth frame leaves out `battery`; 0 never does. */
  omitBatteryEvery: number;
}

const METERS_PER_DEG_LAT = 111_320;
const MAX_RELATIVE_ALT_M = 120;
const DRAIN_PER_FRAME = 0.0005;
const EMPTY_VOLTAGE_V = 10.5;
const FULL_VOLTAGE_V = 12.6;

const toRad = (deg: number) => (deg * Math.PI) / 180;

/**
 * Random walk of a small vehicle: heading drifts a few degrees per frame,
 * altitude wanders under a ceiling and the battery drains linearly.
 */
export class FrameGenerator {
  private lat: number;
  private lon: number;
  private relativeAltM = 0;
  private yawDeg: number;
  private remaining = 1;
  private count = 0;

  constructor(
    private readonly rng: SeededRng,
    private readonly options: FrameGeneratorOptions,
  ) {
    this.lat = options.startLat;
    this.lon = options.startLon;
    this.yawDeg = rng.nextFloat(0, 360);
  }

  get framesGenerated(): number {
    return this.count;
  }

  next(): BridgeFrame {
    this.count += 1;
    const rng = this.rng;

    this.yawDeg = (this.yawDeg + rng.nextFloat(-5, 5) + 360) % 360;
    const stepM = rng.nextFloat(0, 3);
    this.lat += (stepM * Math.cos(toRad(this.yawDeg))) / METERS_PER_DEG_LAT;
    this.lon += (stepM * Math.sin(toRad(this.yawDeg))) / (METERS_PER_DEG_LAT * Math.cos(toRad(this.lat)));
    this.relativeAltM = Math.min(MAX_RELATIVE_ALT_M, Math.max(0, this.relativeAltM + rng.nextFloat(-0.5, 0.8)));
    this.remaining = Math.max(0, this.remaining - DRAIN_PER_FRAME);

    const frame: BridgeFrame = {
      position: {
        latitude_deg: roundTo(this.lat, 7),
        longitude_deg: roundTo(this.lon, 7),
        absolute_altitude_m: roundTo(this.options.homeAltitudeM + this.relativeAltM, 2),
        relative_altitude_m: roundTo(this.relativeAltM, 2),
      },
      attitude: {
        roll_deg: roundTo(rng.nextFloat(-10, 10), 2),
        pitch_deg: roundTo(rng.nextFloat(-10, 10), 2),
        yaw_deg: roundTo(this.yawDeg, 2),
      },
    };

    const every = this.options.omitBatteryEvery;
    if (every > 0 && this.count % every === 0) return frame;

    return {
      ...frame,
      battery: {
        voltage_v: roundTo(EMPTY_VOLTAGE_V + (FULL_VOLTAGE_V - EMPTY_VOLTAGE_V) * this.remaining, 2),
        remaining_percent: roundTo(this.remaining, 4),
      },
    };
  }
}
