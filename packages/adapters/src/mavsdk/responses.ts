import { z } from 'zod';
import type {
  AttitudeSample,
  BatterySample,
  ConnectionStateSample,
  PositionSample,
  RateMetric,
} from '@telemetry-relay/domain';

// MAVSDK reports unknown readings as NaN
const measurement = z.union([z.number(), z.nan()]);

export const connectionStateResponse = z
  .object({
    connection_state: z.object({ is_connected: z.boolean() }).nullable(),
  })
  .transform((r): ConnectionStateSample => ({
    isConnected: r.connection_state?.is_connected ?? false,
  }));

export const positionResponse = z
  .object({
    position: z.object({
      latitude_deg: measurement,
      longitude_deg: measurement,
      absolute_altitude_m: measurement,
      relative_altitude_m: measurement,
    }),
  })
  .transform(({ position: p }): PositionSample => ({
    latitudeDeg: p.latitude_deg,
    longitudeDeg: p.longitude_deg,
    absoluteAltitudeM: p.absolute_altitude_m,
    relativeAltitudeM: p.relative_altitude_m,
  }));

export const attitudeEulerResponse = z
  .object({
    attitude_euler: z.object({
      roll_deg: measurement,
      pitch_deg: measurement,
      yaw_deg: measurement,
    }),
  })
  .transform(({ attitude_euler: a }): AttitudeSample => ({
    rollDeg: a.roll_deg,
    pitchDeg: a.pitch_deg,
    yawDeg: a.yaw_deg,
  }));

export const batteryResponse = z
  .object({
    battery: z.object({
      voltage_v: measurement,
      remaining_percent: measurement,
    }),
  })
  .transform(({ battery: b }): BatterySample => ({
    voltageV: b.voltage_v,
    remainingPercent: b.remaining_percent,
  }));

export const setRateResponse = z.object({
  telemetry_result: z
    .object({
      result: z.string(),
      result_str: z.string().default(''),
    })
    .nullable(),
});

export const RATE_SUCCESS = 'RESULT_SUCCESS';

/** TelemetryService rpc name per negotiable metric. */
export const SET_RATE_RPC: Record<RateMetric, string> = {
  position: 'SetRatePosition',
  battery: 'SetRateBattery',
  attitude_euler: 'SetRateAttitudeEuler',
  velocity_ned: 'SetRateVelocityNed',
  gps_info: 'SetRateGpsInfo',
  home: 'SetRateHome',
  in_air: 'SetRateInAir',
  landed_state: 'SetRateLandedState',
};
