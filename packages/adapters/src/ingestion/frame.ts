import { z } from 'zod';
import type { TelemetryPatch } from '@telemetry-relay/domain';

/** Missing readings inside a present group are stored as null. */
const reading = z
  .number()
  .nullable()
  .optional()
  .transform((value) => value ?? null);

const positionSchema = z.object({
  latitude_deg: reading,
  longitude_deg: reading,
  absolute_altitude_m: reading,
  relative_altitude_m: reading,
});

const attitudeSchema = z.object({
  roll_deg: reading,
  pitch_deg: reading,
  yaw_deg: reading,
});

const batterySchema = z.object({
  voltage_v: reading,
  remaining_percent: reading,
});

const frameSchema = z.object({
  position: z.unknown(),
  attitude: z.unknown(),
  battery: z.unknown(),
});

function parseGroup<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T | undefined {
  if (typeof raw !== 'object' || raw === null || Object.keys(raw).length === 0) return undefined;
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Turns one decoded bridge frame into a group-level patch. Groups that are
 * absent, empty or malformed are left out; returns null when nothing is left.
 */
export function frameToPatch(frame: unknown): TelemetryPatch | null {
  const envelope = frameSchema.safeParse(frame);
  if (!envelope.success) return null;

  const patch: TelemetryPatch = {
    position: parseGroup(positionSchema, envelope.data.position),
    attitude: parseGroup(attitudeSchema, envelope.data.attitude),
    battery: parseGroup(batterySchema, envelope.data.battery),
  };

  const present = Object.values(patch).some((group) => group !== undefined);
  return present ? patch : null;
}
