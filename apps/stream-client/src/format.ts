import { z } from 'zod';

const reading = z.number().nullable();

const frameSchema = z.object({
  last_updated: z.string().nullable().optional(),
  position: z
    .object({ latitude_deg: reading, longitude_deg: reading, relative_altitude_m: reading })
    .optional(),
  attitude: z.object({ roll_deg: reading, pitch_deg: reading, yaw_deg: reading }).optional(),
  battery: z.object({ voltage_v: reading, remaining_percent: reading }).optional(),
});

const statusSchema = z.object({
  connected: z.boolean(),
  backend: z.string(),
  source_address: z.string(),
  push_rate_hz: z.number(),
  fault: z.string().nullable().optional(),
});

const PLACEHOLDER = '—';

function show(value: number | null, unit = ''): string {
  return value === null ? PLACEHOLDER : `${value}${unit}`;
}

export function parseFrameText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/** Console lines for one pushed frame, header first. */
export function formatFrame(count: number, raw: unknown): string[] {
  const parsed = frameSchema.safeParse(raw);
  if (!parsed.success) return [`[#${count}  ${PLACEHOLDER}]`, '  (unrecognised frame)'];

  const { last_updated, position, attitude, battery } = parsed.data;
  const lines = [`[#${count}  ${last_updated ?? PLACEHOLDER}]`];

  if (position) {
    lines.push(
      `  POS  lat=${show(position.latitude_deg)}  lon=${show(position.longitude_deg)}  ` +
        `alt=${show(position.relative_altitude_m, 'm')}`,
    );
  }
  if (attitude) {
    lines.push(
      `  ATT  roll=${show(attitude.roll_deg, '°')}  pitch=${show(attitude.pitch_deg, '°')}  ` +
        `yaw=${show(attitude.yaw_deg, '°')}`,
    );
  }
  if (battery) {
    const pct =
      battery.remaining_percent === null ? PLACEHOLDER : `${(battery.remaining_percent * 100).toFixed(1)}%`;
    lines.push(`  BAT  ${pct}  ${show(battery.voltage_v, 'V')}`);
  }
  return lines;
}

/** One-line summary of GET /status, or null if the body is not a status. */
export function formatStatus(raw: unknown): string | null {
  const parsed = statusSchema.safeParse(raw);
  if (!parsed.success) return null;

  const s = parsed.data;
  const link = s.connected ? 'connected' : 'not connected';
  const fault = s.fault ? `  fault="${s.fault}"` : '';
  return `  ${s.backend} @ ${s.source_address}  ${link}  ${s.push_rate_hz} Hz${fault}`;
}
