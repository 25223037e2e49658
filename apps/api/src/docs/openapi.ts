// ─── Schema fragments ─────────────────────────────────────────────────────────

const nullableNumber = { type: 'number', nullable: true } as const;
const timestamp = { type: 'string', format: 'date-time', nullable: true } as const;

function objectOf(properties: Record<string, object>) {
  return { type: 'object', required: Object.keys(properties), properties };
}

function ref(name: string) {
  return { $ref: `#/components/schemas/${name}` };
}

function jsonResponse(description: string, schema: object) {
  return { description, content: { 'application/json': { schema } } };
}

const schemas = {
  Position: objectOf({
    latitude_deg: nullableNumber,
    longitude_deg: nullableNumber,
    absolute_altitude_m: nullableNumber,
    relative_altitude_m: nullableNumber,
  }),
  Attitude: objectOf({
    roll_deg: nullableNumber,
    pitch_deg: nullableNumber,
    yaw_deg: nullableNumber,
  }),
  Battery: objectOf({
    voltage_v: nullableNumber,
    remaining_percent: { ...nullableNumber, description: 'Fraction 0..1, not a percentage' },
  }),
  Telemetry: objectOf({
    position: ref('Position'),
    attitude: ref('Attitude'),
    battery: ref('Battery'),
    last_updated: timestamp,
  }),
  Status: objectOf({
    connected: { type: 'boolean' },
    connecting: { type: 'boolean' },
    started_at: timestamp,
    last_updated: timestamp,
    fault: { type: 'string', nullable: true },
    backend: { type: 'string', enum: ['mavsdk', 'socket'] },
    source_address: { type: 'string' },
    push_rate_hz: { type: 'number' },
  }),
};

// ─── Document ─────────────────────────────────────────────────────────────────

export function buildOpenApiDocument(version: string) {
  return {
    openapi: '3.0.3',
    info: {
      title: 'Telemetry Relay',
      version,
      description:
        'Latest-value vehicle telemetry over HTTP. Live frames are pushed over the ' +
        'WebSocket at /telemetry/stream; send {"subscribe": ["position"]} to filter ' +
        'and {"subscribe": ["all"]} to reset.',
    },
    paths: {
      '/telemetry': {
        get: { summary: 'Full snapshot', responses: { '200': jsonResponse('Snapshot', ref('Telemetry')) } },
      },
      '/telemetry/position': {
        get: {
          summary: 'Position only',
          responses: { '200': jsonResponse('Position', objectOf({ position: ref('Position') })) },
        },
      },
      '/telemetry/attitude': {
        get: {
          summary: 'Attitude only',
          responses: { '200': jsonResponse('Attitude', objectOf({ attitude: ref('Attitude') })) },
        },
      },
      '/telemetry/battery': {
        get: {
          summary: 'Battery only',
          responses: { '200': jsonResponse('Battery', objectOf({ battery: ref('Battery') })) },
        },
      },
      '/status': {
        get: { summary: 'Connection status', responses: { '200': jsonResponse('Status', ref('Status')) } },
      },
      '/healthz': {
        get: {
          summary: 'Liveness check',
          responses: { '200': jsonResponse('Alive', objectOf({ status: { type: 'string' }, ts: timestamp })) },
        },
      },
    },
    components: { schemas },
  };
}
