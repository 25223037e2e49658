/**
 * HTTP surface tests: the Express app over a real in-memory store, driven by supertest.
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import request from 'supertest';
import { DeterministicClock, InMemoryTelemetryStore } from '@telemetry-relay/adapters';
import type { TelemetryQueryPort } from '@telemetry-relay/domain';
import { buildApp } from '../app.js';
import { SnapshotReaderService } from '../services/snapshot-reader.service.js';

const EPOCH = Date.UTC(2026, 0, 1, 12, 0, 0);

const POSITION = {
  latitude_deg: 47.3977419,
  longitude_deg: 8.5455938,
  absolute_altitude_m: 488.12,
  relative_altitude_m: 10.5,
};
const ATTITUDE = { roll_deg: 1.25, pitch_deg: -0.5, yaw_deg: 92.1 };
const BATTERY = { voltage_v: 12.34, remaining_percent: 0.8765 };

const EMPTY_GROUPS = {
  position: {
    latitude_deg: null,
    longitude_deg: null,
    absolute_altitude_m: null,
    relative_altitude_m: null,
  },
  attitude: { roll_deg: null, pitch_deg: null, yaw_deg: null },
  battery: { voltage_v: null, remaining_percent: null },
};

function setup() {
  const store = new InMemoryTelemetryStore(new DeterministicClock(EPOCH, 1_000).asClock());
  const reader = new SnapshotReaderService(store, {
    backend: 'socket',
    sourceAddress: '/tmp/test-bridge.sock',
    pushRateHz: 10,
  });
  return { store, app: buildApp({ reader }) };
}

describe('GET /telemetry', () => {
  it('returns null groups before any data arrives', async () => {
    const { app } = setup();
    const res = await request(app).get('/telemetry');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ...EMPTY_GROUPS, last_updated: null });
  });

  it('returns the latest groups and their timestamp', async () => {
    const { app, store } = setup();
    store.patch({ position: POSITION, attitude: ATTITUDE, battery: BATTERY });

    const res = await request(app).get('/telemetry');

    expect(res.body).toEqual({
      position: POSITION,
      attitude: ATTITUDE,
      battery: BATTERY,
      last_updated: '2026-01-01T12:00:00.000Z',
    });
  });

  it('serves each group on its own', async () => {
    const { app, store } = setup();
    store.patch({ position: POSITION, attitude: ATTITUDE, battery: BATTERY });

    const position = await request(app).get('/telemetry/position');
    const attitude = await request(app).get('/telemetry/attitude');
    const battery = await request(app).get('/telemetry/battery');

    expect(position.body).toEqual({ position: POSITION });
    expect(attitude.body).toEqual({ attitude: ATTITUDE });
    expect(battery.body).toEqual({ battery: BATTERY });
  });

  it('keeps a group from an earlier frame when a later frame omits it', async () => {
    const { app, store } = setup();
    store.patch({ position: POSITION, battery: BATTERY });
    store.patch({ position: { ...POSITION, relative_altitude_m: 12 } });

    const res = await request(app).get('/telemetry/battery');

    expect(res.body).toEqual({ battery: BATTERY });
  });
});

describe('GET /status', () => {
  it('merges live flags with the static backend config', async () => {
    const { app, store } = setup();
    store.patch({ connected: true, connecting: false, started_at: '2026-01-01T11:59:00.000Z' });

    const res = await request(app).get('/status');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      connected: true,
      connecting: false,
      started_at: '2026-01-01T11:59:00.000Z',
      last_updated: '2026-01-01T12:00:00.000Z',
      fault: null,
      backend: 'socket',
      source_address: '/tmp/test-bridge.sock',
      push_rate_hz: 10,
    });
  });

  it('reports an ingestion fault', async () => {
    const { app, store } = setup();
    store.patch({ connecting: false, fault: 'no heartbeat from udpin://0.0.0.0:14551 after 30s' });

    const res = await request(app).get('/status');

    expect(res.body.connected).toBe(false);
    expect(res.body.fault).toBe('no heartbeat from udpin://0.0.0.0:14551 after 30s');
  });
});

describe('ambient routes', () => {
  it('GET /healthz answers ok', async () => {
    const { app } = setup();
    const res = await request(app).get('/healthz');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
    expect(typeof res.body.ts).toBe('string');
  });

  it('GET /openapi.json describes every endpoint', async () => {
    const { app } = setup();
    const res = await request(app).get('/openapi.json');

    expect(res.body.openapi).toBe('3.0.3');
    expect(Object.keys(res.body.paths)).toEqual([
      '/telemetry',
      '/telemetry/position',
      '/telemetry/attitude',
      '/telemetry/battery',
      '/status',
      '/healthz',
    ]);
  });

  it('sends the configured CORS origin', async () => {
    const { app } = setup();
    const res = await request(app).get('/status').set('Origin', 'http://localhost:3000');

    expect(res.headers['access-control-allow-origin']).toBe('*');
  });

  it('does not parse request bodies on a read-only surface', async () => {
    const { app } = setup();
    const res = await request(app)
      .post('/status')
      .set('Content-Type', 'application/json')
      .send('{"subscribe": [');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'not_found' });
  });

  it('answers 404 for unknown routes', async () => {
    const { app } = setup();
    const res = await request(app).get('/telemetry/velocity');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'not_found' });
  });
});

describe('errorHandler', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function appWithFailingStatus(error: Error) {
    const reader: TelemetryQueryPort = {
      full: () => {
        throw error;
      },
      position: () => {
        throw error;
      },
      attitude: () => {
        throw error;
      },
      battery: () => {
        throw error;
      },
      status: () => {
        throw error;
      },
    };
    return buildApp({ reader });
  }

  it('hides unexpected failures behind a 500', async () => {
    const res = await request(appWithFailingStatus(new Error('store exploded'))).get('/status');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'internal_error' });
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('honours a status carried by the error', async () => {
    const teapot = Object.assign(new Error('short and stout'), { status: 418 });
    const res = await request(appWithFailingStatus(teapot)).get('/telemetry');

    expect(res.status).toBe(418);
    expect(res.body).toEqual({ error: 'short and stout' });
  });
});
