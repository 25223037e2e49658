import { describe, it, expect } from '@jest/globals';
import { formatFrame, formatStatus, parseFrameText } from '../format.js';

const FULL_FRAME = {
  position: {
    latitude_deg: 47.3977419,
    longitude_deg: 8.5455938,
    absolute_altitude_m: 488.12,
    relative_altitude_m: 10.5,
  },
  attitude: { roll_deg: 1.25, pitch_deg: -0.5, yaw_deg: 92.1 },
  battery: { voltage_v: 12.34, remaining_percent: 0.8734 },
  last_updated: '2026-01-01T12:00:00.000Z',
};

describe('formatFrame', () => {
  it('prints a header and one line per group', () => {
    expect(formatFrame(3, FULL_FRAME)).toEqual([
      '[#3  2026-01-01T12:00:00.000Z]',
      '  POS  lat=47.3977419  lon=8.5455938  alt=10.5m',
      '  ATT  roll=1.25°  pitch=-0.5°  yaw=92.1°',
      '  BAT  87.3%  12.34V',
    ]);
  });

  it('prints only the groups present in the frame', () => {
    expect(formatFrame(1, { battery: FULL_FRAME.battery, last_updated: FULL_FRAME.last_updated })).toEqual([
      '[#1  2026-01-01T12:00:00.000Z]',
      '  BAT  87.3%  12.34V',
    ]);
  });

  it('shows a dash for readings that are not known yet', () => {
    const frame = {
      position: {
        latitude_deg: null,
        longitude_deg: null,
        absolute_altitude_m: null,
        relative_altitude_m: null,
      },
      battery: { voltage_v: null, remaining_percent: null },
      last_updated: null,
    };

    expect(formatFrame(1, frame)).toEqual([
      '[#1  —]',
      '  POS  lat=—  lon=—  alt=—',
      '  BAT  —  —',
    ]);
  });

  it('flags a frame it cannot read', () => {
    expect(formatFrame(2, parseFrameText('not json'))).toEqual(['[#2  —]', '  (unrecognised frame)']);
  });
});

describe('formatStatus', () => {
  it('summarises the backend and link state', () => {
    const status = {
      connected: true,
      connecting: false,
      started_at: '2026-01-01T11:59:00.000Z',
      last_updated: '2026-01-01T12:00:00.000Z',
      fault: null,
      backend: 'socket',
      source_address: '/tmp/test-bridge.sock',
      push_rate_hz: 10,
    };

    expect(formatStatus(status)).toBe('  socket @ /tmp/test-bridge.sock  connected  10 Hz');
  });

  it('includes an ingestion fault', () => {
    const status = {
      connected: false,
      backend: 'mavsdk',
      source_address: 'udpin://0.0.0.0:14551',
      push_rate_hz: 10,
      fault: 'no heartbeat from udpin://0.0.0.0:14551 after 30s',
    };

    expect(formatStatus(status)).toBe(
      '  mavsdk @ udpin://0.0.0.0:14551  not connected  10 Hz  fault="no heartbeat from udpin://0.0.0.0:14551 after 30s"',
    );
  });

  it('returns null for anything else', () => {
    expect(formatStatus({ error: 'not_found' })).toBeNull();
  });
});
