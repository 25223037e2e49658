import { describe, it, expect } from '@jest/globals';
import { ZodError } from 'zod';
import { SocketLineIngestionAdapter, StreamIngestionAdapter } from '@telemetry-relay/adapters';
import { loadConfig } from '../config/env.js';
import { createIngestionAdapter } from '../config/ingestion.js';

describe('loadConfig', () => {
  it('falls back to the documented defaults', () => {
    expect(loadConfig({})).toEqual({
      backend: 'mavsdk',
      sourceAddress: 'udpin://0.0.0.0:14551',
      mavsdkServerUrl: '127.0.0.1:50051',
      mavsdkServerBin: undefined,
      socketPath: '/tmp/telemetry-relay.sock',
      socketReconnectMs: 2_000,
      socketReadTimeoutMs: 5_000,
      connectTimeoutMs: 30_000,
      settleMs: 2_000,
      telemetryRateHz: 2,
      streamRateHz: 10,
      host: '0.0.0.0',
      port: 5_000,
      corsOrigin: '*',
    });
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({ PORT: '8080', CONNECT_TIMEOUT_S: '5', STREAM_RATE_HZ: '20' });

    expect(config.port).toBe(8080);
    expect(config.connectTimeoutMs).toBe(5_000);
    expect(config.streamRateHz).toBe(20);
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  it.each([
    ['an unknown backend', { TELEMETRY_BACKEND: 'serial' }],
    ['a non-numeric port', { PORT: 'eighty' }],
    ['a zero push rate', { STREAM_RATE_HZ: '0' }],
    ['a negative settle time', { SETTLE_MS: '-1' }],
  ])('rejects %s', (_label, env) => {
    expect(() => loadConfig(env)).toThrow(ZodError);
  });
});

describe('createIngestionAdapter', () => {
  it('builds the socket adapter reading the configured path', () => {
    const adapter = createIngestionAdapter(
      loadConfig({ TELEMETRY_BACKEND: 'socket', SOCKET_PATH: '/tmp/test-bridge.sock' }),
    );

    expect(adapter).toBeInstanceOf(SocketLineIngestionAdapter);
    expect(adapter.backend).toBe('socket');
    expect(adapter.sourceAddress).toBe('/tmp/test-bridge.sock');
  });

  it('builds the stream adapter for the mavsdk backend', () => {
    const adapter = createIngestionAdapter(
      loadConfig({ SOURCE_ADDRESS: 'serial:///dev/ttyACM0:57600' }),
    );

    expect(adapter).toBeInstanceOf(StreamIngestionAdapter);
    expect(adapter.backend).toBe('mavsdk');
    expect(adapter.sourceAddress).toBe('serial:///dev/ttyACM0:57600');
  });
});
