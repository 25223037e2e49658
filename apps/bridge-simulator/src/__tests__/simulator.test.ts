import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InMemoryTelemetryStore, SocketLineIngestionAdapter } from '@telemetry-relay/adapters';
import { BridgeSimulator } from '../simulator.js';

async function waitFor(predicate: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

describe('BridgeSimulator', () => {
  let dir: string;
  let simulator: BridgeSimulator;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    dir = mkdtempSync(join(tmpdir(), 'bridge-sim-'));
    simulator = new BridgeSimulator({
      socketPath: join(dir, 'bridge.sock'),
      intervalMs: 10,
      seed: 42,
      omitBatteryEvery: 2,
      startLat: 47.3977,
      startLon: 8.5456,
      homeAltitudeM: 488,
    });
    await simulator.listen();
  });

  afterEach(async () => {
    await simulator.close();
    rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it('feeds the socket ingestion adapter', async () => {
    const store = new InMemoryTelemetryStore();
    const adapter = new SocketLineIngestionAdapter({
      socketPath: join(dir, 'bridge.sock'),
      reconnectMs: 20,
      readTimeoutMs: 1_000,
    });
    const run = adapter.start(store);

    await waitFor(() => store.get('battery').battery.remaining_percent !== null);
    const state = store.get();

    expect(state.connected).toBe(true);
    expect(state.position.latitude_deg).toBeCloseTo(47.3977, 2);
    expect(state.battery.remaining_percent).toBeGreaterThan(0.99);
    expect(simulator.clientCount).toBe(1);

    await adapter.stop();
    await run;
    await waitFor(() => simulator.clientCount === 0);
  });

  it('replaces a stale socket file when it starts again', async () => {
    await simulator.close();
    writeFileSync(join(dir, 'bridge.sock'), 'left over');

    await expect(simulator.listen()).resolves.toBeUndefined();
  });
});
