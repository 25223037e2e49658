/**
 * Port contract tests
 *
 * Ports have no runtime artifact; these minimal implementations fail to
 * compile if a port's shape changes.
 */

import { describe, it, expect } from '@jest/globals';
import { initialTelemetryState, type TelemetryPatch } from '../entities/telemetry-state.js';
import type { IngestionAdapter } from '../ports/inbound/ingestion-adapter.port.js';
import type { TelemetryStorePort } from '../ports/outbound/telemetry-store.port.js';

class PatchLog implements TelemetryStorePort {
  readonly patches: TelemetryPatch[] = [];
  private readonly state = initialTelemetryState();

  get() {
    return this.state;
  }

  patch(update: TelemetryPatch): void {
    this.patches.push(update);
  }
}

describe('IngestionAdapter', () => {
  it('reports its backend and source and writes through the store port', async () => {
    const adapter: IngestionAdapter = {
      backend: 'socket',
      sourceAddress: '/tmp/test-bridge.sock',
      start: async (store) => store.patch({ connecting: true }),
      stop: async () => undefined,
    };
    const store = new PatchLog();

    await adapter.start(store);
    await adapter.stop();

    expect(adapter.backend).toBe('socket');
    expect(store.patches).toEqual([{ connecting: true }]);
  });
});
