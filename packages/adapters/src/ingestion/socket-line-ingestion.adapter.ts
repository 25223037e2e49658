import { createConnection, type Socket } from 'node:net';
import { setTimeout as delay } from 'node:timers/promises';
import type { IngestionAdapter, TelemetryStorePort } from '@telemetry-relay/domain';
import { wallClockNow, type Clock } from '../clock/deterministic-clock.js';
import { frameToPatch } from './frame.js';
import { consumeJsonLines } from './json-lines.js';

const TAG = '[ingest:socket]';

/** A bridge that never sends a newline is treated as broken. */
const MAX_PENDING_CHARS = 1024 * 1024;

export interface SocketLineIngestionOptions {
  socketPath: string;
  /** Fixed delay between a lost connection and the next attempt. */
  reconnectMs: number;
  /** Idle time after which an open connection counts as lost. */
  readTimeoutMs: number;
  clock?: Clock;
}

/**
 * Reads newline-delimited JSON frames from a local bridge socket and patches
 * the store per frame. Connection loss of any kind leads to a fixed backoff
 * and a fresh attempt; the loop only ends on `stop()`.
 */
export class SocketLineIngestionAdapter implements IngestionAdapter {
  readonly backend = 'socket';
  private readonly stopSignal = new AbortController();
  private readonly clock: Clock;
  private socket: Socket | null = null;
  private running = false;
  private connections = 0;

  constructor(private readonly options: SocketLineIngestionOptions) {
    this.clock = options.clock ?? wallClockNow;
  }

  get sourceAddress(): string {
    return this.options.socketPath;
  }

  /** Successful connections so far, including reconnects. */
  get connectionCount(): number {
    return this.connections;
  }

  async start(store: TelemetryStorePort): Promise<void> {
    if (this.running) throw new Error('socket adapter is already running');
    this.running = true;
    const { socketPath, reconnectMs } = this.options;
    console.log(`${TAG} reading from ${socketPath}`);

    try {
      while (!this.stopSignal.signal.aborted) {
        store.patch({ connecting: true, connected: false });

        let reason = 'socket closed';
        try {
          await this.readUntilLost(store);
        } catch (err) {
          reason = err instanceof Error ? err.message : String(err);
        }
        if (this.stopSignal.signal.aborted) break;

        console.warn(`${TAG} connection lost (${reason}), reconnecting in ${reconnectMs / 1000}s...`);
        store.patch({ connecting: false, connected: false });

        try {
          await delay(reconnectMs, undefined, { signal: this.stopSignal.signal });
        } catch (err) {
          if (this.stopSignal.signal.aborted) break;
          throw err;
        }
      }
    } finally {
      store.patch({ connecting: false, connected: false });
      this.running = false;
    }
  }

  async stop(): Promise<void> {
    this.stopSignal.abort();
    this.socket?.destroy();
  }

  /** One connection's lifetime: resolves on a clean close, rejects on error or timeout. */
  private readUntilLost(store: TelemetryStorePort): Promise<void> {
    const { socketPath, readTimeoutMs } = this.options;

    return new Promise((resolve, reject) => {
      const socket = createConnection({ path: socketPath });
      this.socket = socket;
      let pending = '';
      let failure: Error | null = null;

      socket.once('connect', () => {
        pending = '';
        this.connections += 1;
        socket.setTimeout(readTimeoutMs);
        store.patch({ connecting: false, connected: true, started_at: this.clock().toISOString() });
        console.log(`${TAG} connected to ${socketPath}`);
      });

      socket.on('data', (chunk: Buffer | string) => {
        const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
        const consumed = consumeJsonLines(pending + text);
        pending = consumed.remainder;

        for (const message of consumed.messages) {
          const patch = frameToPatch(message);
          if (patch) store.patch(patch);
        }

        if (pending.length > MAX_PENDING_CHARS) {
          socket.destroy(new Error(`unterminated frame longer than ${MAX_PENDING_CHARS} chars`));
        }
      });

      socket.on('timeout', () => {
        socket.destroy(new Error(`no data for ${readTimeoutMs / 1000}s`));
      });

      socket.on('error', (err) => {
        failure = err;
      });

      socket.on('close', () => {
        if (this.socket === socket) this.socket = null;
        if (failure) reject(failure);
        else resolve();
      });

      socket.setEncoding('utf8');
    });
  }
}
