import 'dotenv/config';
import { rm } from 'node:fs/promises';
import { createServer, type Server, type Socket } from 'node:net';
import { SeededRng } from '@telemetry-relay/adapters';
import { FrameGenerator, type FrameGeneratorOptions } from './frame-generator.js';

/**
 * Bridge simulator: stands in for the process that owns the vehicle link and
 * writes NDJSON telemetry frames to a local socket.
 *
 * Env vars:
 *   SOCKET_PATH         Socket to listen on (default: /tmp/telemetry-relay.sock)
 *   EMIT_INTERVAL_MS    Frame interval per client in ms (default: 200)
 *   SIM_SEED            Seed for the random walk (default: 42)
 *   OMIT_BATTERY_EVERY  Leave battery out of every Nth frame, 0 = never (default: 5)
 *   START_LAT / START_LON / HOME_ALT_M  Starting point (default: 47.3977, 8.5456, 488)
 */

export interface BridgeSimulatorOptions extends FrameGeneratorOptions {
  socketPath: string;
  intervalMs: number;
  seed: number;
}

export class BridgeSimulator {
  private server: Server | null = null;
  private readonly clients = new Map<Socket, NodeJS.Timeout>();

  constructor(private readonly options: BridgeSimulatorOptions) {}

  get clientCount(): number {
    return this.clients.size;
  }

  async listen(): Promise<void> {
    const { socketPath } = this.options;
    // A previous run may have left its socket file behind.
    await rm(socketPath, { force: true });

    const server = createServer((socket) => this.serve(socket));
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(socketPath, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', (err) => console.error('[bridge-sim] server error', err));
    this.server = server;
    console.log(`[bridge-sim] listening on ${socketPath}`);
  }

  async close(): Promise<void> {
    for (const [socket, timer] of this.clients) {
      clearInterval(timer);
      socket.destroy();
    }
    this.clients.clear();

    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  }

  private serve(socket: Socket): void {
    // Each client gets its own walk so a reconnect starts from the same seed.
    const generator = new FrameGenerator(new SeededRng(this.options.seed), this.options);
    console.log('[bridge-sim] client connected');

    const timer = setInterval(() => {
      socket.write(`${JSON.stringify(generator.next())}\n`);
    }, this.options.intervalMs);
    this.clients.set(socket, timer);

    socket.on('error', (err) => console.warn('[bridge-sim] client error', err.message));
    socket.on('close', () => {
      clearInterval(timer);
      this.clients.delete(socket);
      console.log(`[bridge-sim] client disconnected after ${generator.framesGenerated} frames`);
    });
  }
}

function optionsFromEnv(env: NodeJS.ProcessEnv): BridgeSimulatorOptions {
  return {
    socketPath: env['SOCKET_PATH'] ?? '/tmp/telemetry-relay.sock',
    intervalMs: parseInt(env['EMIT_INTERVAL_MS'] ?? '200', 10),
    seed: parseInt(env['SIM_SEED'] ?? '42', 10),
    omitBatteryEvery: parseInt(env['OMIT_BATTERY_EVERY'] ?? '5', 10),
    startLat: parseFloat(env['START_LAT'] ?? '47.3977'),
    startLon: parseFloat(env['START_LON'] ?? '8.5456'),
    homeAltitudeM: parseFloat(env['HOME_ALT_M'] ?? '488'),
  };
}

async function main() {
  const simulator = new BridgeSimulator(optionsFromEnv(process.env));
  await simulator.listen();

  const shutdown = async () => {
    console.log('[bridge-sim] shutting down...');
    await simulator.close();
    process.exit(0);
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

if (require.main === module) {
  main().catch((err) => {
    console.error('[bridge-sim] fatal startup error', err);
    process.exit(1);
  });
}
