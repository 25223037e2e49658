import 'dotenv/config';
import { InMemoryTelemetryStore } from '@telemetry-relay/adapters';
import { buildApp, buildHttpServer } from './app.js';
import { loadConfig } from './config/env.js';
import { createIngestionAdapter } from './config/ingestion.js';
import { SnapshotReaderService } from './services/snapshot-reader.service.js';

async function main() {
  const config = loadConfig();
  const store = new InMemoryTelemetryStore();
  const adapter = createIngestionAdapter(config);

  const reader = new SnapshotReaderService(store, {
    backend: adapter.backend,
    sourceAddress: adapter.sourceAddress,
    pushRateHz: config.streamRateHz,
  });

  const app = buildApp({ reader, corsOrigin: config.corsOrigin });
  const { httpServer, wsGateway } = buildHttpServer(app, {
    store,
    streamRateHz: config.streamRateHz,
  });

  console.log(`[server] ingestion backend: ${adapter.backend} (${adapter.sourceAddress})`);

  // Ingestion failures are reported through /status; the HTTP surface keeps serving.
  adapter.start(store).catch((err: unknown) => {
    console.error('[server] ingestion stopped', err);
  });

  httpServer.listen(config.port, config.host, () => {
    console.log(`[server] listening on http://${config.host}:${config.port}`);
    console.log(`[server] stream at ws://${config.host}:${config.port}/telemetry/stream (${config.streamRateHz} Hz)`);
  });

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('[server] shutting down...');
    try {
      await adapter.stop();
      await wsGateway.close();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
      });
      process.exit(0);
    } catch (err) {
      console.error('[server] unclean shutdown', err);
      process.exit(1);
    }
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
