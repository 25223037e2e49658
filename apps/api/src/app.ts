import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';
import type { TelemetryQueryPort, TelemetryReaderPort } from '@telemetry-relay/domain';

import { createTelemetryRouter } from './controllers/telemetry.controller.js';
import { createStatusRouter } from './controllers/status.controller.js';
import { createDocsRouter } from './controllers/docs.controller.js';
import { WsGateway } from './ws/ws-gateway.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';

export const SERVICE_VERSION = '1.0.0';

export interface AppDeps {
  reader: TelemetryQueryPort;
  corsOrigin?: string;
}

export interface StreamDeps {
  store: TelemetryReaderPort;
  streamRateHz: number;
}

export function buildApp({ reader, corsOrigin = '*' }: AppDeps): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: corsOrigin }));
  if (process.env['NODE_ENV'] !== 'test') app.use(morgan('combined'));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/telemetry', createTelemetryRouter(reader));
  app.use('/status', createStatusRouter(reader));
  app.use(createDocsRouter(SERVICE_VERSION));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  // ─── Fallthrough and error handler (must be last) ───────────────────────────
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: ReturnType<typeof express>, { store, streamRateHz }: StreamDeps) {
  const httpServer = createServer(app);
  const wsGateway = new WsGateway(httpServer, { store, intervalMs: 1000 / streamRateHz });
  return { httpServer, wsGateway };
}
