import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { Server } from 'http';
import type { TelemetryReaderPort } from '@telemetry-relay/domain';
import { DistributionSession, type SessionChannel } from './distribution-session.js';

export const STREAM_PATH = '/telemetry/stream';

export interface WsGatewayOptions {
  store: TelemetryReaderPort;
  /** Push period per session, i.e. 1000 / STREAM_RATE_HZ */
  intervalMs: number;
  path?: string;
}

function rawDataToText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

class WsSessionChannel implements SessionChannel {
  constructor(private readonly ws: WebSocket) {}

  send(text: string): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error('socket is not open'));
    }
    return new Promise((resolve, reject) => {
      this.ws.send(text, (err) => (err ? reject(err) : resolve()));
    });
  }
}

/** Accepts streaming clients and runs one {@link DistributionSession} per connection. */
export class WsGateway {
  private readonly wss: WebSocketServer;
  private readonly sessions = new Set<DistributionSession>();
  private closing: Promise<void> | null = null;

  constructor(
    server: Server,
    private readonly options: WsGatewayOptions,
  ) {
    const path = options.path ?? STREAM_PATH;
    this.wss = new WebSocketServer({ server, path });
    this.wss.on('connection', (ws) => this.handleConnection(ws));
    console.log(`[ws-gateway] listening on ${path}`);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /** Stops every session and closes the server; the HTTP server is left to the caller. */
  close(): Promise<void> {
    if (this.closing) return this.closing;
    for (const session of this.sessions) session.stop();
    for (const client of this.wss.clients) client.terminate();
    this.closing = new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
    return this.closing;
  }

  private handleConnection(ws: WebSocket): void {
    const session = new DistributionSession(
      this.options.store,
      new WsSessionChannel(ws),
      this.options.intervalMs,
    );
    this.sessions.add(session);
    console.log(`[ws-gateway] client connected (${this.sessions.size} active)`);

    ws.on('message', (data, isBinary) => {
      if (!isBinary) session.receive(rawDataToText(data));
    });
    ws.on('close', () => session.stop());
    ws.on('error', (err) => {
      console.warn('[ws-gateway] client error', err.message);
      session.stop();
    });

    session
      .run()
      .catch((err: unknown) => {
        console.error('[ws-gateway] session crashed', err);
      })
      .finally(() => {
        this.sessions.delete(session);
        if (ws.readyState === WebSocket.OPEN) ws.terminate();
        const reason = session.failure ? ` (${session.failure})` : '';
        console.log(`[ws-gateway] client disconnected${reason} (${this.sessions.size} active)`);
      });
  }
}
