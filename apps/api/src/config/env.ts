import { z } from 'zod';
import type { IngestionBackend } from '@telemetry-relay/domain';

const envSchema = z.object({
  TELEMETRY_BACKEND: z.enum(['mavsdk', 'socket']).default('mavsdk'),
  SOURCE_ADDRESS: z.string().min(1).default('udpin://0.0.0.0:14551'),
  MAVSDK_SERVER_URL: z.string().min(1).default('127.0.0.1:50051'),
  MAVSDK_SERVER_BIN: z.string().min(1).optional(),
  SOCKET_PATH: z.string().min(1).default('/tmp/telemetry-relay.sock'),
  SOCKET_RECONNECT_MS: z.coerce.number().int().positive().default(2_000),
  SOCKET_READ_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  CONNECT_TIMEOUT_S: z.coerce.number().positive().default(30),
  SETTLE_MS: z.coerce.number().int().min(0).default(2_000),
  TELEMETRY_RATE_HZ: z.coerce.number().positive().default(2),
  STREAM_RATE_HZ: z.coerce.number().positive().max(1_000).default(10),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(5_000),
  CORS_ORIGIN: z.string().min(1).default('*'),
});

export interface AppConfig {
  readonly backend: IngestionBackend;
  readonly sourceAddress: string;
  readonly mavsdkServerUrl: string;
  readonly mavsdkServerBin?: string;
  readonly socketPath: string;
  readonly socketReconnectMs: number;
  readonly socketReadTimeoutMs: number;
  readonly connectTimeoutMs: number;
  readonly settleMs: number;
  readonly telemetryRateHz: number;
  readonly streamRateHz: number;
  readonly host: string;
  readonly port: number;
  readonly corsOrigin: string;
}

/**
 * Reads the process environment (after dotenv) into a typed config.
 * Throws a ZodError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = envSchema.parse(env);
  return Object.freeze({
    backend: e.TELEMETRY_BACKEND,
    sourceAddress: e.SOURCE_ADDRESS,
    mavsdkServerUrl: e.MAVSDK_SERVER_URL,
    mavsdkServerBin: e.MAVSDK_SERVER_BIN,
    socketPath: e.SOCKET_PATH,
    socketReconnectMs: e.SOCKET_RECONNECT_MS,
    socketReadTimeoutMs: e.SOCKET_READ_TIMEOUT_MS,
    connectTimeoutMs: e.CONNECT_TIMEOUT_S * 1_000,
    settleMs: e.SETTLE_MS,
    telemetryRateHz: e.TELEMETRY_RATE_HZ,
    streamRateHz: e.STREAM_RATE_HZ,
    host: e.HOST,
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
  });
}
