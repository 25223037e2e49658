/**
 * Ingestion adapter factory
 * Select the backend via TELEMETRY_BACKEND: mavsdk (default) | socket
 */

import {
  MavsdkGrpcSource,
  SocketLineIngestionAdapter,
  StreamIngestionAdapter,
} from '@telemetry-relay/adapters';
import type { IngestionAdapter } from '@telemetry-relay/domain';
import type { AppConfig } from './env.js';

export function createIngestionAdapter(config: AppConfig): IngestionAdapter {
  switch (config.backend) {
    case 'socket':
      return new SocketLineIngestionAdapter({
        socketPath: config.socketPath,
        reconnectMs: config.socketReconnectMs,
        readTimeoutMs: config.socketReadTimeoutMs,
      });

    case 'mavsdk':
    default:
      return new StreamIngestionAdapter(
        new MavsdkGrpcSource({
          serverUrl: config.mavsdkServerUrl,
          serverBin: config.mavsdkServerBin,
        }),
        {
          address: config.sourceAddress,
          connectTimeoutMs: config.connectTimeoutMs,
          telemetryRateHz: config.telemetryRateHz,
          settleMs: config.settleMs,
        },
      );
  }
}
