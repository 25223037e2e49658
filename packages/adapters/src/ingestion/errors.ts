import type { RateMetric } from '@telemetry-relay/domain';

/** No "connected" heartbeat from the source within the configured window. */
export class ConnectTimeoutError extends Error {
  constructor(
    readonly address: string,
    readonly timeoutMs: number,
  ) {
    super(`no heartbeat from ${address} after ${timeoutMs / 1000}s`);
    this.name = 'ConnectTimeoutError';
  }
}

/** The source refused or failed a per-metric update rate request. */
export class RateNegotiationError extends Error {
  constructor(
    readonly metric: RateMetric,
    reason: string,
  ) {
    super(`set_rate_${metric} failed: ${reason}`);
    this.name = 'RateNegotiationError';
  }
}

export type TelemetryStreamName = 'position' | 'attitude' | 'battery';

/** A producer loop died after the source had connected. Never retried. */
export class StreamFaultError extends Error {
  constructor(
    readonly stream: TelemetryStreamName,
    cause: unknown,
  ) {
    super(`${stream} stream failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'StreamFaultError';
  }
}
