import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';
import {
  SUBSCRIBE_ALL,
  TELEMETRY_GROUPS,
  isTelemetryGroup,
  type TelemetryGroup,
  type TelemetryReaderPort,
  type TelemetryState,
} from '@telemetry-relay/domain';

/** Outbound side of one streaming client. Rejects once the client is gone. */
export interface SessionChannel {
  send(text: string): Promise<void>;
}

export type SubscriptionFilter = typeof SUBSCRIBE_ALL | readonly TelemetryGroup[];

/** One pushed frame: the subscribed groups plus `last_updated`. */
export type StreamFrame = Partial<Pick<TelemetryState, TelemetryGroup>> &
  Pick<TelemetryState, 'last_updated'>;

const controlMessageSchema = z.object({ subscribe: z.array(z.unknown()) });

/**
 * Parses `{"subscribe": [...]}`. Returns null for anything that is not a
 * subscribe message, so the caller keeps its current filter.
 */
export function parseControlMessage(raw: string): SubscriptionFilter | null {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = controlMessageSchema.safeParse(payload);
  if (!parsed.success) return null;

  const names = parsed.data.subscribe;
  if (names.includes(SUBSCRIBE_ALL)) return SUBSCRIBE_ALL;
  return [...new Set(names.filter(isTelemetryGroup))];
}

/**
 * Pushes store snapshots to a single client at a fixed period. Control
 * messages queued since the previous tick are applied before each read.
 */
export class DistributionSession {
  private subscription: SubscriptionFilter = SUBSCRIBE_ALL;
  private readonly inbox: string[] = [];
  private readonly stopSignal = new AbortController();
  private frames = 0;
  private endReason: string | null = null;

  constructor(
    private readonly store: TelemetryReaderPort,
    private readonly channel: SessionChannel,
    private readonly intervalMs: number,
  ) {}

  get filter(): SubscriptionFilter {
    return this.subscription;
  }

  get framesSent(): number {
    return this.frames;
  }

  /** Why the session ended on its own, or null while running or after `stop()`. */
  get failure(): string | null {
    return this.endReason;
  }

  receive(message: string): void {
    this.inbox.push(message);
  }

  stop(): void {
    this.stopSignal.abort();
  }

  snapshot(): StreamFrame {
    const groups = this.subscription === SUBSCRIBE_ALL ? TELEMETRY_GROUPS : this.subscription;
    return this.store.get(...groups, 'last_updated');
  }

  /** One push cycle. Resolves false when the client could not be reached. */
  async tick(): Promise<boolean> {
    this.drainInbox();
    try {
      await this.channel.send(JSON.stringify(this.snapshot()));
    } catch (err) {
      this.endReason = err instanceof Error ? err.message : String(err);
      return false;
    }
    this.frames += 1;
    return true;
  }

  async run(): Promise<void> {
    const { signal } = this.stopSignal;

    while (!signal.aborted) {
      const startedAt = Date.now();
      if (!(await this.tick())) return;

      const wait = Math.max(0, this.intervalMs - (Date.now() - startedAt));
      try {
        await delay(wait, undefined, { signal });
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }
    }
  }

  private drainInbox(): void {
    for (const message of this.inbox.splice(0)) {
      const next = parseControlMessage(message);
      if (next !== null) this.subscription = next;
    }
  }
}
