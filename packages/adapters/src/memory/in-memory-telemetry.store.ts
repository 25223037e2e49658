import {
  initialTelemetryState,
  type TelemetryKey,
  type TelemetryPatch,
  type TelemetryState,
  type TelemetryStorePort,
} from '@telemetry-relay/domain';
import { wallClockNow, type Clock } from '../clock/deterministic-clock.js';

type PartialSnapshot = { -readonly [P in TelemetryKey]?: TelemetryState[P] };

function copyKey<K extends TelemetryKey>(target: PartialSnapshot, source: TelemetryState, key: K): void {
  target[key] = structuredClone(source[key]);
}

/** Whole-group replace: an absent key keeps the current value. */
function replace<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : structuredClone(next);
}

/**
 * Process-wide latest-value store.
 *
 * `get` and `patch` are synchronous and never await, so on the event loop each
 * call is its own critical section: readers observe whole patches only.
 */
export class InMemoryTelemetryStore implements TelemetryStorePort {
  private state: TelemetryState = initialTelemetryState();

  constructor(private readonly clock: Clock = wallClockNow) {}

  get(): TelemetryState;
  get<K extends TelemetryKey>(...keys: K[]): Pick<TelemetryState, K>;
  get(...keys: TelemetryKey[]): Partial<TelemetryState> {
    if (keys.length === 0) return structuredClone(this.state);

    const out: PartialSnapshot = {};
    for (const key of keys) copyKey(out, this.state, key);
    return out;
  }

  patch(update: TelemetryPatch): void {
    const current = this.state;
    this.state = {
      connected: replace(update.connected, current.connected),
      connecting: replace(update.connecting, current.connecting),
      started_at: replace(update.started_at, current.started_at),
      fault: replace(update.fault, current.fault),
      position: replace(update.position, current.position),
      attitude: replace(update.attitude, current.attitude),
      battery: replace(update.battery, current.battery),
      last_updated: this.stamp(current.last_updated),
    };
  }

  /** Wall-clock stamp, held at the previous value if the clock steps back. */
  private stamp(previous: string | null): string {
    const now = this.clock().toISOString();
    return previous !== null && previous > now ? previous : now;
  }
}
