import { Mutex } from '../utils/mutex.js';
import { HOUR_MS, systemClock, type Clock } from '../utils/time.js';

export type GovernorConfig = {
  maxPerHour: number;
  minIntervalMs: number;
};

export type PublishGate =
  | { ok: true }
  | { ok: false; reason: 'hourly_cap' | 'spacing'; retryAfterMs: number };

export type PublishSlotResult<T> =
  | { status: 'published'; value: T }
  | { status: 'blocked'; gate: Extract<PublishGate, { ok: false }> }
  | { status: 'failed'; error: unknown };

export type PublishBudgetState = {
  periodStartedAt: Date | null;
  publishesInLastHour: number;
  lastPublishAt: Date | null;
};

/**
 * Outbound publish budget: an hourly cap over publishes since the last period reset, plus a
 * minimum spacing between consecutive publishes. A slot is only consumed by a confirmed publish.
 */
export class PublishGovernor {
  private readonly lock = new Mutex();
  private readonly clock: Clock;
  private timestamps: number[] = [];
  private lastPublishAt: number | null = null;
  private periodStartedAt: number | null = null;

  constructor(
    readonly config: GovernorConfig,
    clock: Clock = systemClock,
  ) {
    this.clock = clock;
  }

  private prune(nowMs: number) {
    const floor = nowMs - HOUR_MS;
    this.timestamps = this.timestamps.filter((t) => t > floor);
  }

  canPublish(now: Date = new Date(this.clock.now())): PublishGate {
    const nowMs = now.getTime();
    this.prune(nowMs);

    if (this.timestamps.length >= this.config.maxPerHour) {
      const oldest = this.timestamps[0] ?? nowMs;
      return { ok: false, reason: 'hourly_cap', retryAfterMs: Math.max(0, oldest + HOUR_MS - nowMs) };
    }
    if (this.lastPublishAt != null) {
      const since = nowMs - this.lastPublishAt;
      if (since < this.config.minIntervalMs) {
        return { ok: false, reason: 'spacing', retryAfterMs: this.config.minIntervalMs - since };
      }
    }
    return { ok: true };
  }

  recordPublish(now: Date = new Date(this.clock.now())): void {
    const nowMs = now.getTime();
    this.timestamps.push(nowMs);
    this.lastPublishAt = nowMs;
  }

  /** Start a new budget period. Spacing still counts from the last publish. */
  resetPeriod(now: Date = new Date(this.clock.now())): void {
    this.timestamps = [];
    this.periodStartedAt = now.getTime();
  }

  /** Check, publish and record as one step; concurrent callers are serialised. */
  async withPublishSlot<T>(publish: () => Promise<T>): Promise<PublishSlotResult<T>> {
    return await this.lock.runExclusive(async (): Promise<PublishSlotResult<T>> => {
      const gate = this.canPublish(new Date(this.clock.now()));
      if (!gate.ok) return { status: 'blocked', gate };
      try {
        const value = await publish();
        this.recordPublish(new Date(this.clock.now()));
        return { status: 'published', value };
      } catch (error) {
        return { status: 'failed', error };
      }
    });
  }

  snapshot(): PublishBudgetState {
    this.prune(this.clock.now());
    return {
      periodStartedAt: this.periodStartedAt != null ? new Date(this.periodStartedAt) : null,
      publishesInLastHour: this.timestamps.length,
      lastPublishAt: this.lastPublishAt != null ? new Date(this.lastPublishAt) : null,
    };
  }
}
