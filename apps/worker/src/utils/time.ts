export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;

/**
 * Time source for everything that waits or compares timestamps. Production uses the system
 * clock; tests inject a manual clock so waits resolve instantly.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((r) => setTimeout(r, Math.max(0, ms))),
};

/** Manual clock: `sleep` advances time instead of waiting. */
export function createManualClock(startMs = 0): Clock & { advance(ms: number): void; slept: number[] } {
  let t = startMs;
  const slept: number[] = [];
  return {
    slept,
    now: () => t,
    advance(ms) {
      t += ms;
    },
    async sleep(ms) {
      const d = Math.max(0, ms);
      slept.push(d);
      t += d;
    },
  };
}

export function hoursToMs(hours: number): number {
  return Math.round(hours * HOUR_MS);
}
