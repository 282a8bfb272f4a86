import { errorMessage } from '../errors.js';
import { createLogger } from '../utils/log.js';
import { nextRunUtc, parseCron, type DealSchedule } from './cron.js';

const log = createLogger('scheduler');

export type ScheduledJob = {
  name: string;
  cron: string;
  run: () => Promise<unknown>;
};

/**
 * Timer-driven cron task for one job. A tick that lands while the previous run is still in
 * flight is skipped, so runs never overlap.
 */
class ScheduleTask {
  private timer: NodeJS.Timeout | null = null;
  private readonly schedule: DealSchedule;
  private stopped = true;
  private inFlight: Promise<void> | null = null;

  constructor(private readonly job: ScheduledJob) {
    this.schedule = parseCron(job.cron);
  }

  get name() {
    return this.job.name;
  }

  start() {
    this.stopped = false;
    this.reschedule();
  }

  /** Stop scheduling and wait for the in-flight run, if any. */
  async stop() {
    this.stopped = true;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    if (this.inFlight) await this.inFlight;
  }

  /** Run now unless a run is already in flight. Resolves once the run finishes. */
  tick(): Promise<void> {
    if (this.inFlight) {
      log.info('already_running, tick skipped', { job: this.job.name });
      return this.inFlight;
    }
    this.inFlight = this.job
      .run()
      .then(
        () => undefined,
        (e: unknown) => {
          log.error('job_failed', { job: this.job.name, error: errorMessage(e) });
        },
      )
      .finally(() => {
        this.inFlight = null;
      });
    return this.inFlight;
  }

  private reschedule() {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    if (this.stopped) return;

    const now = new Date();
    const next = nextRunUtc(this.schedule, now);
    const delay = Math.max(0, next.getTime() - now.getTime());
    log.debug('next_run', { job: this.job.name, at: next.toISOString() });
    this.timer = setTimeout(() => {
      void this.tick();
      this.reschedule();
    }, delay);
  }
}

export type ScheduleRuntime = {
  /** Run one job immediately, honouring the overlap guard. */
  trigger(name: string): Promise<void>;
  stop(): Promise<void>;
};

export function startScheduleRuntime(jobs: ScheduledJob[]): ScheduleRuntime {
  const tasks = new Map<string, ScheduleTask>();
  for (const job of jobs) {
    const t = new ScheduleTask(job);
    tasks.set(job.name, t);
    t.start();
    log.info('registered', { job: job.name, cron: job.cron, timezone: 'UTC' });
  }

  return {
    async trigger(name) {
      const t = tasks.get(name);
      if (!t) throw new Error(`unknown_job:${name}`);
      await t.tick();
    },
    async stop() {
      await Promise.all([...tasks.values()].map((t) => t.stop()));
      tasks.clear();
      log.info('stopped');
    },
  };
}
