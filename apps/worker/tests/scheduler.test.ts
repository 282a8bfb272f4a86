import { describe, expect, it } from 'vitest';

import { nextRunUtc, parseCron } from '../src/scheduler/cron.js';
import { startScheduleRuntime } from '../src/scheduler/runtime.js';

describe('cron', () => {
  it('finds the next quarter hour', () => {
    const next = nextRunUtc(parseCron('*/15 * * * *'), new Date('2026-03-01T12:07:42.000Z'));
    expect(next.toISOString()).toBe('2026-03-01T12:15:00.000Z');
  });

  it('rolls the daily reset over to the next UTC midnight', () => {
    const next = nextRunUtc(parseCron('0 0 * * *'), new Date('2026-03-01T00:00:00.000Z'));
    expect(next.toISOString()).toBe('2026-03-02T00:00:00.000Z');
  });

  it('carries a minute step into the next hour', () => {
    const next = nextRunUtc(parseCron('*/7 * * * *'), new Date('2026-03-01T12:57:10.000Z'));
    expect(next.toISOString()).toBe('2026-03-01T13:00:00.000Z');
  });

  it('combines a fixed minute with an hour step', () => {
    const next = nextRunUtc(parseCron('30 */6 * * *'), new Date('2026-03-01T07:00:00.000Z'));
    expect(next.toISOString()).toBe('2026-03-01T12:30:00.000Z');
  });

  it.each([
    ['* * * *', 'cron_expected_5_fields'],
    ['*/0 * * * *', 'cron_minute_step_out_of_range'],
    ['61 * * * *', 'cron_minute_unsupported'],
    ['0,30 * * * *', 'cron_minute_unsupported'],
    ['0 24 * * *', 'cron_hour_unsupported'],
    ['0 0 1 * *', 'cron_calendar_fields_unsupported'],
  ])('rejects %s', (expr, code) => {
    expect(() => parseCron(expr)).toThrow(code);
  });
});

describe('schedule runtime', () => {
  it('skips a trigger while the previous run is in flight and drains on stop', async () => {
    let runs = 0;
    let finish: () => void = () => {};
    const runtime = startScheduleRuntime([
      {
        name: 'DEAL_CYCLE',
        cron: '*/15 * * * *',
        run: () => {
          runs += 1;
          return new Promise<void>((r) => {
            finish = r;
          });
        },
      },
    ]);

    const first = runtime.trigger('DEAL_CYCLE');
    const second = runtime.trigger('DEAL_CYCLE');
    expect(runs).toBe(1);

    let stopped = false;
    const stopping = runtime.stop().then(() => {
      stopped = true;
    });
    await Promise.resolve();
    expect(stopped).toBe(false);

    finish();
    await Promise.all([first, second, stopping]);
    expect(stopped).toBe(true);
    expect(runs).toBe(1);
  });

  it('keeps scheduling after a failed run', async () => {
    let runs = 0;
    const runtime = startScheduleRuntime([
      {
        name: 'FLAKY',
        cron: '0 0 * * *',
        run: async () => {
          runs += 1;
          throw new Error('boom');
        },
      },
    ]);

    await runtime.trigger('FLAKY');
    await runtime.trigger('FLAKY');
    await runtime.stop();
    expect(runs).toBe(2);
  });

  it('rejects unknown jobs', async () => {
    const runtime = startScheduleRuntime([]);
    await expect(runtime.trigger('NOPE')).rejects.toThrow('unknown_job:NOPE');
    await runtime.stop();
  });
});
