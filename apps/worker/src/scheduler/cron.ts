/**
 * UTC schedules for the worker's jobs. The deal cycle repeats every few minutes and the publish
 * period resets once a day, so only the minute and hour fields carry a value; the day, month and
 * weekday fields must be `*`.
 */

/** `*` is `{ every: 1 }`. */
type Slot = { every: number } | { at: number };

export type DealSchedule = {
  expr: string;
  minute: Slot;
  hour: Slot;
};

const HOUR_MS = 3_600_000;

function parseSlot(name: 'minute' | 'hour', raw: string, size: number): Slot {
  if (raw === '*') return { every: 1 };
  if (raw.startsWith('*/')) {
    const every = Number(raw.slice(2));
    if (!Number.isInteger(every) || every < 1 || every >= size) {
      throw new Error(`cron_${name}_step_out_of_range:${raw} (1-${size - 1})`);
    }
    return { every };
  }
  const at = Number(raw);
  if (raw === '' || !Number.isInteger(at) || at < 0 || at >= size) {
    throw new Error(`cron_${name}_unsupported:${raw} (use *, */n or 0-${size - 1})`);
  }
  return { at };
}

function slotMatches(slot: Slot, v: number): boolean {
  return 'every' in slot ? v % slot.every === 0 : v === slot.at;
}

/** First minute at or after `from` inside one hour, or null when the hour has none left. */
function firstMinute(slot: Slot, from: number): number | null {
  if ('at' in slot) return slot.at >= from ? slot.at : null;
  const m = Math.ceil(from / slot.every) * slot.every;
  return m < 60 ? m : null;
}

export function parseCron(expr: string): DealSchedule {
  const fields = expr.trim().split(/\s+/);
  if (fields.length !== 5) throw new Error(`cron_expected_5_fields:${expr}`);
  const [minute = '', hour = '', ...calendar] = fields;
  if (calendar.some((f) => f !== '*')) {
    throw new Error(`cron_calendar_fields_unsupported:${expr} (day, month and weekday must be *)`);
  }
  return { expr, minute: parseSlot('minute', minute, 60), hour: parseSlot('hour', hour, 24) };
}

/** Next run strictly after `afterUtc`, at a whole minute. Always within the next day. */
export function nextRunUtc(schedule: DealSchedule, afterUtc: Date): Date {
  const start = new Date(afterUtc.getTime());
  start.setUTCSeconds(0, 0);
  start.setUTCMinutes(start.getUTCMinutes() + 1);

  const hourStart = new Date(start.getTime());
  hourStart.setUTCMinutes(0);
  let fromMinute = start.getUTCMinutes();
  for (let i = 0; i <= 24; i++) {
    const at = new Date(hourStart.getTime() + i * HOUR_MS);
    if (slotMatches(schedule.hour, at.getUTCHours())) {
      const m = firstMinute(schedule.minute, fromMinute);
      if (m != null) return new Date(at.getTime() + m * 60_000);
    }
    fromMinute = 0;
  }
  // Unreachable: every hour slot matches at least once a day and every minute slot once an hour.
  throw new Error(`cron_no_next_run:${schedule.expr}`);
}
