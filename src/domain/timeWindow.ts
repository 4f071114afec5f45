import { DateTime } from 'luxon';

export interface TimeWindow {
  start: Date;
  end: Date;
}

/** Upper bound for "from now on" queries. */
export const FAR_FUTURE = new Date('9999-12-31T00:00:00.000Z');

/** Weekday of `now` in `zone`, with Sunday as 0. */
export function currentWeekday(now: Date, zone: string): number {
  // Luxon numbers weekdays 1 (Monday) to 7 (Sunday).
  return DateTime.fromJSDate(now, { zone }).weekday % 7;
}

/**
 * `[start, end)` of weekday `day` (0 = Sunday) in the Sunday-started week that
 * contains `now`, measured from local midnight in `zone`. Earlier weekdays of
 * the week resolve to their most recent occurrence, later ones to the
 * upcoming one.
 */
export function weekdayBounds(day: number, now: Date, zone: string): TimeWindow {
  const local = DateTime.fromJSDate(now, { zone });
  const start = local.startOf('day').plus({ days: day - (local.weekday % 7) });
  const end = start.plus({ days: 1 });

  return { start: start.toJSDate(), end: end.toJSDate() };
}
