import {
  MS_PER_MINUTE,
  localNaiveInstant,
  parseCalendarDate,
  parseWallClockTime,
  toNaiveInstant,
} from './time.js';
import type { SleepSchedule, TimeRemaining } from './types.js';

/**
 * Time left until the schedule's sleep start. A start already in the past on
 * `schedule.date` is read as the same time on the following day; null when even that
 * has passed.
 */
export function timeRemainingUntil(
  schedule: Pick<SleepSchedule, 'date' | 'sleepStart'>,
  now: Date
): TimeRemaining | null {
  const date = parseCalendarDate(schedule.date);
  const sleepTime = parseWallClockTime(schedule.sleepStart);
  const nowInstant = localNaiveInstant(now);

  let sleepInstant = toNaiveInstant(date, sleepTime);
  if (sleepInstant < nowInstant) {
    sleepInstant = toNaiveInstant(date, sleepTime, 1);
  }

  const diff = sleepInstant - nowInstant;
  if (diff < 0) {
    return null;
  }

  const totalMinutes = Math.floor(diff / MS_PER_MINUTE);
  return {
    totalMinutes,
    hours: Math.floor(totalMinutes / 60),
    minutes: totalMinutes % 60,
  };
}

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

export function formatTimeRemaining(remaining: TimeRemaining): string {
  if (remaining.hours > 0) {
    return `${plural(remaining.hours, 'hour')} ${plural(remaining.minutes, 'minute')}`;
  }
  return plural(remaining.minutes, 'minute');
}
