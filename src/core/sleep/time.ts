import { InvalidDateFormatError, InvalidTimeFormatError } from '../../utils/errors.js';
import type { CalendarDate, WallClockTime } from './types.js';

// Naive instants are milliseconds on a UTC axis standing in for local wall-clock time,
// so day arithmetic never sees a DST shift.

export const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

const NUMERIC_COMPONENT = /^\d{1,2}$/;

/**
 * Parse "HH:MM" or "HH:MM:SS" into hour and minute. Seconds are validated but dropped.
 * Out-of-range values are rejected, never clamped.
 */
export function parseWallClockTime(text: string): WallClockTime {
  const parts = text.trim().split(':');
  if (parts.length < 2 || parts.length > 3) {
    throw new InvalidTimeFormatError(text, 'expected HH:MM or HH:MM:SS');
  }
  if (!parts.every((part) => NUMERIC_COMPONENT.test(part))) {
    throw new InvalidTimeFormatError(text, 'components must be numeric');
  }

  const [hour, minute, second] = parts.map((part) => parseInt(part, 10));
  if (hour === undefined || hour > 23) {
    throw new InvalidTimeFormatError(text, 'hour must be between 0 and 23');
  }
  if (minute === undefined || minute > 59) {
    throw new InvalidTimeFormatError(text, 'minute must be between 0 and 59');
  }
  if (second !== undefined && second > 59) {
    throw new InvalidTimeFormatError(text, 'second must be between 0 and 59');
  }
  return { hour, minute };
}

export function parseCalendarDate(text: string): CalendarDate {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text.trim());
  if (!match) {
    throw new InvalidDateFormatError(text);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  // Reject dates that Date.UTC would roll over, e.g. 2025-02-30
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    throw new InvalidDateFormatError(text);
  }
  return { year, month, day };
}

function pad2(n: number): string {
  return n < 10 ? `0${n}` : `${n}`;
}

export function formatWallClockTime(time: WallClockTime): string {
  return `${pad2(time.hour)}:${pad2(time.minute)}`;
}

export function formatCalendarDate(date: CalendarDate): string {
  return `${date.year}-${pad2(date.month)}-${pad2(date.day)}`;
}

export function toNaiveInstant(date: CalendarDate, time: WallClockTime, dayOffset = 0): number {
  return Date.UTC(date.year, date.month - 1, date.day + dayOffset, time.hour, time.minute);
}

export function naiveInstantToTime(instant: number): WallClockTime {
  const d = new Date(instant);
  return { hour: d.getUTCHours(), minute: d.getUTCMinutes() };
}

export function naiveInstantToDate(instant: number): CalendarDate {
  const d = new Date(instant);
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

/** Read a real `Date` through its local wall-clock fields. */
export function localNaiveInstant(now: Date): number {
  return Date.UTC(
    now.getFullYear(),
    now.getMonth(),
    now.getDate(),
    now.getHours(),
    now.getMinutes(),
    now.getSeconds(),
    now.getMilliseconds()
  );
}

export function localCalendarDate(now: Date): CalendarDate {
  return { year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() };
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return naiveInstantToDate(Date.UTC(date.year, date.month - 1, date.day + days));
}

export function roundHours(ms: number): number {
  return Math.round((ms / MS_PER_HOUR) * 100) / 100;
}
