export interface WallClockTime {
  hour: number;
  minute: number;
}

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

export interface PrayerLocation {
  city: string;
  country: string;
  latitude: number;
  longitude: number;
}

/**
 * One calendar day of prayer times at one location. Times are local wall-clock text
 * ("HH:MM"); Fajr belongs to the morning after `date`.
 */
export interface DailyPrayerTimes {
  readonly date: string; // YYYY-MM-DD
  readonly fajr: string;
  readonly sunrise: string;
  readonly dhuhr: string;
  readonly asr: string;
  readonly maghrib: string;
  readonly isha: string;
  readonly location?: PrayerLocation;
}

export interface SleepPolicy {
  /** Informational target; not enforced by the optimizer. */
  defaultDurationHours: number;
  minDurationHours: number;
  maxDurationHours: number;
  /** Preferred wake hour (0-23) on the morning after `date`. */
  pivotWakeHour: number;
  /** Available-window size at or above which the pivot wake is considered. */
  pivotMarginThresholdHours: number;
  ishaBufferMinutes: number;
  fajrBufferMinutes: number;
}

export type WakeReason = 'pivot' | 'prayer' | 'below-minimum';

export type BoundsAdjustment = 'none' | 'raised-to-minimum' | 'capped-at-maximum';

export interface SleepSchedule {
  readonly date: string;
  readonly sleepStart: string; // HH:MM
  /** Day of `sleepStart` relative to `date` (1 when Isha plus buffer crosses midnight). */
  readonly sleepStartDayOffset: number;
  readonly sleepEnd: string; // HH:MM on date + 1
  readonly durationHours: number;
  readonly ishaTime: string;
  readonly fajrTime: string;
  readonly notes: string;
  readonly wakeReason: WakeReason;
  readonly adjustment: BoundsAdjustment;
}

export interface TimeRemaining {
  totalMinutes: number;
  hours: number;
  minutes: number;
}
