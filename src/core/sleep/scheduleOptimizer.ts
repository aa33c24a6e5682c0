import {
  MS_PER_DAY,
  MS_PER_HOUR,
  MS_PER_MINUTE,
  formatWallClockTime,
  naiveInstantToTime,
  parseCalendarDate,
  parseWallClockTime,
  roundHours,
  toNaiveInstant,
} from './time.js';
import type {
  BoundsAdjustment,
  DailyPrayerTimes,
  SleepPolicy,
  SleepSchedule,
  WakeReason,
} from './types.js';

/**
 * Derive tonight's sleep window from Isha (on `date`) and Fajr (on the following morning).
 *
 * Sleep starts after the Isha buffer. Wake is the pivot hour when the window is wide and
 * the pivot comes before Fajr, otherwise Fajr minus its buffer. The duration is then forced
 * into [min, max]: a short night moves the start earlier, a long night moves the wake later.
 *
 * Throws InvalidTimeFormatError / InvalidDateFormatError on malformed input text.
 */
export function computeSchedule(prayerTimes: DailyPrayerTimes, policy: SleepPolicy): SleepSchedule {
  const date = parseCalendarDate(prayerTimes.date);
  const isha = parseWallClockTime(prayerTimes.isha);
  const fajr = parseWallClockTime(prayerTimes.fajr);

  const midnight = toNaiveInstant(date, { hour: 0, minute: 0 });
  let sleepStart = toNaiveInstant(date, isha) + policy.ishaBufferMinutes * MS_PER_MINUTE;
  const fajrInstant = toNaiveInstant(date, fajr, 1);
  const latestWake = fajrInstant - policy.fajrBufferMinutes * MS_PER_MINUTE;
  const pivotInstant = toNaiveInstant(date, { hour: policy.pivotWakeHour, minute: 0 }, 1);

  const availableHours = (fajrInstant - sleepStart) / MS_PER_HOUR;

  let wake: number;
  let wakeReason: WakeReason;
  let notes: string;

  if (availableHours >= policy.pivotMarginThresholdHours) {
    if (policy.pivotWakeHour < fajr.hour && pivotInstant > sleepStart) {
      wake = pivotInstant;
      wakeReason = 'pivot';
      notes = `Wake early at ${formatWallClockTime({ hour: policy.pivotWakeHour, minute: 0 })} for productivity before Fajr`;
    } else {
      wake = latestWake;
      wakeReason = 'prayer';
      notes = 'Wake at Fajr time';
    }
  } else if (availableHours >= policy.minDurationHours) {
    wake = latestWake;
    wakeReason = 'prayer';
    notes = 'Wake at Fajr time';
  } else {
    // Usually bad upstream data, e.g. Isha reported after Fajr
    wake = latestWake;
    wakeReason = 'below-minimum';
    notes = 'Warning: less than minimum sleep duration available';
  }

  let durationHours = roundHours(wake - sleepStart);
  let adjustment: BoundsAdjustment = 'none';

  if (durationHours < policy.minDurationHours) {
    sleepStart = wake - policy.minDurationHours * MS_PER_HOUR;
    durationHours = policy.minDurationHours;
    adjustment = 'raised-to-minimum';
    notes = `Adjusted to minimum ${policy.minDurationHours} hours (may overlap with Isha buffer)`;
  } else if (durationHours > policy.maxDurationHours) {
    wake = sleepStart + policy.maxDurationHours * MS_PER_HOUR;
    durationHours = policy.maxDurationHours;
    adjustment = 'capped-at-maximum';
    notes = `Capped at maximum ${policy.maxDurationHours} hours`;
  }

  return {
    date: prayerTimes.date,
    sleepStart: formatWallClockTime(naiveInstantToTime(sleepStart)),
    sleepStartDayOffset: Math.floor((sleepStart - midnight) / MS_PER_DAY),
    sleepEnd: formatWallClockTime(naiveInstantToTime(wake)),
    durationHours,
    ishaTime: prayerTimes.isha,
    fajrTime: prayerTimes.fajr,
    notes,
    wakeReason,
    adjustment,
  };
}
