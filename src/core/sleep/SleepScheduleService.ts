import type { PrayerTimesPort } from '../../ports/PrayerTimesPort.js';
import type { SleepQuotes } from '../../utils/sleepQuotes.js';
import type { DailyPrayerTimes, PrayerLocation, SleepPolicy, SleepSchedule } from './types.js';
import { computeSchedule } from './scheduleOptimizer.js';
import { formatTimeRemaining, timeRemainingUntil } from './timeRemaining.js';
import { formatCalendarDate, localCalendarDate } from './time.js';
import { createLogger } from '../../utils/logger.js';
import { PrayerTimesUnavailableError } from '../../utils/errors.js';

export interface PrayerTimesRequest {
  location: PrayerLocation;
  /** YYYY-MM-DD; defaults to the local date of `now`. */
  date?: string;
  now?: Date;
  refresh?: boolean;
}

export interface FullSchedule {
  location: PrayerLocation;
  prayerTimes: DailyPrayerTimes;
  sleepSchedule: SleepSchedule;
  timeUntilSleep: string | null;
  notificationQuote: string;
}

export class SleepScheduleService {
  private readonly logger = createLogger({ service: 'SleepScheduleService' });

  constructor(
    private readonly prayerTimesPort: PrayerTimesPort,
    private readonly policy: SleepPolicy,
    private readonly quotes: SleepQuotes
  ) {}

  scheduleFor(prayerTimes: DailyPrayerTimes): SleepSchedule {
    const schedule = computeSchedule(prayerTimes, this.policy);
    if (schedule.wakeReason === 'below-minimum') {
      this.logger.warn(
        {
          date: prayerTimes.date,
          isha: prayerTimes.isha,
          fajr: prayerTimes.fajr,
          minDurationHours: this.policy.minDurationHours,
        },
        'Isha-to-Fajr window shorter than minimum sleep; check upstream prayer times'
      );
    }
    return schedule;
  }

  timeUntilSleep(schedule: Pick<SleepSchedule, 'date' | 'sleepStart'>, now: Date = new Date()): string | null {
    const remaining = timeRemainingUntil(schedule, now);
    return remaining ? formatTimeRemaining(remaining) : null;
  }

  /** Throws PrayerTimesUnavailableError when the provider has nothing for the day. */
  async prayerTimesFor(request: PrayerTimesRequest): Promise<DailyPrayerTimes> {
    const date = request.date ?? formatCalendarDate(localCalendarDate(request.now ?? new Date()));
    const prayerTimes = await this.prayerTimesPort.getPrayerTimes(request.location, date, {
      useCache: request.refresh !== true,
    });
    if (!prayerTimes) {
      throw new PrayerTimesUnavailableError(date, request.location.city);
    }
    return prayerTimes;
  }

  async fullSchedule(request: PrayerTimesRequest): Promise<FullSchedule> {
    const now = request.now ?? new Date();
    const prayerTimes = await this.prayerTimesFor({ ...request, now });
    const logger = this.logger.child({
      method: 'fullSchedule',
      city: request.location.city,
      date: prayerTimes.date,
    });

    const sleepSchedule = this.scheduleFor(prayerTimes);
    logger.info(
      { sleepStart: sleepSchedule.sleepStart, sleepEnd: sleepSchedule.sleepEnd },
      'Computed sleep schedule'
    );

    return {
      location: request.location,
      prayerTimes,
      sleepSchedule,
      timeUntilSleep: this.timeUntilSleep(sleepSchedule, now),
      notificationQuote: this.quotes.randomQuote(),
    };
  }
}
