import type { SleepScheduleService, FullSchedule } from '../core/sleep/SleepScheduleService.js';
import type { CachedPrayerTimesAdapter } from '../adapters/prayer/CachedPrayerTimesAdapter.js';
import type { PrayerLocation } from '../core/sleep/types.js';
import { formatCalendarDate, localCalendarDate } from '../core/sleep/time.js';
import { createLogger } from '../utils/logger.js';

export class BedtimeReminderJob {
  private readonly logger = createLogger({ job: 'BedtimeReminderJob' });

  constructor(
    private readonly scheduleService: SleepScheduleService,
    private readonly prayerTimes: CachedPrayerTimesAdapter,
    private readonly location: PrayerLocation
  ) {}

  /** Computes tonight's schedule and logs the reminder. Never throws. */
  async run(now: Date = new Date()): Promise<FullSchedule | null> {
    const logger = this.logger.child({ method: 'run', city: this.location.city });
    const today = formatCalendarDate(localCalendarDate(now));

    try {
      this.prayerTimes.pruneCache(today);
      const result = await this.scheduleService.fullSchedule({
        location: this.location,
        date: today,
        now,
      });
      logger.info(
        {
          sleepStart: result.sleepSchedule.sleepStart,
          sleepEnd: result.sleepSchedule.sleepEnd,
          timeUntilSleep: result.timeUntilSleep,
          quote: result.notificationQuote,
        },
        'Bedtime reminder'
      );
      return result;
    } catch (error) {
      logger.error({ error }, 'Failed to prepare bedtime reminder');
      return null;
    }
  }
}
