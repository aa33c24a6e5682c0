import type { PrayerTimesLookupOptions, PrayerTimesPort } from '../../ports/PrayerTimesPort.js';
import type { DailyPrayerTimes, PrayerLocation } from '../../core/sleep/types.js';
import type { PrayerTimesCache } from './PrayerTimesCache.js';
import { addDays, formatCalendarDate, parseCalendarDate } from '../../core/sleep/time.js';
import { createLogger } from '../../utils/logger.js';

/**
 * Serves prayer times from the cache when it can, otherwise asks the upstream provider and
 * remembers the answer. When the provider fails, a cached row for the same day is returned
 * instead; with nothing cached the provider error propagates.
 */
export class CachedPrayerTimesAdapter implements PrayerTimesPort {
  private readonly logger = createLogger({ adapter: 'CachedPrayerTimesAdapter' });

  constructor(
    private readonly upstream: PrayerTimesPort,
    private readonly cache: PrayerTimesCache,
    private readonly cacheDays: number
  ) {}

  async getPrayerTimes(
    location: PrayerLocation,
    date: string,
    options: PrayerTimesLookupOptions = {}
  ): Promise<DailyPrayerTimes | null> {
    const logger = this.logger.child({ method: 'getPrayerTimes', city: location.city, date });
    const useCache = options.useCache !== false;

    if (useCache) {
      const cached = this.cache.get(location, date);
      if (cached) {
        logger.debug('Serving prayer times from cache');
        return cached;
      }
    }

    try {
      const prayerTimes = await this.upstream.getPrayerTimes(location, date);
      if (prayerTimes) {
        this.cache.set(location, prayerTimes);
      }
      return prayerTimes;
    } catch (error) {
      const fallback = this.cache.get(location, date);
      if (!fallback) {
        throw error;
      }
      logger.warn({ error }, 'Prayer times provider failed; using cached row');
      return fallback;
    }
  }

  /** Forget rows older than the retention window counted back from `today`. */
  pruneCache(today: string): number {
    const cutoff = formatCalendarDate(addDays(parseCalendarDate(today), -this.cacheDays));
    const removed = this.cache.pruneOlderThan(cutoff);
    if (removed > 0) {
      this.logger.info({ removed, cutoff, remaining: this.cache.size }, 'Pruned prayer times cache');
    }
    return removed;
  }
}
