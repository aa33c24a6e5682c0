import type { DailyPrayerTimes, PrayerLocation } from '../../core/sleep/types.js';

/** Process-memory cache of provider rows, keyed by place and date. */
export class PrayerTimesCache {
  private readonly entries = new Map<string, DailyPrayerTimes>();

  get(location: PrayerLocation, date: string): DailyPrayerTimes | null {
    return this.entries.get(cacheKey(location, date)) ?? null;
  }

  set(location: PrayerLocation, prayerTimes: DailyPrayerTimes): void {
    this.entries.set(cacheKey(location, prayerTimes.date), prayerTimes);
  }

  /** Drops entries dated before `cutoffDate` (YYYY-MM-DD). Returns how many were removed. */
  pruneOlderThan(cutoffDate: string): number {
    let removed = 0;
    for (const [key, prayerTimes] of this.entries) {
      if (prayerTimes.date < cutoffDate) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}

function cacheKey(location: PrayerLocation, date: string): string {
  const place =
    location.city && location.city !== 'Unknown'
      ? location.city.toLowerCase()
      : `${location.latitude.toFixed(4)},${location.longitude.toFixed(4)}`;
  return `${place}|${date}`;
}
