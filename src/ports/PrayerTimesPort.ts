import type { DailyPrayerTimes, PrayerLocation } from '../core/sleep/types.js';

export interface PrayerTimesLookupOptions {
  /** When false, skip cached rows and ask the provider first. Defaults to true. */
  useCache?: boolean;
}

export interface PrayerTimesPort {
  /** Resolves null when the provider has no timings for that day. */
  getPrayerTimes(
    location: PrayerLocation,
    date: string,
    options?: PrayerTimesLookupOptions
  ): Promise<DailyPrayerTimes | null>;
}
