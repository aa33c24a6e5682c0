import { z } from 'zod';
import type { PrayerTimesPort } from '../../ports/PrayerTimesPort.js';
import type { Config } from '../../config/index.js';
import type { DailyPrayerTimes, PrayerLocation } from '../../core/sleep/types.js';
import {
  formatWallClockTime,
  parseCalendarDate,
  parseWallClockTime,
} from '../../core/sleep/time.js';
import { createLogger } from '../../utils/logger.js';
import { PrayerTimesError } from '../../utils/errors.js';

const timingsEnvelopeSchema = z.object({
  code: z.number(),
  status: z.string().optional(),
  data: z.unknown(),
});

const timingsDataSchema = z.object({
  timings: z.record(z.string()),
});

const LAST_MINUTE_OF_DAY = 24 * 60 - 1;

const PRAYERS = ['Fajr', 'Sunrise', 'Dhuhr', 'Asr', 'Maghrib', 'Isha'] as const;
type PrayerName = (typeof PRAYERS)[number];

export class AladhanPrayerTimesAdapter implements PrayerTimesPort {
  private readonly logger = createLogger({ adapter: 'AladhanPrayerTimesAdapter' });
  private readonly baseUrl: string;
  private readonly method: number;
  private readonly school: number;
  private readonly midnightMode: number;
  private readonly safetyBufferMinutes: number;

  constructor(config: Config) {
    this.baseUrl = config.aladhanBaseUrl.replace(/\/+$/, '');
    this.method = config.aladhanMethod;
    this.school = config.aladhanSchool;
    this.midnightMode = config.aladhanMidnightMode;
    this.safetyBufferMinutes = config.prayerTimeSafetyBufferMinutes;
  }

  async getPrayerTimes(location: PrayerLocation, date: string): Promise<DailyPrayerTimes | null> {
    const logger = this.logger.child({ method: 'getPrayerTimes', city: location.city, date });
    const { year, month, day } = parseCalendarDate(date);

    const url = new URL(`${this.baseUrl}/timings/${pad2(day)}-${pad2(month)}-${year}`);
    url.searchParams.set('latitude', String(location.latitude));
    url.searchParams.set('longitude', String(location.longitude));
    url.searchParams.set('method', String(this.method));
    url.searchParams.set('school', String(this.school));
    url.searchParams.set('midnightMode', String(this.midnightMode));

    let envelope: z.infer<typeof timingsEnvelopeSchema>;
    try {
      logger.info('Fetching prayer times');
      const response = await fetch(url.toString(), {
        signal: AbortSignal.timeout(15000),
      });
      if (!response.ok) {
        const text = await response.text();
        throw new Error(`Aladhan API error: ${response.status} ${text}`);
      }
      envelope = timingsEnvelopeSchema.parse(await response.json());
    } catch (error) {
      logger.error({ error }, 'Failed to fetch prayer times');
      throw new PrayerTimesError('Failed to fetch prayer times', { cause: error });
    }

    // On errors Aladhan puts a message string in `data`
    const parsed = timingsDataSchema.safeParse(envelope.data);
    if (envelope.code !== 200 || !parsed.success) {
      logger.warn({ code: envelope.code, status: envelope.status }, 'Aladhan returned no timings');
      return null;
    }
    const timings = parsed.data.timings;

    const pick = (name: PrayerName): string => {
      // Aladhan appends the zone, e.g. "05:12 (+05)"
      const raw = (timings[name] ?? '').trim().split(/\s+/)[0] ?? '';
      try {
        return this.addSafetyBuffer(raw);
      } catch (error) {
        throw new PrayerTimesError(`Malformed ${name} timing from Aladhan: "${raw}"`, {
          cause: error,
        });
      }
    };

    return {
      date,
      fajr: pick('Fajr'),
      sunrise: pick('Sunrise'),
      dhuhr: pick('Dhuhr'),
      asr: pick('Asr'),
      maghrib: pick('Maghrib'),
      isha: pick('Isha'),
      location,
    };
  }

  /** Shifts a timing later, stopping at 23:59 so it never lands on the next day. */
  private addSafetyBuffer(text: string): string {
    const { hour, minute } = parseWallClockTime(text);
    const total = Math.min(hour * 60 + minute + this.safetyBufferMinutes, LAST_MINUTE_OF_DAY);
    return formatWallClockTime({ hour: Math.floor(total / 60), minute: total % 60 });
  }
}

function pad2(n: number): string {
  return n < 10 ? `0${n}` : `${n}`;
}
