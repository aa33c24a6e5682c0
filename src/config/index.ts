import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { createSleepPolicy } from '../core/sleep/policy.js';
import type { SleepPolicy } from '../core/sleep/types.js';

const configSchema = z.object({
  // Sleep policy
  sleepDefaultHours: z.coerce.number().positive().default(7.0),
  sleepMinHours: z.coerce.number().positive().default(6.0),
  sleepMaxHours: z.coerce.number().positive().default(7.5),
  sleepPivotWakeHour: z.coerce.number().int().min(0).max(23).default(4),
  sleepPivotMarginHours: z.coerce.number().nonnegative().default(7.5),
  ishaBufferMinutes: z.coerce.number().int().nonnegative().default(30),
  fajrBufferMinutes: z.coerce.number().int().nonnegative().default(0),

  // Aladhan prayer times API
  aladhanBaseUrl: z.string().url().default('http://api.aladhan.com/v1'),
  aladhanMethod: z.coerce.number().int().nonnegative().default(3), // Muslim World League
  aladhanSchool: z.coerce.number().int().min(0).max(1).default(1), // Hanafi
  aladhanMidnightMode: z.coerce.number().int().min(0).max(1).default(0),
  prayerTimeSafetyBufferMinutes: z.coerce.number().int().nonnegative().default(15),
  prayerTimesCacheDays: z.coerce.number().int().positive().default(30),

  // Location used by the bedtime reminder
  defaultCity: z.string().default('Tashkent'),
  defaultCountry: z.string().default('Uzbekistan'),
  defaultLatitude: z.coerce.number().min(-90).max(90).default(41.2995),
  defaultLongitude: z.coerce.number().min(-180).max(180).default(69.2401),

  // App
  reminderTime: z
    .string()
    .regex(/^([0-1]?[0-9]|2[0-3]):[0-5][0-9]$/)
    .default('20:00'),
  timezone: z.string().default('Asia/Tashkent'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(8000),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    sleepDefaultHours: env('SLEEP_DEFAULT_HOURS'),
    sleepMinHours: env('SLEEP_MIN_HOURS'),
    sleepMaxHours: env('SLEEP_MAX_HOURS'),
    sleepPivotWakeHour: env('SLEEP_PIVOT_WAKE_HOUR'),
    sleepPivotMarginHours: env('SLEEP_PIVOT_MARGIN_HOURS'),
    ishaBufferMinutes: env('ISHA_BUFFER_MINUTES'),
    fajrBufferMinutes: env('FAJR_BUFFER_MINUTES'),
    aladhanBaseUrl: env('ALADHAN_BASE_URL'),
    aladhanMethod: env('ALADHAN_METHOD'),
    aladhanSchool: env('ALADHAN_SCHOOL'),
    aladhanMidnightMode: env('ALADHAN_MIDNIGHT_MODE'),
    prayerTimeSafetyBufferMinutes: env('PRAYER_TIME_SAFETY_BUFFER_MINUTES'),
    prayerTimesCacheDays: env('PRAYER_TIMES_CACHE_DAYS'),
    defaultCity: env('DEFAULT_CITY'),
    defaultCountry: env('DEFAULT_COUNTRY'),
    defaultLatitude: env('DEFAULT_LATITUDE'),
    defaultLongitude: env('DEFAULT_LONGITUDE'),
    reminderTime: env('REMINDER_TIME'),
    timezone: env('TIMEZONE'),
    logLevel: env('LOG_LEVEL'),
    host: env('HOST'),
    port: env('PORT'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}

/** Throws ConfigError when the bounds contradict each other, e.g. min above max. */
export function sleepPolicyFromConfig(config: Config): SleepPolicy {
  return createSleepPolicy({
    defaultDurationHours: config.sleepDefaultHours,
    minDurationHours: config.sleepMinHours,
    maxDurationHours: config.sleepMaxHours,
    pivotWakeHour: config.sleepPivotWakeHour,
    pivotMarginThresholdHours: config.sleepPivotMarginHours,
    ishaBufferMinutes: config.ishaBufferMinutes,
    fajrBufferMinutes: config.fajrBufferMinutes,
  });
}
