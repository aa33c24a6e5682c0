// Load environment variables first
import 'dotenv/config';

import { loadConfig, sleepPolicyFromConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { loadSleepQuotes } from './utils/sleepQuotes.js';
import { AladhanPrayerTimesAdapter } from './adapters/prayer/AladhanPrayerTimesAdapter.js';
import { CachedPrayerTimesAdapter } from './adapters/prayer/CachedPrayerTimesAdapter.js';
import { PrayerTimesCache } from './adapters/prayer/PrayerTimesCache.js';
import { SleepScheduleService } from './core/sleep/SleepScheduleService.js';
import { BedtimeReminderJob } from './scheduler/BedtimeReminderJob.js';
import { scheduleBedtimeReminder } from './scheduler/index.js';
import { createApp, startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting Sleepy schedule service');

  try {
    const config = loadConfig();
    const policy = sleepPolicyFromConfig(config);
    const quotes = await loadSleepQuotes();
    logger.info({ count: quotes.count }, 'Loaded sleep quotes');

    const prayerTimes = new CachedPrayerTimesAdapter(
      new AladhanPrayerTimesAdapter(config),
      new PrayerTimesCache(),
      config.prayerTimesCacheDays
    );
    const scheduleService = new SleepScheduleService(prayerTimes, policy, quotes);

    const reminderJob = new BedtimeReminderJob(scheduleService, prayerTimes, {
      city: config.defaultCity,
      country: config.defaultCountry,
      latitude: config.defaultLatitude,
      longitude: config.defaultLongitude,
    });
    scheduleBedtimeReminder(reminderJob, config.reminderTime, config.timezone);

    await startServer(createApp(scheduleService, quotes), config.port, config.host);

    logger.info({ host: config.host, port: config.port, policy }, 'Server started successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
