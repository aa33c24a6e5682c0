import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { createLogger } from '../utils/logger.js';
import type { BedtimeReminderJob } from './BedtimeReminderJob.js';

const logger = createLogger({ component: 'scheduler' });

export function toDailyCronExpression(time: string): string {
  const [hourStr, minuteStr] = time.split(':');
  const hour = Number(hourStr);
  const minute = Number(minuteStr);
  if (Number.isNaN(hour) || Number.isNaN(minute) || hourStr === undefined || minuteStr === undefined) {
    throw new Error(`Invalid REMINDER_TIME format: ${time}`);
  }
  return `${minute} ${hour} * * *`;
}

export function scheduleBedtimeReminder(
  job: BedtimeReminderJob,
  reminderTime: string,
  timezone: string
): ScheduledTask {
  const cronExpression = toDailyCronExpression(reminderTime);
  logger.info({ cronExpression, timezone }, 'Scheduling bedtime reminder job');

  return cron.schedule(
    cronExpression,
    () => {
      job.run().catch((error: unknown) => {
        logger.error({ error }, 'Bedtime reminder job failed');
      });
    },
    { timezone }
  );
}
