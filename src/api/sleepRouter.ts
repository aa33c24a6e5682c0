import type { Router } from 'express';
import express from 'express';
import { z } from 'zod';
import type { SleepScheduleService } from '../core/sleep/SleepScheduleService.js';
import type { SleepQuotes } from '../utils/sleepQuotes.js';

const locationSchema = z.object({
  city: z.string().min(1),
  country: z.string().min(1),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

const prayerTimesSchema = z.object({
  date: z.string(),
  fajr: z.string(),
  sunrise: z.string(),
  dhuhr: z.string(),
  asr: z.string(),
  maghrib: z.string(),
  isha: z.string(),
  location: locationSchema.optional(),
});

const locationQuerySchema = z.object({
  latitude: z.coerce.number().min(-90).max(90),
  longitude: z.coerce.number().min(-180).max(180),
  city: z.string().min(1).default('Unknown'),
  country: z.string().min(1).default('Unknown'),
  date: z.string().optional(),
  refresh: z.enum(['true', 'false']).optional(),
});

const timeUntilSleepSchema = z.object({
  date: z.string(),
  sleepStart: z.string(),
});

const quoteKindSchema = z.enum(['random', 'supportive', 'urgent']);

export function createSleepRouter(service: SleepScheduleService, quotes: SleepQuotes): Router {
  const router = express.Router();

  router.post('/prayer-times', async (req, res, next) => {
    try {
      const query = locationQuerySchema.parse(req.query);
      const prayerTimes = await service.prayerTimesFor({
        location: {
          city: query.city,
          country: query.country,
          latitude: query.latitude,
          longitude: query.longitude,
        },
        date: query.date,
        refresh: query.refresh === 'true',
      });
      res.status(200).json(prayerTimes);
    } catch (error) {
      next(error);
    }
  });

  router.post('/sleep-schedule', (req, res, next) => {
    try {
      const prayerTimes = prayerTimesSchema.parse(req.body);
      res.status(200).json(service.scheduleFor(prayerTimes));
    } catch (error) {
      next(error);
    }
  });

  router.post('/sleep-schedule/full', async (req, res, next) => {
    try {
      const query = locationQuerySchema.parse(req.query);
      const result = await service.fullSchedule({
        location: {
          city: query.city,
          country: query.country,
          latitude: query.latitude,
          longitude: query.longitude,
        },
        date: query.date,
        refresh: query.refresh === 'true',
      });
      res.status(200).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.post('/time-until-sleep', (req, res, next) => {
    try {
      const schedule = timeUntilSleepSchema.parse(req.body);
      res.status(200).json({
        timeUntilSleep: service.timeUntilSleep(schedule),
        sleepTime: schedule.sleepStart,
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/quotes/:kind', (req, res, next) => {
    try {
      const kind = quoteKindSchema.parse(req.params.kind);
      res.status(200).json({ quote: quotes.randomQuote(kind === 'random' ? undefined : kind) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
