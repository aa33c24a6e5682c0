import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import type { Server } from 'node:http';
import { createApp } from '../../server.js';
import { SleepScheduleService } from '../../core/sleep/SleepScheduleService.js';
import { DEFAULT_SLEEP_POLICY } from '../../core/sleep/policy.js';
import { SleepQuotes } from '../../utils/sleepQuotes.js';
import type { PrayerTimesPort } from '../../ports/PrayerTimesPort.js';
import type { DailyPrayerTimes } from '../../core/sleep/types.js';
import { PrayerTimesError } from '../../utils/errors.js';

const prayerTimes: DailyPrayerTimes = {
  date: '2025-01-15',
  fajr: '04:30',
  sunrise: '06:10',
  dhuhr: '12:15',
  asr: '15:00',
  maghrib: '17:30',
  isha: '21:00',
};

describe('HTTP API', () => {
  const getPrayerTimes = vi.fn<PrayerTimesPort['getPrayerTimes']>();
  const quotes = new SleepQuotes({ supportive: ['rest well'], urgent: ['bed. now.'] }, () => 0);
  const service = new SleepScheduleService({ getPrayerTimes }, DEFAULT_SLEEP_POLICY, quotes);
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = createApp(service, quotes);
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  beforeEach(() => {
    getPrayerTimes.mockReset();
  });

  async function post(path: string, body?: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body = (await response.json()) as { status: string };
    expect(response.status).toBe(200);
    expect(body.status).toBe('ok');
  });

  it('computes a schedule from posted prayer times', async () => {
    const response = await post('/sleep-schedule', { ...prayerTimes, isha: '19:00', fajr: '05:30' });
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      date: '2025-01-15',
      sleepStart: '19:30',
      sleepStartDayOffset: 0,
      sleepEnd: '03:00',
      durationHours: 7.5,
      ishaTime: '19:00',
      fajrTime: '05:30',
      notes: 'Capped at maximum 7.5 hours',
      wakeReason: 'pivot',
      adjustment: 'capped-at-maximum',
    });
  });

  it('rejects malformed prayer times with 400', async () => {
    const response = await post('/sleep-schedule', { ...prayerTimes, isha: '25:99' });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Invalid time "25:99": hour must be between 0 and 23',
      code: 'INVALID_TIME_FORMAT',
    });
  });

  it('rejects incomplete bodies with 400', async () => {
    const response = await post('/sleep-schedule', { date: '2025-01-15' });
    const body = (await response.json()) as { error: string };
    expect(response.status).toBe(400);
    expect(body.error).toBe('Invalid request');
  });

  it('rejects malformed JSON with 400', async () => {
    const response = await fetch(`${baseUrl}/sleep-schedule`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"date":',
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Malformed JSON body' });
  });

  it('assembles the full schedule for coordinates', async () => {
    getPrayerTimes.mockResolvedValue(prayerTimes);

    const response = await post(
      '/sleep-schedule/full?latitude=41.3&longitude=69.24&city=Tashkent&country=Uzbekistan&date=2025-01-15'
    );
    const body = (await response.json()) as {
      location: { city: string; latitude: number };
      sleepSchedule: { sleepStart: string; sleepEnd: string };
      notificationQuote: string;
    };

    expect(response.status).toBe(200);
    expect(getPrayerTimes).toHaveBeenCalledWith(
      { city: 'Tashkent', country: 'Uzbekistan', latitude: 41.3, longitude: 69.24 },
      '2025-01-15',
      { useCache: true }
    );
    expect(body.location.latitude).toBe(41.3);
    expect(body.sleepSchedule.sleepStart).toBe('21:30');
    expect(body.sleepSchedule.sleepEnd).toBe('04:30');
    expect(body.notificationQuote).toBe('rest well');
  });

  it('passes refresh through as a cache bypass', async () => {
    getPrayerTimes.mockResolvedValue(prayerTimes);

    await post('/sleep-schedule/full?latitude=41.3&longitude=69.24&date=2025-01-15&refresh=true');

    expect(getPrayerTimes).toHaveBeenCalledWith(
      { city: 'Unknown', country: 'Unknown', latitude: 41.3, longitude: 69.24 },
      '2025-01-15',
      { useCache: false }
    );
  });

  it('returns the prayer times for coordinates without a schedule', async () => {
    getPrayerTimes.mockResolvedValue(prayerTimes);

    const response = await post(
      '/prayer-times?latitude=41.3&longitude=69.24&city=Tashkent&country=Uzbekistan&date=2025-01-15'
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(prayerTimes);
    expect(getPrayerTimes).toHaveBeenCalledWith(
      { city: 'Tashkent', country: 'Uzbekistan', latitude: 41.3, longitude: 69.24 },
      '2025-01-15',
      { useCache: true }
    );
  });

  it('answers 404 for prayer times the provider does not have', async () => {
    getPrayerTimes.mockResolvedValue(null);

    const response = await post('/prayer-times?latitude=41.3&longitude=69.24&date=2025-01-15');
    const body = (await response.json()) as { code: string };

    expect(response.status).toBe(404);
    expect(body.code).toBe('PRAYER_TIMES_UNAVAILABLE');
  });

  it('requires coordinates', async () => {
    const response = await post('/sleep-schedule/full?city=Tashkent');
    expect(response.status).toBe(400);
    expect(getPrayerTimes).not.toHaveBeenCalled();
  });

  it('answers 404 when the provider has no timings', async () => {
    getPrayerTimes.mockResolvedValue(null);

    const response = await post('/sleep-schedule/full?latitude=41.3&longitude=69.24&date=2025-01-15');
    const body = (await response.json()) as { code: string };

    expect(response.status).toBe(404);
    expect(body.code).toBe('PRAYER_TIMES_UNAVAILABLE');
  });

  it('answers 502 when the provider fails', async () => {
    getPrayerTimes.mockRejectedValue(new PrayerTimesError('down'));

    const response = await post('/sleep-schedule/full?latitude=41.3&longitude=69.24&date=2025-01-15');

    expect(response.status).toBe(502);
    expect(await response.json()).toEqual({
      error: 'Prayer times provider unavailable',
      code: 'ADAPTER_PRAYER_TIMES',
    });
  });

  it('returns null time until sleep for a long-past schedule', async () => {
    const response = await post('/time-until-sleep', { date: '2000-01-01', sleepStart: '21:30' });
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ timeUntilSleep: null, sleepTime: '21:30' });
  });

  it('serves quotes by tone', async () => {
    const urgent = await fetch(`${baseUrl}/quotes/urgent`);
    expect(await urgent.json()).toEqual({ quote: 'bed. now.' });

    const random = await fetch(`${baseUrl}/quotes/random`);
    expect(await random.json()).toEqual({ quote: 'rest well' });

    const unknown = await fetch(`${baseUrl}/quotes/grumpy`);
    expect(unknown.status).toBe(400);
  });
});
