import express from 'express';
import type { Server } from 'node:http';
import { ZodError } from 'zod';
import { createLogger } from './utils/logger.js';
import {
  AdapterError,
  InvalidDateFormatError,
  InvalidTimeFormatError,
  PrayerTimesUnavailableError,
} from './utils/errors.js';
import type { SleepScheduleService } from './core/sleep/SleepScheduleService.js';
import type { SleepQuotes } from './utils/sleepQuotes.js';
import { createSleepRouter } from './api/sleepRouter.js';

const logger = createLogger({ component: 'server' });

interface ErrorResponse {
  status: number;
  body: Record<string, unknown>;
}

function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: 'Invalid request',
        issues: err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      },
    };
  }
  if (err instanceof InvalidTimeFormatError || err instanceof InvalidDateFormatError) {
    return { status: 400, body: { error: err.message, code: err.code } };
  }
  if (err instanceof PrayerTimesUnavailableError) {
    return { status: 404, body: { error: err.message, code: err.code } };
  }
  if (err instanceof AdapterError) {
    return { status: 502, body: { error: 'Prayer times provider unavailable', code: err.code } };
  }
  // body-parser marks malformed JSON with a 400 status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return { status: 400, body: { error: 'Malformed JSON body' } };
  }
  return { status: 500, body: { error: 'Internal server error' } };
}

export function createApp(service: SleepScheduleService, quotes: SleepQuotes): express.Express {
  const app = express();

  app.use(express.json());

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createSleepRouter(service, quotes));

  // Error handling
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const { status, body } = toErrorResponse(err);
    if (status >= 500) {
      logger.error({ error: err }, 'Unhandled error in Express');
    } else {
      logger.warn({ error: err, status }, 'Request failed');
    }
    res.status(status).json(body);
  });

  return app;
}

export async function startServer(
  app: express.Express,
  port: number,
  host: string = '0.0.0.0'
): Promise<Server> {
  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
