import { z } from 'zod';
import { ConfigError } from '../../utils/errors.js';
import type { SleepPolicy } from './types.js';

export const DEFAULT_SLEEP_POLICY: Readonly<SleepPolicy> = Object.freeze({
  defaultDurationHours: 7.0,
  minDurationHours: 6.0,
  maxDurationHours: 7.5,
  pivotWakeHour: 4,
  pivotMarginThresholdHours: 7.5,
  ishaBufferMinutes: 30,
  fajrBufferMinutes: 0,
});

const sleepPolicySchema = z
  .object({
    defaultDurationHours: z.number().positive().max(24),
    minDurationHours: z.number().positive().max(24),
    maxDurationHours: z.number().positive().max(24),
    pivotWakeHour: z.number().int().min(0).max(23),
    pivotMarginThresholdHours: z.number().nonnegative().max(24),
    ishaBufferMinutes: z.number().int().nonnegative(),
    fajrBufferMinutes: z.number().int().nonnegative(),
  })
  .refine((policy) => policy.minDurationHours <= policy.maxDurationHours, {
    message: 'minDurationHours must not exceed maxDurationHours',
    path: ['minDurationHours'],
  });

export function createSleepPolicy(overrides: Partial<SleepPolicy> = {}): SleepPolicy {
  const result = sleepPolicySchema.safeParse({ ...DEFAULT_SLEEP_POLICY, ...overrides });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid sleep policy:\n${issues.join('\n')}`);
  }
  return result.data;
}
