import { describe, it, expect } from 'vitest';
import { loadConfig, sleepPolicyFromConfig } from '../../config/index.js';
import { createSleepPolicy, DEFAULT_SLEEP_POLICY } from '../../core/sleep/policy.js';
import { ConfigError } from '../../utils/errors.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config.sleepMinHours).toBe(6);
    expect(config.sleepMaxHours).toBe(7.5);
    expect(config.sleepPivotWakeHour).toBe(4);
    expect(config.ishaBufferMinutes).toBe(30);
    expect(config.prayerTimeSafetyBufferMinutes).toBe(15);
    expect(config.reminderTime).toBe('20:00');
    expect(config.port).toBe(8000);
    expect(config.logLevel).toBe('info');
  });

  it('coerces numeric variables and treats empty strings as unset', () => {
    const config = loadConfig({ SLEEP_MAX_HOURS: '8', PORT: '3000', LOG_LEVEL: '' });
    expect(config.sleepMaxHours).toBe(8);
    expect(config.port).toBe(3000);
    expect(config.logLevel).toBe('info');
  });

  it('lists every invalid variable', () => {
    expect(() => loadConfig({ REMINDER_TIME: '25:00', SLEEP_PIVOT_WAKE_HOUR: '30' })).toThrow(
      ConfigError
    );
    try {
      loadConfig({ REMINDER_TIME: '25:00', SLEEP_PIVOT_WAKE_HOUR: '30' });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.message).toContain('reminderTime');
        expect(error.message).toContain('sleepPivotWakeHour');
      }
    }
  });
});

describe('sleep policy', () => {
  it('maps configuration onto the policy', () => {
    const policy = sleepPolicyFromConfig(loadConfig({ FAJR_BUFFER_MINUTES: '10' }));
    expect(policy).toEqual({ ...DEFAULT_SLEEP_POLICY, fajrBufferMinutes: 10 });
  });

  it('rejects a minimum above the maximum', () => {
    const config = loadConfig({ SLEEP_MIN_HOURS: '8', SLEEP_MAX_HOURS: '7' });
    expect(() => sleepPolicyFromConfig(config)).toThrow(
      'minDurationHours: minDurationHours must not exceed maxDurationHours'
    );
  });

  it('rejects a pivot hour outside the clock', () => {
    expect(() => createSleepPolicy({ pivotWakeHour: 24 })).toThrow(ConfigError);
  });

  it('returns the defaults without overrides', () => {
    expect(createSleepPolicy()).toEqual(DEFAULT_SLEEP_POLICY);
  });
});
