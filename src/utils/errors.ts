export class SleepyError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SleepyError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Malformed or out-of-range wall-clock text such as "25:99". */
export class InvalidTimeFormatError extends SleepyError {
  public readonly input: string;

  constructor(input: string, reason: string) {
    super(`Invalid time "${input}": ${reason}`, 'INVALID_TIME_FORMAT');
    this.name = 'InvalidTimeFormatError';
    this.input = input;
  }
}

export class InvalidDateFormatError extends SleepyError {
  public readonly input: string;

  constructor(input: string) {
    super(`Invalid date "${input}": expected YYYY-MM-DD`, 'INVALID_DATE_FORMAT');
    this.name = 'InvalidDateFormatError';
    this.input = input;
  }
}

export class AdapterError extends SleepyError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class PrayerTimesError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('PRAYER_TIMES', message, options);
    this.name = 'PrayerTimesError';
  }
}

export class PrayerTimesUnavailableError extends SleepyError {
  constructor(date: string, place: string) {
    super(`No prayer times available for ${place} on ${date}`, 'PRAYER_TIMES_UNAVAILABLE');
    this.name = 'PrayerTimesUnavailableError';
  }
}

export class ConfigError extends SleepyError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
