export class SleepDebtError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SleepDebtError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** A single piece of user input was rejected; nothing has been applied. */
export class InputError extends SleepDebtError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options);
    this.name = 'InputError';
  }
}

export class MalformedDurationError extends InputError {
  constructor(input: string, options?: ErrorOptions) {
    super(`Invalid duration "${input}": use h:mm (7:30) or decimal hours (7.5)`, 'MALFORMED_DURATION', options);
    this.name = 'MalformedDurationError';
  }
}

export class MalformedTimeError extends InputError {
  constructor(input: string, options?: ErrorOptions) {
    super(`Invalid time "${input}": use HH:MM (23:30)`, 'MALFORMED_TIME', options);
    this.name = 'MalformedTimeError';
  }
}

export class MalformedDateError extends InputError {
  constructor(input: string, options?: ErrorOptions) {
    super(`Invalid date "${input}": use YYYY-MM-DD, MM-DD, today or yesterday`, 'MALFORMED_DATE', options);
    this.name = 'MalformedDateError';
  }
}

export class InconsistentEntryError extends InputError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INCONSISTENT_ENTRY', options);
    this.name = 'InconsistentEntryError';
  }
}

export class StorageError extends SleepDebtError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'STORAGE_ERROR', options);
    this.name = 'StorageError';
  }
}

export class ConfigError extends SleepDebtError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
