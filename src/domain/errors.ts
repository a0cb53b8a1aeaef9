import type { Interval } from './models.js';

/** Data provider unreachable or returned something unusable. Retried by the scheduler. */
export class FetchError extends Error {
  readonly symbol: string;
  readonly interval: Interval;

  constructor(message: string, options: { symbol: string; interval: Interval; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.symbol = options.symbol;
    this.interval = options.interval;
  }
}

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** Raised when a caller breaks the position lifecycle contract. Never retried. */
export class StateInvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StateInvariantViolation';
  }
}
