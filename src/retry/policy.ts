import { ValidationError } from '../core/errors.js';
import {
  DEFAULT_DISCOVERY_INTERVAL_MS,
  DEFAULT_DISCOVERY_RETRIES,
  DEFAULT_MAX_BACKOFF_MS,
  DEFAULT_SEND_INTERVAL_MS,
  DEFAULT_SEND_RETRIES,
} from '../constants.js';

export type RetryStrategy = 'fixed' | 'exponential';

export interface RetryPolicyInit {
  maxRetries: number;
  strategy: RetryStrategy;
  baseInterval: number; // ms; fixed interval, or first interval for exponential
  capInterval?: number; // ms; exponential only
}

/**
 * How many extra attempts to make and how far apart.
 *
 * Total attempts made by a consumer are `maxRetries + 1`; the first attempt is
 * not a retry. The "current interval" of a running sequence belongs to the
 * caller, the policy itself never changes.
 *
 * @example
 * ```typescript
 * RetryPolicy.disabled();
 * RetryPolicy.fixed({ maxRetries: 3, interval: 1000 });
 * RetryPolicy.exponential({ maxRetries: 4, initialInterval: 500, maxInterval: 3000 });
 * ```
 */
export class RetryPolicy {
  readonly maxRetries: number;
  readonly strategy: RetryStrategy;
  readonly baseInterval: number;
  readonly capInterval?: number;

  constructor(init: RetryPolicyInit) {
    if (!Number.isInteger(init.maxRetries) || init.maxRetries < 0) {
      throw new ValidationError(`maxRetries must be a non-negative integer, got ${init.maxRetries}`, {
        field: 'maxRetries',
        value: init.maxRetries,
      });
    }
    assertDuration('baseInterval', init.baseInterval);
    if (init.capInterval !== undefined) {
      assertDuration('capInterval', init.capInterval);
    }

    this.maxRetries = init.maxRetries;
    this.strategy = init.strategy;
    this.baseInterval = init.baseInterval;
    this.capInterval = init.strategy === 'exponential' ? init.capInterval : undefined;
    Object.freeze(this);
  }

  /**
   * Single attempt, no retries
   */
  static disabled(): RetryPolicy {
    return new RetryPolicy({ maxRetries: 0, strategy: 'fixed', baseInterval: 0 });
  }

  static fixed(options: { maxRetries: number; interval: number }): RetryPolicy {
    return new RetryPolicy({
      maxRetries: options.maxRetries,
      strategy: 'fixed',
      baseInterval: options.interval,
    });
  }

  /**
   * Doubling intervals. Without `maxInterval` the cap is 3 seconds.
   */
  static exponential(options: {
    maxRetries: number;
    initialInterval: number;
    maxInterval?: number;
  }): RetryPolicy {
    return new RetryPolicy({
      maxRetries: options.maxRetries,
      strategy: 'exponential',
      baseInterval: options.initialInterval,
      capInterval: options.maxInterval ?? DEFAULT_MAX_BACKOFF_MS,
    });
  }

  get enabled(): boolean {
    return this.maxRetries > 0;
  }

  get maxAttempts(): number {
    return this.maxRetries + 1;
  }

  /**
   * Interval that follows `current`.
   * Fixed ignores `current`; exponential doubles it and clamps to the cap.
   */
  nextInterval(current: number): number {
    if (this.strategy === 'fixed') {
      return this.baseInterval;
    }
    const cap = this.capInterval ?? Number.MAX_SAFE_INTEGER;
    if (current >= cap / 2) {
      return cap;
    }
    return Math.max(0, current * 2);
  }

  /**
   * The waits a full retry sequence goes through, in order
   */
  intervals(): number[] {
    const result: number[] = [];
    let current = this.baseInterval;
    for (let i = 0; i < this.maxRetries; i++) {
      result.push(current);
      current = this.nextInterval(current);
    }
    return result;
  }

  toString(): string {
    if (!this.enabled) return 'RetryPolicy(disabled)';
    if (this.strategy === 'fixed') {
      return `RetryPolicy(fixed, ${this.maxRetries} retries every ${this.baseInterval}ms)`;
    }
    return `RetryPolicy(exponential, ${this.maxRetries} retries from ${this.baseInterval}ms, cap ${this.capInterval ?? 'none'})`;
  }
}

/**
 * Point-to-point default: 6 datagrams, 750ms doubling to 3s
 */
export const DEFAULT_SEND_RETRY = RetryPolicy.exponential({
  maxRetries: DEFAULT_SEND_RETRIES,
  initialInterval: DEFAULT_SEND_INTERVAL_MS,
  maxInterval: DEFAULT_MAX_BACKOFF_MS,
});

/**
 * Discovery default: 5 repeat broadcasts, 500ms doubling to 3s
 */
export const DEFAULT_DISCOVERY_RETRY = RetryPolicy.exponential({
  maxRetries: DEFAULT_DISCOVERY_RETRIES,
  initialInterval: DEFAULT_DISCOVERY_INTERVAL_MS,
  maxInterval: DEFAULT_MAX_BACKOFF_MS,
});

function assertDuration(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${field} must be a finite, non-negative number of milliseconds, got ${value}`, {
      field,
      value,
    });
  }
}
