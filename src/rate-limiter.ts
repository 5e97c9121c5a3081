import { performance } from 'perf_hooks';

import { InvalidConfigurationError } from './errors';
import { sleep } from './utils';

/**
 * Snapshot of a limiter's balance, for monitoring and tests.
 */
export interface RateLimiterState {
  /** Admissions per second, also the bucket capacity. */
  rate: number;
  /** Current token balance, always within `[0, rate]`. */
  tokens: number;
  /** Clock reading (ms) the balance was last brought up to date at. */
  lastRefill: number;
}

export interface RateLimiterOptions {
  /** Millisecond clock. Defaults to `performance.now`. */
  now?: () => number;
}

/**
 * Token bucket shared by every worker of a run. Tokens accrue continuously at
 * `rate` per second up to a capacity of one second's worth, and are refilled
 * lazily on each acquisition rather than by a background timer.
 *
 * The bucket starts empty, so a run ramps to its target rate from the first
 * request instead of opening with a burst.
 */
export class RateLimiter {
  private readonly _rate: number;
  private readonly _now: () => number;
  private _tokens = 0;
  private _lastRefill: number;

  /**
   * @param rate Target admissions per second; must be a positive finite number.
   */
  constructor(rate: number, options: RateLimiterOptions = {}) {
    if (!Number.isFinite(rate) || rate <= 0) {
      throw new InvalidConfigurationError(
        `Rate must be a positive number, received ${rate}`,
      );
    }
    this._rate = rate;
    this._now = options.now ?? ((): number => performance.now());
    this._lastRefill = this._now();
  }

  get rate(): number {
    return this._rate;
  }

  getState(): RateLimiterState {
    return {
      rate: this._rate,
      tokens: this._tokens,
      lastRefill: this._lastRefill,
    };
  }

  /**
   * Waits until one token is available and takes it.
   *
   * The refill-and-decide step below runs synchronously, so no other caller
   * can observe or change the balance between the refill and the debit. A
   * caller that has to wait leaves `lastRefill` at the instant its token is
   * fully accrued; callers arriving before that instant queue behind it.
   *
   * @param signal Stops the wait early when aborted. The caller then owns no
   *   token and is expected to check the signal before doing any work.
   * @returns How long the caller waited, in milliseconds.
   */
  async acquire(signal?: AbortSignal): Promise<number> {
    const waitMs = this.reserve();
    if (waitMs > 0) {
      await sleep(waitMs, signal);
    }
    return waitMs;
  }

  private reserve(): number {
    const now = this._now();
    const elapsedMs = now - this._lastRefill;

    if (elapsedMs > 0) {
      this._tokens = Math.min(
        this._rate,
        this._tokens + (elapsedMs * this._rate) / 1000,
      );
      this._lastRefill = now;
    }

    if (elapsedMs >= 0 && this._tokens >= 1) {
      this._tokens -= 1;
      return 0;
    }

    // Either the balance is short of a whole token, or an earlier caller holds
    // a reservation ending at `_lastRefill`. Both wait for the missing part of
    // a token to accrue after that point.
    const readyAt =
      Math.max(now, this._lastRefill) + ((1 - this._tokens) * 1000) / this._rate;
    this._tokens = 0;
    this._lastRefill = readyAt;
    return readyAt - now;
  }
}
