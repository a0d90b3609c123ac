import { RetrySettings } from './config.js';
import { sleep } from '../utils/async.js';

/**
 * Exponential backoff with optional jitter, bounded by a maximum number of attempts.
 * One instance is shared by every request the fetcher makes.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly factor: number;
  readonly jitter: number;

  constructor(
    settings: RetrySettings,
    private readonly random: () => number = Math.random
  ) {
    this.maxAttempts = settings.maxAttempts;
    this.baseDelayMs = settings.baseDelayMs;
    this.maxDelayMs = settings.maxDelayMs;
    this.factor = settings.factor;
    this.jitter = settings.jitter;
  }

  /**
   * Whether another attempt is allowed after the given (1-based) attempt failed
   */
  canRetry(attempt: number): boolean {
    return attempt < this.maxAttempts;
  }

  /**
   * Delay before the attempt following the given (1-based) failed attempt
   */
  delayFor(attempt: number): number {
    const exponential = this.baseDelayMs * Math.pow(this.factor, Math.max(0, attempt - 1));
    const capped = Math.min(exponential, this.maxDelayMs);
    if (this.jitter === 0) {
      return capped;
    }
    const spread = capped * this.jitter;
    const jittered = capped - spread + this.random() * spread * 2;
    return Math.max(0, Math.min(Math.round(jittered), this.maxDelayMs));
  }

  /**
   * Wait out the backoff for the given attempt; rejects if the signal aborts
   */
  wait(attempt: number, signal?: AbortSignal): Promise<void> {
    return sleep(this.delayFor(attempt), signal);
  }
}
