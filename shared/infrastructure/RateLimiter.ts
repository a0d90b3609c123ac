import { AbortedError, sleep } from '../utils/async.js';

/**
 * Enforces a minimum interval between request starts, shared by every worker.
 * Slots are handed out in call order, so concurrent callers never start closer
 * together than the configured delay.
 */
export class RateLimiter {
  private nextSlot = 0;

  /**
   * Create a new rate limiter
   * @param delay Minimum delay between request starts in milliseconds
   * @param now Clock, replaceable in tests
   */
  constructor(
    private readonly delay: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Wait for the next available slot. Rejects with AbortedError if the signal fires;
   * the reserved slot is then given back.
   */
  async waitForNextSlot(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new AbortedError();
    }
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.delay;

    const waitTime = slot - now;
    if (waitTime <= 0) {
      return;
    }
    try {
      await sleep(waitTime, signal);
    } catch (error) {
      if (this.nextSlot === slot + this.delay) {
        this.nextSlot = slot;
      }
      throw error;
    }
  }
}
