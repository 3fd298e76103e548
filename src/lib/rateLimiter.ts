import { Mutex } from "./mutex";
import { sleep } from "./retry";

export type Clock = {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
};

const systemClock: Clock = { now: () => Date.now(), sleep };

/**
 * Minimum spacing between consecutive API calls. The "last call" timestamp is
 * shared by every caller of one instance, so waits are taken one at a time.
 */
export class RateLimiter {
  private lastCallAt: number | null = null;
  private readonly mutex = new Mutex();

  constructor(
    private readonly delayMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  static fromSeconds(delaySeconds: number, clock?: Clock): RateLimiter {
    return new RateLimiter(Math.max(0, Math.round(delaySeconds * 1000)), clock);
  }

  wait(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      if (this.delayMs > 0 && this.lastCallAt !== null) {
        const remaining = this.delayMs - (this.clock.now() - this.lastCallAt);
        if (remaining > 0) await this.clock.sleep(remaining);
      }
      this.lastCallAt = this.clock.now();
    });
  }
}
