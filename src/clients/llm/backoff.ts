import { errorStatus, isRateLimitError } from '../../utils/errors.js';
import type { StageLogger } from '../../utils/logger.js';

const MAX_WAIT_SECONDS = 60;

export interface RateLimitClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

const systemClock: RateLimitClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Request gate shared by every call of one client
 *
 * Callers pass one at a time through a mutex chain. Each waits for the
 * minimum spacing between requests and for any backoff window a rate-limited
 * call has opened, so a 429 holds back all concurrent calls, not just the
 * one that hit it.
 */
export class RateLimitGate {
  private mutex: Promise<void> = Promise.resolve();
  private lastRequestTime = Number.NEGATIVE_INFINITY;
  private resumeAt = 0;

  constructor(
    private minDelayMs: number = 0,
    private clock: RateLimitClock = systemClock
  ) {}

  async acquire(): Promise<void> {
    this.mutex = this.mutex.then(async () => {
      const now = this.clock.now();
      const waitTime = Math.max(this.resumeAt - now, this.lastRequestTime + this.minDelayMs - now);
      if (waitTime > 0) {
        await this.clock.sleep(waitTime);
      }
      this.lastRequestTime = this.clock.now();
    });

    await this.mutex;
  }

  /**
   * Hold every caller until `waitMs` from now
   */
  pause(waitMs: number): void {
    this.resumeAt = Math.max(this.resumeAt, this.clock.now() + waitMs);
  }
}

function retryAfterSeconds(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('headers' in error)) {
    return undefined;
  }
  const headers = error.headers;
  let value: unknown;
  if (headers instanceof Headers) {
    value = headers.get('retry-after');
  } else if (typeof headers === 'object' && headers !== null && 'retry-after' in headers) {
    value = headers['retry-after'];
  }
  const seconds = typeof value === 'string' ? parseInt(value, 10) : NaN;
  return Number.isNaN(seconds) ? undefined : seconds;
}

export interface RetryOnRateLimitOptions {
  /** Shared by all calls of a client; a private gate otherwise */
  gate?: RateLimitGate;
  maxRetries?: number;
}

/**
 * Retry `fn` on rate-limit errors only
 *
 * Every attempt goes through the gate. A rate-limited attempt pauses the
 * gate for Retry-After when the provider sends it, otherwise for an
 * exponential backoff (2s, 4s, 8s, ...). Waits are capped at 60 seconds.
 */
export async function retryOnRateLimit<T>(
  fn: () => Promise<T>,
  logger: StageLogger,
  options: RetryOnRateLimitOptions = {}
): Promise<T> {
  const gate = options.gate ?? new RateLimitGate();
  const maxRetries = options.maxRetries ?? 5;

  for (let attempt = 0; ; attempt++) {
    await gate.acquire();
    try {
      return await fn();
    } catch (error) {
      if (!isRateLimitError(error) || attempt >= maxRetries) {
        throw error;
      }

      const retryAfter = retryAfterSeconds(error);
      const waitSeconds = Math.min(retryAfter ?? Math.pow(2, attempt + 1) + Math.random() * 2, MAX_WAIT_SECONDS);

      logger.info('Rate limit hit, backing off', {
        status: errorStatus(error),
        retryAfter,
        waitSeconds: waitSeconds.toFixed(1),
        attempt: attempt + 1,
        maxRetries,
      });

      gate.pause(waitSeconds * 1000);
    }
  }
}
