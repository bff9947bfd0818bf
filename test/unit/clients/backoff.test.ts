import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RateLimitGate, retryOnRateLimit } from '../../../src/clients/llm/backoff.js';
import type { RateLimitClock } from '../../../src/clients/llm/backoff.js';
import { StageLogger } from '../../../src/utils/logger.js';

/**
 * Clock whose sleep records the wait and moves time forward at once
 */
function fakeClock(): RateLimitClock & { waits: number[] } {
  let now = 0;
  const waits: number[] = [];
  return {
    waits,
    now: () => now,
    sleep: async (ms: number) => {
      waits.push(ms);
      now += ms;
    },
  };
}

function rateLimited(headers?: Headers | Record<string, string>): Error {
  return Object.assign(new Error('rate limited'), { status: 429, headers });
}

/**
 * Fails with each error in turn, then answers 'ok'
 */
function failingWith(errors: Error[]) {
  let calls = 0;
  const fn = async (): Promise<string> => {
    const error = errors[calls];
    calls++;
    if (error) {
      throw error;
    }
    return 'ok';
  };
  return { fn, calls: () => calls };
}

describe('retryOnRateLimit', () => {
  const logger = new StageLogger('test');

  beforeEach(() => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('waits for Retry-After from a Headers instance', async () => {
    const clock = fakeClock();
    const call = failingWith([rateLimited(new Headers({ 'retry-after': '7' }))]);

    await expect(retryOnRateLimit(call.fn, logger, { gate: new RateLimitGate(0, clock) })).resolves.toBe('ok');
    expect(call.calls()).toBe(2);
    expect(clock.waits).toEqual([7000]);
  });

  it('waits for Retry-After from a plain header object', async () => {
    const clock = fakeClock();
    const call = failingWith([rateLimited({ 'retry-after': '3' })]);

    await retryOnRateLimit(call.fn, logger, { gate: new RateLimitGate(0, clock) });
    expect(clock.waits).toEqual([3000]);
  });

  it('caps the wait at 60 seconds', async () => {
    const clock = fakeClock();
    const call = failingWith([rateLimited({ 'retry-after': '120' })]);

    await retryOnRateLimit(call.fn, logger, { gate: new RateLimitGate(0, clock) });
    expect(clock.waits).toEqual([60000]);
  });

  it('rethrows other errors without retrying', async () => {
    const clock = fakeClock();
    const badRequest = Object.assign(new Error('bad request'), { status: 400 });
    const call = failingWith([badRequest]);

    await expect(retryOnRateLimit(call.fn, logger, { gate: new RateLimitGate(0, clock) })).rejects.toBe(badRequest);
    expect(call.calls()).toBe(1);
    expect(clock.waits).toEqual([]);
  });

  it('backs off exponentially and gives up after maxRetries', async () => {
    const clock = fakeClock();
    const error = rateLimited();
    const call = failingWith([error, error, error, error]);

    await expect(
      retryOnRateLimit(call.fn, logger, { gate: new RateLimitGate(0, clock), maxRetries: 2 })
    ).rejects.toBe(error);
    expect(call.calls()).toBe(3);
    expect(clock.waits).toEqual([2000, 4000]);
  });
});

describe('RateLimitGate', () => {
  it('holds every caller through a pause, then spaces them out', async () => {
    const clock = fakeClock();
    const gate = new RateLimitGate(1000, clock);

    gate.pause(5000);
    await Promise.all([gate.acquire(), gate.acquire()]);

    expect(clock.waits).toEqual([5000, 1000]);
  });

  it('lets the first request through at once', async () => {
    const clock = fakeClock();
    const gate = new RateLimitGate(1000, clock);

    await gate.acquire();
    expect(clock.waits).toEqual([]);
  });
});
