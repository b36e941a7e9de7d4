import { describe, it, expect } from 'vitest';
import { FetchThrottle } from '../throttle.js';

function makeThrottle(start = 1000) {
  let now = start;
  const throttle = new FetchThrottle({ intervalSec: 60, backoffFactor: 2, now: () => now });
  return {
    throttle,
    setNow: (t: number) => {
      now = t;
    },
  };
}

describe('FetchThrottle', () => {
  it('is due before the first fetch', () => {
    const { throttle } = makeThrottle();
    expect(throttle.isDue()).toBe(true);
    expect(throttle.lastFetchAt).toBe(0);
  });

  it('waits one interval after a success', () => {
    const { throttle, setNow } = makeThrottle();
    throttle.recordSuccess();
    setNow(1059);
    expect(throttle.isDue()).toBe(false);
    setNow(1060);
    expect(throttle.isDue()).toBe(true);
  });

  it('backs off exponentially on consecutive failures', () => {
    const { throttle, setNow } = makeThrottle();

    expect(throttle.recordFailure()).toBe(120);
    expect(throttle.errors).toBe(1);
    setNow(1119);
    expect(throttle.isDue()).toBe(false);
    setNow(1120);
    expect(throttle.isDue()).toBe(true);

    expect(throttle.recordFailure()).toBe(240);
    setNow(1359);
    expect(throttle.isDue()).toBe(false);
    setNow(1360);
    expect(throttle.isDue()).toBe(true);
  });

  it('clears the error count on success', () => {
    const { throttle } = makeThrottle();
    throttle.recordFailure();
    throttle.recordFailure();
    throttle.recordSuccess();
    expect(throttle.errors).toBe(0);
  });

  it('reset makes it due immediately', () => {
    const { throttle } = makeThrottle();
    throttle.recordFailure();
    throttle.reset();
    expect(throttle.isDue()).toBe(true);
  });

  it('follows interval changes', () => {
    const { throttle, setNow } = makeThrottle();
    throttle.recordSuccess();
    throttle.setInterval(600);
    setNow(1599);
    expect(throttle.isDue()).toBe(false);
    expect(throttle.interval).toBe(600);
  });
});
