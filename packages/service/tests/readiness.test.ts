import { describe, it, expect } from 'vitest';
import { PENDING, READY, Waker, contextFrom, failed } from '../src/index.js';

describe('Waker', () => {
  it('should call back only on the first wake', () => {
    let calls = 0;
    const waker = new Waker(() => calls++);

    waker.wake();
    waker.wake();

    expect(calls).toBe(1);
    expect(waker.isWoken).toBe(true);
  });

  it('should give each context its own waker', () => {
    let calls = 0;
    const first = contextFrom(() => calls++);
    const second = contextFrom(() => calls++);

    first.waker.wake();
    second.waker.wake();

    expect(calls).toBe(2);
  });
});

describe('readiness states', () => {
  it('should freeze the shared states', () => {
    expect(Object.isFrozen(READY)).toBe(true);
    expect(Object.isFrozen(PENDING)).toBe(true);
  });

  it('should normalise failure values', () => {
    const readiness = failed('disk gone');

    expect(readiness.status).toBe('failed');
    if (readiness.status === 'failed') {
      expect(readiness.error.message).toBe('non-error value thrown: disk gone');
    }
  });
});
