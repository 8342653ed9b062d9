/**
 * @strata/limit - Poll-driven semaphore
 *
 * Permits are taken with `pollAcquire`, which never waits: it either hands
 * out a permit or keeps the caller's waker. Every release wakes all parked
 * callers; whichever polls first gets the permit and the rest park again.
 */

import { z } from 'zod';
import { CancelledError, contextFrom, parseConfig, type Context, type Waker } from '@strata/service';

export const permitsSchema = z.number().int().positive();

export class Permit {
  private released = false;

  constructor(private readonly onRelease: () => void) {}

  /**
   * Give the permit back. Safe to call more than once.
   */
  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.onRelease();
  }

  get isReleased(): boolean {
    return this.released;
  }
}

export class Semaphore {
  readonly permits: number;
  private free: number;
  private waiters = new Set<Waker>();

  constructor(permits: number) {
    this.permits = parseConfig(permitsSchema, permits, 'permits');
    this.free = this.permits;
  }

  /** Permits not currently held */
  get available(): number {
    return this.free;
  }

  /** Callers parked on a pending acquire */
  get waiting(): number {
    return this.waiters.size;
  }

  tryAcquire(): Permit | undefined {
    if (this.free === 0) {
      return undefined;
    }
    this.free -= 1;
    return new Permit(() => this.release());
  }

  /**
   * Take a permit, or register `cx.waker` to be woken on the next release.
   */
  pollAcquire(cx: Context): Permit | undefined {
    const permit = this.tryAcquire();
    if (permit === undefined) {
      this.waiters.add(cx.waker);
    }
    return permit;
  }

  /**
   * Wait for a permit. Rejects with `CancelledError` if `signal` aborts
   * first.
   */
  acquire(signal?: AbortSignal): Promise<Permit> {
    return new Promise<Permit>((resolve, reject) => {
      let waker: Waker | undefined;

      const onAbort = (): void => {
        if (waker) {
          this.waiters.delete(waker);
        }
        reject(new CancelledError('permit wait aborted'));
      };

      const attempt = (): void => {
        if (signal?.aborted) {
          return;
        }
        const cx = contextFrom(attempt);
        const permit = this.pollAcquire(cx);
        if (permit) {
          signal?.removeEventListener('abort', onAbort);
          resolve(permit);
          return;
        }
        waker = cx.waker;
      };

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      attempt();
    });
  }

  private release(): void {
    this.free += 1;
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const waker of waiters) {
      waker.wake();
    }
  }
}
