/**
 * Readiness signalling
 *
 * `pollReady` never blocks. It answers with one of three states, and when
 * it answers `pending` the service keeps the caller's waker and wakes it
 * once the blocking condition may have cleared.
 */

import { intoError } from './errors.js';

export type Readiness =
  | { readonly status: 'ready' }
  | { readonly status: 'pending' }
  | { readonly status: 'failed'; readonly error: Error };

export const READY: Readiness = Object.freeze({ status: 'ready' });

export const PENDING: Readiness = Object.freeze({ status: 'pending' });

/**
 * Permanent failure: the service must be discarded.
 */
export function failed(error: unknown): Readiness {
  return { status: 'failed', error: intoError(error) };
}

/**
 * Notification handle for a pending poll.
 *
 * Waking is idempotent: only the first `wake()` reaches the callback.
 */
export class Waker {
  private woken = false;

  constructor(private readonly onWake: () => void) {}

  wake(): void {
    if (this.woken) {
      return;
    }
    this.woken = true;
    this.onWake();
  }

  get isWoken(): boolean {
    return this.woken;
  }
}

/**
 * Per-poll context handed to `pollReady`.
 */
export interface Context {
  readonly waker: Waker;
}

export function contextFrom(onWake: () => void): Context {
  return { waker: new Waker(onWake) };
}

/**
 * Context whose waker does nothing, for one-off polls that will not wait.
 */
export function noopContext(): Context {
  return contextFrom(() => undefined);
}
