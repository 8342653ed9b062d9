/**
 * Cancellable pending response
 *
 * A `ResponseFuture` is what `call` hands back. The work starts at once and
 * the future settles exactly once: with the response, with an `Error`, or
 * with a `CancelledError` when `cancel()` runs first.
 *
 * Cancelling aborts the signal given to the work and runs the registered
 * release hooks before `cancel()` returns. Release hooks also run, once,
 * when the future settles on its own. Hooks must not throw.
 */

import { CancelledError, intoError } from './errors.js';

export type FutureStatus = 'pending' | 'fulfilled' | 'rejected' | 'cancelled';

type Release = () => void;

function ignoreCancellation(error: unknown): void {
  if (!(error instanceof CancelledError)) {
    throw error;
  }
}

export class ResponseFuture<T> implements PromiseLike<T> {
  private readonly controller = new AbortController();
  private readonly releases: Release[] = [];
  private readonly promise: Promise<T>;
  private state: FutureStatus = 'pending';
  private resolvePromise: (value: T) => void = () => undefined;
  private rejectPromise: (error: Error) => void = () => undefined;

  private constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolvePromise = resolve;
      this.rejectPromise = reject;
    });
  }

  /**
   * Start `work` and track it. `work` receives the signal that aborts when
   * the future is cancelled.
   */
  static from<T>(work: (signal: AbortSignal) => T | PromiseLike<T>): ResponseFuture<T> {
    const future = new ResponseFuture<T>();
    let pending: Promise<T>;
    try {
      pending = Promise.resolve(work(future.signal));
    } catch (error) {
      future.fail(error);
      return future;
    }
    pending.then(
      (value) => future.succeed(value),
      (error: unknown) => future.fail(error)
    );
    return future;
  }

  static resolve<T>(value: T): ResponseFuture<T> {
    const future = new ResponseFuture<T>();
    future.succeed(value);
    return future;
  }

  static reject<T = never>(error: unknown): ResponseFuture<T> {
    const future = new ResponseFuture<T>();
    future.fail(error);
    return future;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get status(): FutureStatus {
    return this.state;
  }

  get isSettled(): boolean {
    return this.state !== 'pending';
  }

  /**
   * Register a hook that releases a resource held for this request.
   * Runs immediately when the future has already settled.
   */
  onRelease(release: Release): this {
    if (this.state === 'pending') {
      this.releases.push(release);
    } else {
      release();
    }
    return this;
  }

  /**
   * Drop the request. No-op once settled.
   */
  cancel(reason = 'response future cancelled'): void {
    if (this.state !== 'pending') {
      return;
    }
    this.state = 'cancelled';
    const error = new CancelledError(reason);
    this.controller.abort(error);
    this.runReleases();
    // Nobody is expected to await a dropped future
    void this.promise.then(undefined, ignoreCancellation);
    this.rejectPromise(error);
  }

  /**
   * Derive a future from this one's outcome. Cancelling the derived future
   * cancels this one.
   */
  map<U>(
    onValue: (value: T) => U | PromiseLike<U>,
    onError?: (error: Error) => U | PromiseLike<U>
  ): ResponseFuture<U> {
    const mapped = ResponseFuture.from<U>(() =>
      this.promise.then(
        onValue,
        onError === undefined ? undefined : (error: unknown) => onError(intoError(error))
      )
    );
    mapped.onRelease(() => this.cancel('derived future settled'));
    return mapped;
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.promise.then(onfulfilled, onrejected);
  }

  private succeed(value: T): void {
    if (this.state !== 'pending') {
      return;
    }
    this.state = 'fulfilled';
    this.runReleases();
    this.resolvePromise(value);
  }

  private fail(error: unknown): void {
    if (this.state !== 'pending') {
      return;
    }
    this.state = 'rejected';
    this.runReleases();
    this.rejectPromise(intoError(error));
  }

  private runReleases(): void {
    const releases = this.releases.splice(0);
    for (const release of releases) {
      release();
    }
  }
}
