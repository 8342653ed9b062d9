/**
 * @strata/retry - Retry middleware
 *
 * The first attempt goes to the instance the caller polled. Later attempts
 * go to a clone of it, polled for readiness again before every retry. The
 * policy sees every outcome and decides whether another attempt follows;
 * the last outcome is what the caller gets.
 */

import {
  CancelledError,
  ResponseFuture,
  intoError,
  ready,
  type Context,
  type Readiness,
  type Service,
} from '@strata/service';
import type { Outcome, Policy } from './policy.js';

function settle<Res>(response: ResponseFuture<Res>): Promise<Outcome<Res>> {
  return response.then(
    (value): Outcome<Res> => ({ status: 'ok', response: value }),
    (error: unknown): Outcome<Res> => ({ status: 'error', error: intoError(error) })
  );
}

function unwrap<Res>(outcome: Outcome<Res>): Res {
  if (outcome.status === 'error') {
    throw outcome.error;
  }
  return outcome.response;
}

export class Retry<Req, Res> implements Service<Req, Res> {
  constructor(
    private readonly inner: Service<Req, Res>,
    readonly policy: Policy<Req, Res>
  ) {}

  pollReady(cx: Context): Readiness {
    return this.inner.pollReady(cx);
  }

  call(request: Req): ResponseFuture<Res> {
    const original = this.policy.cloneRequest(request);
    const first = this.inner.call(request);
    if (original === undefined) {
      return first;
    }
    const service = this.inner.clone();
    return ResponseFuture.from((signal) => this.drive(first, original, service, signal));
  }

  clone(): Retry<Req, Res> {
    return new Retry(this.inner.clone(), this.policy);
  }

  disarm(): void {
    this.inner.disarm();
  }

  private async drive(
    first: ResponseFuture<Res>,
    request: Req,
    service: Service<Req, Res>,
    signal: AbortSignal
  ): Promise<Res> {
    let current = first;
    let policy = this.policy;
    const onAbort = (): void => current.cancel('retry cancelled');
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      for (;;) {
        const outcome = await settle(current);
        if (signal.aborted) {
          throw new CancelledError('retry cancelled');
        }

        const decision = policy.retry(request, outcome, signal);
        if (decision === undefined) {
          return unwrap(outcome);
        }
        let next: Policy<Req, Res>;
        try {
          next = await decision;
        } catch (error) {
          if (signal.aborted) {
            throw intoError(error);
          }
          return unwrap(outcome);
        }

        const copy = next.cloneRequest(request);
        await ready(service, signal);
        current = service.call(copy ?? request);
        policy = next;
        if (copy === undefined) {
          // The request is spent; this attempt is the last
          return await current;
        }
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

export class RetryLayer<Req, Res> {
  constructor(readonly policy: Policy<Req, Res>) {}

  layer(inner: Service<Req, Res>): Retry<Req, Res> {
    return new Retry(inner, this.policy);
  }
}
