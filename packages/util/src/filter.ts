/**
 * @strata/util - Request filter
 *
 * Checks each request with a predicate before it reaches the inner
 * service. A rejected request fails with `RejectedError`, or with whatever
 * the predicate threw, and the inner reservation is given back.
 *
 * The predicate may be asynchronous. While it runs the reserved instance
 * is set aside and `Filter` carries on with a fresh clone, so a slow check
 * never holds up the next caller.
 */

import {
  CancelledError,
  ErrorCodes,
  ResponseFuture,
  StrataError,
  type Context,
  type Readiness,
  type Service,
} from '@strata/service';
import { logger } from '@strata/telemetry';

export type Predicate<Req> = (request: Req) => boolean | PromiseLike<boolean>;

export class RejectedError extends StrataError {
  constructor(message = 'request rejected by filter') {
    super(ErrorCodes.REJECTED, message);
    this.name = 'RejectedError';
  }
}

function isPending(verdict: boolean | PromiseLike<boolean>): verdict is PromiseLike<boolean> {
  return typeof verdict !== 'boolean';
}

export class Filter<Req, Res> implements Service<Req, Res> {
  constructor(
    private inner: Service<Req, Res>,
    private readonly predicate: Predicate<Req>
  ) {}

  pollReady(cx: Context): Readiness {
    return this.inner.pollReady(cx);
  }

  call(request: Req): ResponseFuture<Res> {
    const reserved = this.inner;

    let verdict: boolean | PromiseLike<boolean>;
    try {
      verdict = this.predicate(request);
    } catch (error) {
      reserved.disarm();
      return ResponseFuture.reject(error);
    }

    if (!isPending(verdict)) {
      return this.decide(reserved, request, verdict);
    }

    const pending = verdict;
    this.inner = reserved.clone();
    return ResponseFuture.from<Res>(async (signal) => {
      const onAbort = (): void => reserved.disarm();
      signal.addEventListener('abort', onAbort, { once: true });
      let accepted: boolean;
      try {
        accepted = await pending;
      } catch (error) {
        reserved.disarm();
        throw error;
      } finally {
        signal.removeEventListener('abort', onAbort);
      }
      if (signal.aborted) {
        throw new CancelledError('filter cancelled');
      }

      const response = this.decide(reserved, request, accepted);
      signal.addEventListener('abort', () => response.cancel('filter cancelled'), { once: true });
      return response;
    });
  }

  clone(): Filter<Req, Res> {
    return new Filter(this.inner.clone(), this.predicate);
  }

  disarm(): void {
    this.inner.disarm();
  }

  private decide(reserved: Service<Req, Res>, request: Req, accepted: boolean): ResponseFuture<Res> {
    if (!accepted) {
      logger.debug('Request rejected by filter');
      reserved.disarm();
      return ResponseFuture.reject(new RejectedError());
    }
    return reserved.call(request);
  }
}

export class FilterLayer<Req> {
  constructor(private readonly predicate: Predicate<Req>) {}

  layer<Res>(inner: Service<Req, Res>): Filter<Req, Res> {
    return new Filter(inner, this.predicate);
  }
}
