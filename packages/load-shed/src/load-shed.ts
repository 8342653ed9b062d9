/**
 * @strata/load-shed - Shed load instead of waiting
 *
 * `LoadShed` always reports ready unless the inner service failed. When the
 * inner service was not ready at poll time, the next `call` fails at once
 * with `OverloadedError` and the inner service never sees the request.
 */

import {
  ErrorCodes,
  READY,
  ResponseFuture,
  StrataError,
  type Context,
  type Readiness,
  type Service,
} from '@strata/service';
import { logger } from '@strata/telemetry';

/**
 * The inner service had no capacity when the request arrived.
 */
export class OverloadedError extends StrataError {
  constructor(message = 'service overloaded') {
    super(ErrorCodes.OVERLOADED, message);
    this.name = 'OverloadedError';
  }
}

export class LoadShed<Req, Res> implements Service<Req, Res> {
  private innerReady = false;

  constructor(private readonly inner: Service<Req, Res>) {}

  pollReady(cx: Context): Readiness {
    const readiness = this.inner.pollReady(cx);
    if (readiness.status === 'failed') {
      this.innerReady = false;
      return readiness;
    }
    this.innerReady = readiness.status === 'ready';
    return READY;
  }

  call(request: Req): ResponseFuture<Res> {
    if (!this.innerReady) {
      logger.debug('Request shed');
      return ResponseFuture.reject(new OverloadedError());
    }
    this.innerReady = false;
    return this.inner.call(request);
  }

  clone(): LoadShed<Req, Res> {
    return new LoadShed(this.inner.clone());
  }

  disarm(): void {
    if (this.innerReady) {
      this.innerReady = false;
      this.inner.disarm();
    }
  }
}

export class LoadShedLayer {
  layer<Req, Res>(inner: Service<Req, Res>): LoadShed<Req, Res> {
    return new LoadShed(inner);
  }
}
