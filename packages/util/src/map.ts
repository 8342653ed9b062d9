/**
 * @strata/util - Mapping middleware
 *
 * Adapt a service's request, response or error types. Readiness and
 * `disarm` pass straight through.
 */

import {
  ResponseFuture,
  failed,
  type Context,
  type Readiness,
  type Service,
} from '@strata/service';

export class MapRequest<In, Req, Res> implements Service<In, Res> {
  constructor(
    private readonly inner: Service<Req, Res>,
    private readonly fn: (request: In) => Req
  ) {}

  pollReady(cx: Context): Readiness {
    return this.inner.pollReady(cx);
  }

  call(request: In): ResponseFuture<Res> {
    let mapped: Req;
    try {
      mapped = this.fn(request);
    } catch (error) {
      this.inner.disarm();
      return ResponseFuture.reject(error);
    }
    return this.inner.call(mapped);
  }

  clone(): MapRequest<In, Req, Res> {
    return new MapRequest(this.inner.clone(), this.fn);
  }

  disarm(): void {
    this.inner.disarm();
  }
}

export class MapResponse<Req, Res, Out> implements Service<Req, Out> {
  constructor(
    private readonly inner: Service<Req, Res>,
    private readonly fn: (response: Res) => Out
  ) {}

  pollReady(cx: Context): Readiness {
    return this.inner.pollReady(cx);
  }

  call(request: Req): ResponseFuture<Out> {
    return this.inner.call(request).map(this.fn);
  }

  clone(): MapResponse<Req, Res, Out> {
    return new MapResponse(this.inner.clone(), this.fn);
  }

  disarm(): void {
    this.inner.disarm();
  }
}

/**
 * Replaces every error the inner service produces, readiness failures
 * included.
 */
export class MapErr<Req, Res> implements Service<Req, Res> {
  constructor(
    private readonly inner: Service<Req, Res>,
    private readonly fn: (error: Error) => Error
  ) {}

  pollReady(cx: Context): Readiness {
    const readiness = this.inner.pollReady(cx);
    if (readiness.status === 'failed') {
      return failed(this.fn(readiness.error));
    }
    return readiness;
  }

  call(request: Req): ResponseFuture<Res> {
    return this.inner.call(request).map(
      (response) => response,
      (error) => {
        throw this.fn(error);
      }
    );
  }

  clone(): MapErr<Req, Res> {
    return new MapErr(this.inner.clone(), this.fn);
  }

  disarm(): void {
    this.inner.disarm();
  }
}

export class MapRequestLayer<In, Req> {
  constructor(private readonly fn: (request: In) => Req) {}

  layer<Res>(inner: Service<Req, Res>): MapRequest<In, Req, Res> {
    return new MapRequest(inner, this.fn);
  }
}

export class MapResponseLayer<Res, Out> {
  constructor(private readonly fn: (response: Res) => Out) {}

  layer<Req>(inner: Service<Req, Res>): MapResponse<Req, Res, Out> {
    return new MapResponse(inner, this.fn);
  }
}

export class MapErrLayer {
  constructor(private readonly fn: (error: Error) => Error) {}

  layer<Req, Res>(inner: Service<Req, Res>): MapErr<Req, Res> {
    return new MapErr(inner, this.fn);
  }
}
