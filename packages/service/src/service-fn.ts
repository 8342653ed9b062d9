/**
 * Leaf service from a plain async function.
 */

import { ResponseFuture } from './future.js';
import { READY, type Readiness } from './readiness.js';
import type { Service } from './service.js';

export type Handler<Req, Res> = (request: Req, signal: AbortSignal) => Res | PromiseLike<Res>;

/**
 * Always ready. The handler's signal aborts when the response future is
 * cancelled.
 */
export class ServiceFn<Req, Res> implements Service<Req, Res> {
  constructor(private readonly handler: Handler<Req, Res>) {}

  pollReady(): Readiness {
    return READY;
  }

  call(request: Req): ResponseFuture<Res> {
    return ResponseFuture.from((signal) => this.handler(request, signal));
  }

  clone(): ServiceFn<Req, Res> {
    return new ServiceFn(this.handler);
  }

  disarm(): void {
    // Nothing is reserved
  }
}

export function serviceFn<Req, Res>(handler: Handler<Req, Res>): ServiceFn<Req, Res> {
  return new ServiceFn(handler);
}
