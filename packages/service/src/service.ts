/**
 * The capability contract
 *
 * A service turns a request into a cancellable pending response. Before
 * every call the caller asks `pollReady` whether the service can take one
 * more request right now; a `ready` answer reserves capacity for exactly
 * one `call`.
 *
 * @example
 * ```typescript
 * await ready(svc);
 * const response = await svc.call(request);
 * ```
 */

import type { ResponseFuture } from './future.js';
import type { Context, Readiness } from './readiness.js';

export interface Service<Req, Res> {
  /**
   * Non-blocking readiness check, safe to repeat.
   *
   * - `ready`: capacity reserved for one `call`
   * - `pending`: the service will wake `cx.waker` when worth polling again
   * - `failed`: permanent, discard the service
   */
  pollReady(cx: Context): Readiness;

  /**
   * Issue one request. Calling without a prior `ready` is a contract
   * violation. The returned future may fail on its own without making the
   * service unusable.
   */
  call(request: Req): ResponseFuture<Res>;

  /**
   * Shallow copy for an independent call site. Clones share cross-clone
   * resources but never a reservation.
   */
  clone(): Service<Req, Res>;

  /**
   * Give back a reservation from a `ready` that will not be followed by a
   * `call`. No-op when nothing is reserved.
   */
  disarm(): void;
}

