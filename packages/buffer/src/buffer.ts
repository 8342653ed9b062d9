/**
 * @strata/buffer - Buffered service handle
 *
 * `Buffer` is the caller side of a `BufferWorker`. Clones share the worker
 * and its bounded queue. `pollReady` reserves one queue slot, so callers see
 * backpressure once `bound` requests are waiting for dispatch.
 */

import { permitsSchema, type Permit } from '@strata/limit';
import {
  ContractViolationError,
  PENDING,
  READY,
  ResponseFuture,
  failed,
  parseConfig,
  type Context,
  type Readiness,
  type Service,
} from '@strata/service';
import { BufferWorker } from './worker.js';

export class Buffer<Req, Res> implements Service<Req, Res> {
  private permit?: Permit;

  constructor(private readonly worker: BufferWorker<Req, Res>) {}

  get bound(): number {
    return this.worker.bound;
  }

  pollReady(cx: Context): Readiness {
    const error = this.worker.error;
    if (error) {
      this.releasePermit();
      return failed(error);
    }
    if (this.permit === undefined) {
      this.permit = this.worker.slots.pollAcquire(cx);
      if (this.permit === undefined) {
        this.worker.park(cx.waker);
        return PENDING;
      }
    }
    return READY;
  }

  call(request: Req): ResponseFuture<Res> {
    const permit = this.permit;
    if (permit === undefined) {
      throw new ContractViolationError();
    }
    this.permit = undefined;

    return ResponseFuture.from(
      (signal) =>
        new Promise<Res>((resolve, reject) => {
          this.worker.enqueue({ request, signal, permit, resolve, reject });
        })
    );
  }

  clone(): Buffer<Req, Res> {
    return new Buffer(this.worker);
  }

  disarm(): void {
    this.releasePermit();
  }

  /**
   * Stop the shared worker. See `BufferWorker.close`.
   */
  close(): void {
    this.worker.close();
  }

  private releasePermit(): void {
    this.permit?.release();
    this.permit = undefined;
  }
}

/**
 * Move `inner` into a new worker with room for `bound` queued requests.
 */
export function buffer<Req, Res>(inner: Service<Req, Res>, bound: number): Buffer<Req, Res> {
  return new Buffer(new BufferWorker(inner, bound));
}

/**
 * Gives every wrapped service its own worker and queue.
 */
export class BufferLayer {
  readonly bound: number;

  constructor(bound: number) {
    this.bound = parseConfig(permitsSchema, bound, 'bufferBound');
  }

  layer<Req, Res>(inner: Service<Req, Res>): Buffer<Req, Res> {
    return buffer(inner, this.bound);
  }
}
