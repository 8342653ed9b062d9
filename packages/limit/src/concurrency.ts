/**
 * @strata/limit - Concurrency limit
 *
 * Bounds the number of in-flight requests across every clone of a service.
 * Clones share one semaphore; each clone reserves one permit in `pollReady`
 * and hands it to the response future in `call`. The permit goes back when
 * the response settles, when the future is cancelled, or on `disarm`.
 */

import {
  ContractViolationError,
  PENDING,
  type Context,
  type Readiness,
  type ResponseFuture,
  type Service,
} from '@strata/service';
import { logger } from '@strata/telemetry';
import { Semaphore, type Permit } from './semaphore.js';

export class ConcurrencyLimit<Req, Res> implements Service<Req, Res> {
  private readonly semaphore: Semaphore;
  private permit?: Permit;

  /**
   * @param limit - Maximum in-flight requests, or a semaphore to share
   * with other services
   */
  constructor(
    private readonly inner: Service<Req, Res>,
    limit: number | Semaphore
  ) {
    this.semaphore = typeof limit === 'number' ? new Semaphore(limit) : limit;
  }

  get maxConcurrency(): number {
    return this.semaphore.permits;
  }

  /** Permits free across all clones */
  get available(): number {
    return this.semaphore.available;
  }

  pollReady(cx: Context): Readiness {
    if (this.permit === undefined) {
      const permit = this.semaphore.pollAcquire(cx);
      if (permit === undefined) {
        logger.trace({ max: this.semaphore.permits }, 'Concurrency limit reached');
        return PENDING;
      }
      this.permit = permit;
    }

    const readiness = this.inner.pollReady(cx);
    if (readiness.status === 'failed') {
      this.releasePermit();
    }
    return readiness;
  }

  call(request: Req): ResponseFuture<Res> {
    const permit = this.permit;
    if (permit === undefined) {
      throw new ContractViolationError();
    }
    this.permit = undefined;

    let response: ResponseFuture<Res>;
    try {
      response = this.inner.call(request);
    } catch (error) {
      permit.release();
      throw error;
    }
    return response.onRelease(() => permit.release());
  }

  clone(): ConcurrencyLimit<Req, Res> {
    return new ConcurrencyLimit(this.inner.clone(), this.semaphore);
  }

  disarm(): void {
    this.releasePermit();
    this.inner.disarm();
  }

  private releasePermit(): void {
    this.permit?.release();
    this.permit = undefined;
  }
}
