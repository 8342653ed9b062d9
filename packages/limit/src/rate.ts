/**
 * @strata/limit - Rate limit
 *
 * Allows at most `num` calls per `perMs` window on one instance. Clones
 * start with a fresh window. Once the window is spent the service reports
 * pending and a timer wakes the parked poll when the window resets.
 */

import { z } from 'zod';
import {
  ContractViolationError,
  PENDING,
  parseConfig,
  type Context,
  type Readiness,
  type ResponseFuture,
  type Service,
  type Waker,
} from '@strata/service';
import { logger } from '@strata/telemetry';

export const rateSchema = z.object({
  num: z.number().int().positive(),
  perMs: z.number().finite().positive(),
});

export type Rate = z.infer<typeof rateSchema>;

export class RateLimit<Req, Res> implements Service<Req, Res> {
  readonly rate: Rate;
  private windowEnd = 0;
  private remaining = 0;
  private armed = false;
  private timer?: ReturnType<typeof setTimeout>;
  private wakers = new Set<Waker>();

  constructor(
    private readonly inner: Service<Req, Res>,
    rate: Rate
  ) {
    this.rate = parseConfig(rateSchema, rate, 'rate');
  }

  /** Calls left in the current window */
  get remainingCalls(): number {
    this.refill(Date.now());
    return this.remaining;
  }

  pollReady(cx: Context): Readiness {
    const now = Date.now();
    this.refill(now);

    if (this.remaining === 0) {
      this.park(cx.waker, this.windowEnd - now);
      return PENDING;
    }

    const readiness = this.inner.pollReady(cx);
    this.armed = readiness.status === 'ready';
    return readiness;
  }

  call(request: Req): ResponseFuture<Res> {
    this.refill(Date.now());
    if (!this.armed || this.remaining === 0) {
      throw new ContractViolationError();
    }
    this.armed = false;
    this.remaining -= 1;
    return this.inner.call(request);
  }

  clone(): RateLimit<Req, Res> {
    return new RateLimit(this.inner.clone(), this.rate);
  }

  disarm(): void {
    this.armed = false;
    this.inner.disarm();
  }

  private refill(now: number): void {
    if (now >= this.windowEnd) {
      this.windowEnd = now + this.rate.perMs;
      this.remaining = this.rate.num;
    }
  }

  private park(waker: Waker, delayMs: number): void {
    this.wakers.add(waker);
    if (this.timer !== undefined) {
      return;
    }
    logger.trace({ delayMs }, 'Rate limit window spent');
    this.timer = setTimeout(() => {
      this.timer = undefined;
      const wakers = [...this.wakers];
      this.wakers.clear();
      for (const parked of wakers) {
        parked.wake();
      }
    }, delayMs);
  }
}
