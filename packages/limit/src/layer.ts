import { parseConfig, type Service } from '@strata/service';
import { ConcurrencyLimit } from './concurrency.js';
import { RateLimit, rateSchema, type Rate } from './rate.js';
import { Semaphore, permitsSchema } from './semaphore.js';

/**
 * Limits each wrapped service to `max` in-flight requests. Every service
 * the layer wraps gets its own semaphore.
 */
export class ConcurrencyLimitLayer {
  readonly max: number;

  constructor(max: number) {
    this.max = parseConfig(permitsSchema, max, 'concurrencyLimit');
  }

  layer<Req, Res>(inner: Service<Req, Res>): ConcurrencyLimit<Req, Res> {
    return new ConcurrencyLimit(inner, new Semaphore(this.max));
  }
}

/**
 * Limits every service the layer wraps through one shared semaphore.
 */
export class GlobalConcurrencyLimitLayer {
  readonly semaphore: Semaphore;

  constructor(max: number) {
    this.semaphore = new Semaphore(max);
  }

  layer<Req, Res>(inner: Service<Req, Res>): ConcurrencyLimit<Req, Res> {
    return new ConcurrencyLimit(inner, this.semaphore);
  }
}

export class RateLimitLayer {
  readonly rate: Rate;

  constructor(rate: Rate) {
    this.rate = parseConfig(rateSchema, rate, 'rateLimit');
  }

  layer<Req, Res>(inner: Service<Req, Res>): RateLimit<Req, Res> {
    return new RateLimit(inner, this.rate);
  }
}
