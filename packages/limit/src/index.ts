/**
 * @strata/limit
 *
 * Middleware that bounds how much work reaches the inner service.
 *
 * This package provides:
 * - `Semaphore` and `Permit`: poll-driven permits shared across clones
 * - `ConcurrencyLimit`: caps in-flight requests
 * - `RateLimit`: caps calls per time window
 *
 * @example
 * ```typescript
 * import { ConcurrencyLimitLayer } from '@strata/limit';
 *
 * const limited = new ConcurrencyLimitLayer(10).layer(backend);
 * ```
 *
 * @packageDocumentation
 */

export type { Rate } from './rate.js';

export { Semaphore, Permit, permitsSchema } from './semaphore.js';
export { ConcurrencyLimit } from './concurrency.js';
export { RateLimit, rateSchema } from './rate.js';
export { ConcurrencyLimitLayer, GlobalConcurrencyLimitLayer, RateLimitLayer } from './layer.js';
