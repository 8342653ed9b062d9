/**
 * @strata/retry
 *
 * Re-issues failed requests as a policy decides.
 *
 * This package provides:
 * - `Policy`: the retry decision contract
 * - `Attempts`: retry up to a fixed count, with optional backoff
 * - `ExponentialBackoff`: capped exponential delays with jitter
 * - `Retry` middleware and `RetryLayer`
 *
 * @example
 * ```typescript
 * import { Attempts, ExponentialBackoff, RetryLayer } from '@strata/retry';
 *
 * const policy = new Attempts<Req, Res>(3, {
 *   backoff: new ExponentialBackoff({ initialDelayMs: 50, maxDelayMs: 1000 }),
 * });
 * const svc = new RetryLayer(policy).layer(backend);
 * ```
 *
 * @packageDocumentation
 */

export type { Outcome, Policy } from './policy.js';
export type { AttemptsOptions } from './attempts.js';
export type { BackoffOptions } from './backoff.js';

export { Attempts } from './attempts.js';
export { ExponentialBackoff, backoffSchema, sleep } from './backoff.js';
export { Retry, RetryLayer } from './retry.js';
