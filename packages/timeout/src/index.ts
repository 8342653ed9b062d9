/**
 * @strata/timeout
 *
 * Per-request deadlines. A request that outlives its deadline fails with
 * `ElapsedError` and its inner work is cancelled.
 *
 * @example
 * ```typescript
 * import { TimeoutLayer, ElapsedError } from '@strata/timeout';
 * import { downcast, oneshot } from '@strata/service';
 *
 * const svc = new TimeoutLayer(250).layer(backend);
 * try {
 *   await oneshot(svc, request);
 * } catch (e) {
 *   if (downcast(e, ElapsedError)) {
 *     // slow backend
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 */

export type { RaceState } from './timeout.js';
export { Timeout, race, durationSchema } from './timeout.js';
export { TimeoutLayer } from './layer.js';
export { ElapsedError } from './errors.js';
