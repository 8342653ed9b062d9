/**
 * @strata/buffer
 *
 * Moves a service behind a bounded queue drained by a worker, so that
 * many clones can share one inner service that cannot itself be cloned.
 *
 * @example
 * ```typescript
 * import { buffer } from '@strata/buffer';
 *
 * const shared = buffer(connection, 32);
 * const response = await oneshot(shared.clone(), request);
 * ```
 *
 * @packageDocumentation
 */

export type { Message } from './worker.js';

export { Buffer, BufferLayer, buffer } from './buffer.js';
export { BufferWorker } from './worker.js';
export { BufferClosedError } from './errors.js';
