/**
 * @strata/service
 *
 * The capability contract every Strata middleware builds on.
 *
 * This package provides:
 * - `Service`: readiness-checked, cancellable request handling
 * - Readiness states and the waker used to resume a pending poll
 * - `ResponseFuture`: the cancellable pending response
 * - Error codes and the erased-error helpers (`intoError`, `downcast`)
 * - Drivers: `ready`, `oneshot`, `callAll`
 * - `ConfigError` and `parseConfig` for middleware options
 *
 * @example
 * ```typescript
 * import { serviceFn, oneshot } from '@strata/service';
 *
 * const echo = serviceFn(async (name: string) => `hello ${name}`);
 * const greeting = await oneshot(echo, 'world');
 * ```
 *
 * @packageDocumentation
 */

// Types
export type { Service } from './service.js';
export type { Readiness, Context } from './readiness.js';
export type { FutureStatus } from './future.js';
export type { ErrorCode, ErrorDefinition, ErrorKind } from './errors.js';
export type { Handler } from './service-fn.js';
export type { ConfigValidationError } from './config.js';

// Readiness
export { READY, PENDING, failed, Waker, contextFrom, noopContext } from './readiness.js';

// Pending responses
export { ResponseFuture } from './future.js';

// Errors
export {
  ErrorCodes,
  ERRORS,
  StrataError,
  ContractViolationError,
  CancelledError,
  ServiceFailedError,
  intoError,
  downcast,
  isErrorKind,
} from './errors.js';

// Option validation
export { ConfigError, parseConfig } from './config.js';

// Drivers
export { ready, oneshot, callAll } from './ready.js';

// Leaf services
export { ServiceFn, serviceFn } from './service-fn.js';
