/**
 * @strata/telemetry
 *
 * Logging and telemetry for Strata services.
 *
 * This package provides:
 * - The shared pino logger and `createLogger`
 * - Telemetry provider interfaces and a no-op provider
 * - Provider registry for global telemetry configuration
 * - `Trace` middleware reporting each request's outcome and duration
 *
 * @example
 * ```typescript
 * import { setTelemetryProvider, TraceLayer } from '@strata/telemetry';
 *
 * setTelemetryProvider(myProvider);
 * const traced = new TraceLayer({ name: 'users' }).layer(usersService);
 * ```
 *
 * @packageDocumentation
 */

// Types
export type {
  RequestOutcome,
  RequestStartedInput,
  RequestFinishedInput,
  TelemetryProvider,
} from './types.js';
export type { TraceOptions } from './trace.js';

// Logging
export { logger, createLogger, type Logger } from './logger.js';

// No-op provider
export { noopProvider } from './noop.js';

// Provider registry
export {
  providerRef,
  setTelemetryProvider,
  getTelemetryProvider,
  isTelemetryEnabled,
  emit,
} from './provider.js';

// Attribute constants
export { STRATA_ATTRS, STRATA_EVENTS } from './attributes.js';

// Middleware
export { Trace, TraceLayer } from './trace.js';
