/**
 * @strata/core
 *
 * Composable request handling with backpressure, cancellation and
 * timeouts. Re-exports every Strata package and adds the service builder
 * and stack configuration.
 *
 * @example
 * ```typescript
 * import { ServiceBuilder, loadStackConfig, oneshot } from '@strata/core';
 *
 * const svc = ServiceBuilder.fromConfig<Query, Rows>(loadStackConfig()).service(database);
 * const rows = await oneshot(svc, query);
 * ```
 *
 * @packageDocumentation
 */

export type { StackConfig } from './config.js';

export { ServiceBuilder } from './builder.js';
export { stackConfigSchema, validateStackConfig, loadStackConfig } from './config.js';

export * from '@strata/service';
export * from '@strata/layer';
export * from '@strata/telemetry';
export * from '@strata/timeout';
export * from '@strata/limit';
export * from '@strata/load-shed';
export * from '@strata/buffer';
export * from '@strata/retry';
export * from '@strata/util';
