/**
 * @strata/load-shed
 *
 * Turns backpressure into immediate `OverloadedError` failures.
 *
 * @packageDocumentation
 */

export { LoadShed, LoadShedLayer, OverloadedError } from './load-shed.js';
