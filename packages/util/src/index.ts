/**
 * @strata/util
 *
 * Small adapters between services.
 *
 * This package provides:
 * - `MapRequest`, `MapResponse`, `MapErr` and their layers
 * - `Filter` and `FilterLayer`, failing rejected requests with `RejectedError`
 *
 * @packageDocumentation
 */

export type { Predicate } from './filter.js';

export { MapRequest, MapResponse, MapErr, MapRequestLayer, MapResponseLayer, MapErrLayer } from './map.js';
export { Filter, FilterLayer, RejectedError } from './filter.js';
