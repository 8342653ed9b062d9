/**
 * @strata/layer
 *
 * Construction-time transformers from one service to another.
 *
 * @packageDocumentation
 */

export type { Layer } from './layer.js';
export { identity, layerFn, Stack } from './layer.js';
