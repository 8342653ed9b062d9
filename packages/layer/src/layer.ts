/**
 * Layers
 *
 * A layer turns one service into another when a stack is assembled. It
 * never runs per request, so it does no I/O and holds little or no state.
 */

export interface Layer<In, Out> {
  layer(inner: In): Out;
}

class Identity<S> implements Layer<S, S> {
  layer(inner: S): S {
    return inner;
  }
}

/**
 * Layer that returns the service unchanged.
 */
export function identity<S>(): Layer<S, S> {
  return new Identity<S>();
}

class LayerFn<In, Out> implements Layer<In, Out> {
  constructor(private readonly fn: (inner: In) => Out) {}

  layer(inner: In): Out {
    return this.fn(inner);
  }
}

/**
 * Layer from a function.
 *
 * @example
 * ```typescript
 * const timeouts = layerFn((inner: Service<string, string>) => new Timeout(inner, 500));
 * ```
 */
export function layerFn<In, Out>(fn: (inner: In) => Out): Layer<In, Out> {
  return new LayerFn(fn);
}

/**
 * Two layers applied in sequence: `inner` wraps the service first, then
 * `outer` wraps the result.
 */
export class Stack<In, Mid, Out> implements Layer<In, Out> {
  constructor(
    private readonly inner: Layer<In, Mid>,
    private readonly outer: Layer<Mid, Out>
  ) {}

  layer(service: In): Out {
    return this.outer.layer(this.inner.layer(service));
  }
}
