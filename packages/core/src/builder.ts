/**
 * Service builder
 *
 * Collects layers into one stack. The first layer added is the outermost:
 * it sees each request first and each response last.
 *
 * The four type parameters track the service the stack expects
 * (`InReq`, `InRes`) and the service it produces (`OutReq`, `OutRes`);
 * only the mapping methods make them differ.
 *
 * @example
 * ```typescript
 * const svc = ServiceBuilder.create<Request, Response>()
 *   .trace({ name: 'users' })
 *   .loadShed()
 *   .concurrencyLimit(64)
 *   .timeout(2_000)
 *   .service(usersBackend);
 * ```
 */

import { BufferLayer } from '@strata/buffer';
import { Stack, identity, layerFn, type Layer } from '@strata/layer';
import { ConcurrencyLimitLayer, RateLimitLayer, type Rate } from '@strata/limit';
import { LoadShedLayer } from '@strata/load-shed';
import { RetryLayer, type Policy } from '@strata/retry';
import type { Service } from '@strata/service';
import { TraceLayer, type TraceOptions } from '@strata/telemetry';
import { TimeoutLayer } from '@strata/timeout';
import { FilterLayer, MapErrLayer, MapRequestLayer, MapResponseLayer, type Predicate } from '@strata/util';
import type { StackConfig } from './config.js';

export class ServiceBuilder<InReq, InRes, OutReq = InReq, OutRes = InRes> {
  private constructor(private readonly stack: Layer<Service<InReq, InRes>, Service<OutReq, OutRes>>) {}

  /**
   * Empty builder for services handling `Req` and answering `Res`.
   */
  static create<Req, Res>(): ServiceBuilder<Req, Res> {
    return new ServiceBuilder<Req, Res>(identity<Service<Req, Res>>());
  }

  /**
   * Builder with the standard middleware `config` asks for, outermost
   * first: trace, load shed, buffer, concurrency limit, rate limit,
   * timeout.
   */
  static fromConfig<Req, Res>(config: StackConfig): ServiceBuilder<Req, Res> {
    let builder = ServiceBuilder.create<Req, Res>();
    if (config.trace) {
      builder = builder.trace(config.trace);
    }
    if (config.loadShed) {
      builder = builder.loadShed();
    }
    if (config.bufferBound !== undefined) {
      builder = builder.buffer(config.bufferBound);
    }
    if (config.concurrencyLimit !== undefined) {
      builder = builder.concurrencyLimit(config.concurrencyLimit);
    }
    if (config.rateLimit) {
      builder = builder.rateLimit(config.rateLimit);
    }
    if (config.timeoutMs !== undefined) {
      builder = builder.timeout(config.timeoutMs);
    }
    return builder;
  }

  /**
   * Add `layer` inside every layer added so far.
   */
  layer<NReq, NRes>(
    layer: Layer<Service<NReq, NRes>, Service<InReq, InRes>>
  ): ServiceBuilder<NReq, NRes, OutReq, OutRes> {
    return new ServiceBuilder<NReq, NRes, OutReq, OutRes>(new Stack(layer, this.stack));
  }

  timeout(durationMs: number): ServiceBuilder<InReq, InRes, OutReq, OutRes> {
    const timeout = new TimeoutLayer(durationMs);
    return this.wrap((inner) => timeout.layer(inner));
  }

  concurrencyLimit(max: number): ServiceBuilder<InReq, InRes, OutReq, OutRes> {
    const limit = new ConcurrencyLimitLayer(max);
    return this.wrap((inner) => limit.layer(inner));
  }

  rateLimit(rate: Rate): ServiceBuilder<InReq, InRes, OutReq, OutRes> {
    const limit = new RateLimitLayer(rate);
    return this.wrap((inner) => limit.layer(inner));
  }

  loadShed(): ServiceBuilder<InReq, InRes, OutReq, OutRes> {
    const shed = new LoadShedLayer();
    return this.wrap((inner) => shed.layer(inner));
  }

  buffer(bound: number): ServiceBuilder<InReq, InRes, OutReq, OutRes> {
    const buffer = new BufferLayer(bound);
    return this.wrap((inner) => buffer.layer(inner));
  }

  retry(policy: Policy<InReq, InRes>): ServiceBuilder<InReq, InRes, OutReq, OutRes> {
    const retry = new RetryLayer(policy);
    return this.wrap((inner) => retry.layer(inner));
  }

  filter(predicate: Predicate<InReq>): ServiceBuilder<InReq, InRes, OutReq, OutRes> {
    const filter = new FilterLayer(predicate);
    return this.wrap((inner) => filter.layer(inner));
  }

  mapErr(fn: (error: Error) => Error): ServiceBuilder<InReq, InRes, OutReq, OutRes> {
    const mapErr = new MapErrLayer(fn);
    return this.wrap((inner) => mapErr.layer(inner));
  }

  trace(options: TraceOptions): ServiceBuilder<InReq, InRes, OutReq, OutRes> {
    const trace = new TraceLayer(options);
    return this.wrap((inner) => trace.layer(inner));
  }

  /**
   * Services inside this point take `NReq`; `fn` turns the outer request
   * into one.
   */
  mapRequest<NReq>(fn: (request: InReq) => NReq): ServiceBuilder<NReq, InRes, OutReq, OutRes> {
    const map = new MapRequestLayer(fn);
    return this.layer<NReq, InRes>(layerFn((inner: Service<NReq, InRes>) => map.layer(inner)));
  }

  /**
   * Services inside this point answer with `NRes`; `fn` turns it into the
   * outer response.
   */
  mapResponse<NRes>(fn: (response: NRes) => InRes): ServiceBuilder<InReq, NRes, OutReq, OutRes> {
    const map = new MapResponseLayer(fn);
    return this.layer<InReq, NRes>(layerFn((inner: Service<InReq, NRes>) => map.layer(inner)));
  }

  /**
   * Wrap `inner` in every layer, outermost first.
   */
  service(inner: Service<InReq, InRes>): Service<OutReq, OutRes> {
    return this.stack.layer(inner);
  }

  intoLayer(): Layer<Service<InReq, InRes>, Service<OutReq, OutRes>> {
    return this.stack;
  }

  private wrap(
    fn: (inner: Service<InReq, InRes>) => Service<InReq, InRes>
  ): ServiceBuilder<InReq, InRes, OutReq, OutRes> {
    return this.layer<InReq, InRes>(layerFn(fn));
  }
}
