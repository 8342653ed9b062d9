import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  Attempts,
  ConfigError,
  ElapsedError,
  OverloadedError,
  RejectedError,
  ServiceBuilder,
  Trace,
  layerFn,
  noopContext,
  oneshot,
  serviceFn,
  type Service,
} from '../src/index.js';

/** Layer that appends `tag` to the request on its way in */
function tag(name: string) {
  return layerFn(
    (inner: Service<string, string>): Service<string, string> =>
      serviceFn((request: string) => oneshot(inner, `${request}>${name}`))
  );
}

const echo = () => serviceFn((request: string) => request);

describe('ServiceBuilder', () => {
  it('should make the first added layer the outermost', async () => {
    const svc = ServiceBuilder.create<string, string>().layer(tag('a')).layer(tag('b')).layer(tag('c')).service(echo());

    await expect(oneshot(svc, 'req')).resolves.toBe('req>a>b>c');
  });

  it('should return the service unchanged when empty', () => {
    const inner = echo();

    expect(ServiceBuilder.create<string, string>().service(inner)).toBe(inner);
  });

  it('should produce a reusable layer', async () => {
    const layer = ServiceBuilder.create<string, string>().layer(tag('x')).intoLayer();

    await expect(oneshot(layer.layer(echo()), '1')).resolves.toBe('1>x');
    await expect(oneshot(layer.layer(echo()), '2')).resolves.toBe('2>x');
  });

  it('should change request and response types through the map methods', async () => {
    const svc = ServiceBuilder.create<string, string>()
      .mapRequest((s: string) => s.length)
      .mapResponse((n: number) => `length ${n}`)
      .service(serviceFn((n: number) => n * 10));

    await expect(oneshot(svc, 'abc')).resolves.toBe('length 30');
  });

  it('should apply filter and mapErr', async () => {
    const svc = ServiceBuilder.create<number, number>()
      .mapErr((error) => new Error(`api: ${error.message}`))
      .filter((n) => n >= 0)
      .service(serviceFn((n: number) => n));

    await expect(oneshot(svc, 3)).resolves.toBe(3);
    await expect(oneshot(svc, -3)).rejects.toThrow('api: request rejected by filter');
  });

  it('should keep the typed error when nothing maps it', async () => {
    const svc = ServiceBuilder.create<number, number>()
      .filter((n) => n >= 0)
      .service(serviceFn((n: number) => n));

    await expect(oneshot(svc, -1)).rejects.toBeInstanceOf(RejectedError);
  });

  it('should retry through the retry method', async () => {
    let calls = 0;
    const svc = ServiceBuilder.create<string, number>()
      .retry(new Attempts<string, number>(2))
      .service(
        serviceFn(async () => {
          calls += 1;
          if (calls < 3) {
            throw new Error('flaky');
          }
          return calls;
        })
      );

    await expect(oneshot(svc, 'req')).resolves.toBe(3);
  });

  it('should validate middleware options at assembly time', () => {
    const builder = ServiceBuilder.create<string, string>();

    expect(() => builder.timeout(0)).toThrow(ConfigError);
    expect(() => builder.concurrencyLimit(-1)).toThrow(ConfigError);
    expect(() => builder.rateLimit({ num: 1, perMs: 0 })).toThrow(ConfigError);
    expect(() => builder.buffer(0)).toThrow(ConfigError);
  });
});

describe('ServiceBuilder.fromConfig', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return the service unchanged for an empty config', () => {
    const inner = echo();

    expect(ServiceBuilder.fromConfig<string, string>({}).service(inner)).toBe(inner);
  });

  it('should put tracing outermost', () => {
    const svc = ServiceBuilder.fromConfig<string, string>({
      trace: { name: 'orders' },
      loadShed: true,
      concurrencyLimit: 2,
      timeoutMs: 100,
    }).service(echo());

    expect(svc).toBeInstanceOf(Trace);
  });

  it('should shed load outside the concurrency limit', async () => {
    const svc = ServiceBuilder.fromConfig<string, string>({ loadShed: true, concurrencyLimit: 1 }).service(
      serviceFn(() => new Promise<string>(() => undefined))
    );
    const other = svc.clone();

    expect(svc.pollReady(noopContext()).status).toBe('ready');
    void svc.call('first');

    expect(other.pollReady(noopContext()).status).toBe('ready');
    await expect(other.call('second')).rejects.toBeInstanceOf(OverloadedError);
  });

  it('should apply the configured timeout', async () => {
    const svc = ServiceBuilder.fromConfig<string, string>({ timeoutMs: 50, concurrencyLimit: 4 }).service(
      serviceFn(() => new Promise<string>(() => undefined))
    );

    const response = oneshot(svc, 'slow');
    const outcome = expect(response).rejects.toBeInstanceOf(ElapsedError);
    await vi.advanceTimersByTimeAsync(50);

    await outcome;
  });
});
