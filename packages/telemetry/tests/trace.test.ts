/**
 * @strata/telemetry - Trace middleware tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { pino } from 'pino';
import { ServiceFailedError, noopContext, oneshot, serviceFn } from '@strata/service';
import { Trace, TraceLayer } from '../src/trace.js';
import { createLogger } from '../src/logger.js';
import { providerRef, setTelemetryProvider } from '../src/provider.js';
import type { TelemetryProvider } from '../src/types.js';

const silent = createLogger({ level: 'silent' });

describe('Trace', () => {
  let provider: TelemetryProvider;

  beforeEach(() => {
    provider = {
      onRequestStarted: vi.fn(),
      onRequestFinished: vi.fn(),
    };
    setTelemetryProvider(provider);
  });

  afterEach(() => {
    providerRef.current = undefined;
  });

  it('should report a successful request', async () => {
    const traced = new Trace(
      serviceFn(async (name: string) => `hello ${name}`),
      { name: 'greeter', logger: silent }
    );

    await expect(oneshot(traced, 'ada')).resolves.toBe('hello ada');

    expect(provider.onRequestStarted).toHaveBeenCalledWith(
      expect.objectContaining({ service: 'greeter' })
    );
    expect(provider.onRequestFinished).toHaveBeenCalledTimes(1);
    expect(provider.onRequestFinished).toHaveBeenCalledWith(
      expect.objectContaining({ service: 'greeter', outcome: 'ok' })
    );
  });

  it('should report a failed request with its error code', async () => {
    const traced = new Trace(
      serviceFn(async (_: string): Promise<string> => {
        throw new ServiceFailedError('backend down');
      }),
      { name: 'greeter', logger: silent }
    );

    await expect(oneshot(traced, 'ada')).rejects.toThrow('backend down');

    expect(provider.onRequestFinished).toHaveBeenCalledWith(
      expect.objectContaining({ outcome: 'error', errorCode: 'E_SERVICE_FAILED' })
    );
  });

  it('should report cancellation once and abort the inner request', () => {
    let innerSignal: AbortSignal | undefined;
    const traced = new Trace(
      serviceFn(
        (_: string, signal: AbortSignal) =>
          new Promise<string>(() => {
            innerSignal = signal;
          })
      ),
      { name: 'greeter', logger: silent }
    );

    expect(traced.pollReady(noopContext()).status).toBe('ready');
    const future = traced.call('ada');
    future.cancel();

    expect(future.status).toBe('cancelled');
    expect(provider.onRequestFinished).toHaveBeenCalledTimes(1);
    expect(provider.onRequestFinished).toHaveBeenCalledWith(
      expect.objectContaining({ outcome: 'cancelled' })
    );
    expect(innerSignal?.aborted).toBe(true);
  });

  it('should tag log records with the request lifecycle events', async () => {
    const records: Array<Record<string, unknown>> = [];
    const capture = pino(
      { level: 'trace' },
      {
        write: (line: string) => {
          records.push(JSON.parse(line));
        },
      }
    );
    const traced = new Trace(serviceFn(async (n: number) => n + 1), { name: 'counter', logger: capture });

    await expect(oneshot(traced, 1)).resolves.toBe(2);

    expect(records.map((record) => record['strata.event'])).toEqual([
      'strata.request.started',
      'strata.request.finished',
    ]);
    expect(records[1]).toMatchObject({
      'strata.service': 'counter',
      'strata.outcome': 'ok',
      msg: 'Request completed',
    });
  });

  it('should wrap services through TraceLayer', async () => {
    const traced = new TraceLayer({ name: 'layered', logger: silent }).layer(
      serviceFn(async (n: number) => n * 2)
    );

    await expect(oneshot(traced.clone(), 21)).resolves.toBe(42);
    expect(provider.onRequestFinished).toHaveBeenCalledWith(
      expect.objectContaining({ service: 'layered', outcome: 'ok' })
    );
  });
});
