import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigError, ContractViolationError, contextFrom, noopContext, ready, serviceFn } from '@strata/service';
import { pair } from '@strata/mock';
import { RateLimit, RateLimitLayer } from '../src/index.js';

describe('RateLimit', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const echo = () => serviceFn((n: number) => n);

  it('should allow num calls per window', () => {
    const svc = new RateLimit(echo(), { num: 2, perMs: 1000 });

    for (let i = 0; i < 2; i++) {
      expect(svc.pollReady(noopContext()).status).toBe('ready');
      void svc.call(i);
    }

    expect(svc.pollReady(noopContext()).status).toBe('pending');
    expect(svc.remainingCalls).toBe(0);
  });

  it('should wake the parked poll when the window resets', async () => {
    const svc = new RateLimit(echo(), { num: 1, perMs: 1000 });
    let wakes = 0;

    svc.pollReady(noopContext());
    void svc.call(1);
    expect(svc.pollReady(contextFrom(() => wakes++)).status).toBe('pending');

    await vi.advanceTimersByTimeAsync(999);
    expect(wakes).toBe(0);

    await vi.advanceTimersByTimeAsync(1);
    expect(wakes).toBe(1);
    expect(svc.pollReady(noopContext()).status).toBe('ready');
  });

  it('should let ready resolve after the window', async () => {
    const svc = new RateLimit(echo(), { num: 1, perMs: 500 });

    await ready(svc);
    void svc.call(1);

    let resolved = false;
    const waiting = ready(svc).then(() => {
      resolved = true;
    });

    await vi.advanceTimersByTimeAsync(499);
    expect(resolved).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await waiting;
    expect(resolved).toBe(true);
  });

  it('should use one timer for several parked polls', () => {
    const svc = new RateLimit(echo(), { num: 1, perMs: 1000 });

    svc.pollReady(noopContext());
    void svc.call(1);
    svc.pollReady(noopContext());
    svc.pollReady(noopContext());

    expect(vi.getTimerCount()).toBe(1);
  });

  it('should start each clone with a fresh window', () => {
    const svc = new RateLimit(echo(), { num: 1, perMs: 1000 });

    svc.pollReady(noopContext());
    void svc.call(1);

    expect(svc.clone().pollReady(noopContext()).status).toBe('ready');
  });

  it('should throw when called without a ready', () => {
    const svc = new RateLimit(echo(), { num: 5, perMs: 1000 });

    expect(() => svc.call(1)).toThrow(ContractViolationError);

    svc.pollReady(noopContext());
    svc.disarm();
    expect(() => svc.call(1)).toThrow(ContractViolationError);
  });

  it('should not spend the window while the inner service is pending', () => {
    const [mock, handle] = pair<number, number>();
    const svc = new RateLimit(mock, { num: 1, perMs: 1000 });

    handle.allow(0);
    expect(svc.pollReady(noopContext()).status).toBe('pending');
    expect(svc.remainingCalls).toBe(1);
  });

  it('should validate the rate', () => {
    expect(() => new RateLimit(echo(), { num: 0, perMs: 1000 })).toThrow(ConfigError);
    expect(() => new RateLimitLayer({ num: 1, perMs: -1 })).toThrow(ConfigError);
  });

  it('should wrap services through RateLimitLayer', () => {
    const layer = new RateLimitLayer({ num: 3, perMs: 100 });
    const svc = layer.layer(echo());

    expect(svc.rate).toEqual({ num: 3, perMs: 100 });
    expect(svc.remainingCalls).toBe(3);
  });
});
