import { describe, it, expect, vi } from 'vitest';
import {
  CancelledError,
  ConfigError,
  ContractViolationError,
  ServiceFailedError,
  contextFrom,
  downcast,
  noopContext,
  oneshot,
} from '@strata/service';
import { pair } from '@strata/mock';
import { Buffer, BufferClosedError, BufferLayer, BufferWorker, buffer } from '../src/index.js';

class DiskError extends Error {
  constructor() {
    super('disk unavailable');
    this.name = 'DiskError';
  }
}

async function rejection(future: PromiseLike<unknown>): Promise<unknown> {
  return future.then(
    () => undefined,
    (e: unknown) => e
  );
}

describe('Buffer', () => {
  it('should dispatch requests from all clones in FIFO order', async () => {
    const [mock, handle] = pair<string, string>();
    const svc = buffer(mock, 4);
    const responses = ['a', 'b', 'c'].map((request) => {
      const clone = svc.clone();
      expect(clone.pollReady(noopContext()).status).toBe('ready');
      return clone.call(request);
    });

    for (const expected of ['a', 'b', 'c']) {
      const pending = await handle.nextRequest();
      expect(pending.request).toBe(expected);
      pending.respond(expected.toUpperCase());
    }

    await expect(Promise.all(responses)).resolves.toEqual(['A', 'B', 'C']);
  });

  it('should report pending once bound requests are queued', async () => {
    const [mock, handle] = pair<string, string>();
    handle.allow(0);
    const svc = buffer(mock, 2);
    const [a, b, c] = [svc.clone(), svc.clone(), svc.clone()];
    let woken = 0;

    a.pollReady(noopContext());
    void a.call('a');
    b.pollReady(noopContext());
    void b.call('b');

    expect(c.pollReady(contextFrom(() => woken++)).status).toBe('pending');

    handle.allow(1);
    expect((await handle.nextRequest()).request).toBe('a');

    // Dispatching 'a' frees its slot
    await vi.waitFor(() => expect(woken).toBe(1));
    expect(c.pollReady(noopContext()).status).toBe('ready');
  });

  it('should fail queued and later requests when the inner service fails', async () => {
    const [mock, handle] = pair<string, string>();
    const svc = buffer(mock, 2);
    const disk = new DiskError();
    handle.sendError(disk);

    svc.pollReady(noopContext());
    const error = await rejection(svc.call('a'));

    expect(error).toBeInstanceOf(ServiceFailedError);
    expect(downcast(error, DiskError)).toBe(disk);

    const readiness = svc.clone().pollReady(noopContext());
    expect(readiness.status).toBe('failed');
    if (readiness.status === 'failed') {
      expect(readiness.error).toBe(error);
    }
  });

  it('should wake parked callers when the inner service fails', async () => {
    const [mock, handle] = pair<string, string>();
    handle.allow(0);
    const svc = buffer(mock, 1);
    const other = svc.clone();
    let woken = 0;

    svc.pollReady(noopContext());
    const first = svc.call('a');
    expect(other.pollReady(contextFrom(() => woken++)).status).toBe('pending');

    handle.sendError(new DiskError());

    await expect(first).rejects.toBeInstanceOf(ServiceFailedError);
    expect(woken).toBe(1);
    expect(other.pollReady(noopContext()).status).toBe('failed');
  });

  it('should reject queued requests with BufferClosedError on close', async () => {
    const [mock, handle] = pair<string, string>();
    handle.allow(0);
    const worker = new BufferWorker(mock, 2);
    const svc = new Buffer(worker);

    svc.pollReady(noopContext());
    const first = svc.call('a');
    const second = svc.clone();
    second.pollReady(noopContext());
    const queued = second.call('b');

    svc.close();

    await expect(first).rejects.toBeInstanceOf(BufferClosedError);
    await expect(queued).rejects.toBeInstanceOf(BufferClosedError);
    await worker.stopped;

    const readiness = svc.pollReady(noopContext());
    expect(readiness.status).toBe('failed');
    if (readiness.status === 'failed') {
      expect(readiness.error).toBeInstanceOf(BufferClosedError);
    }
    expect(worker.slots.available).toBe(2);
    expect(handle.pendingRequests).toBe(0);
  });

  it('should free the slot of a cancelled queued request and skip it', async () => {
    const [mock, handle] = pair<string, string>();
    handle.allow(0);
    const svc = buffer(mock, 1);
    const other = svc.clone();

    svc.pollReady(noopContext());
    const first = svc.call('a');
    expect(other.pollReady(noopContext()).status).toBe('pending');

    first.cancel();
    expect(other.pollReady(noopContext()).status).toBe('ready');
    const second = other.call('b');
    handle.allow(1);

    const pending = await handle.nextRequest();
    expect(pending.request).toBe('b');
    pending.respond('B');

    await expect(second).resolves.toBe('B');
    await expect(first).rejects.toBeInstanceOf(CancelledError);
    expect(handle.pendingRequests).toBe(0);
  });

  it('should cancel a dispatched request on the inner service', async () => {
    const [mock, handle] = pair<string, string>();
    const svc = buffer(mock, 1);

    svc.pollReady(noopContext());
    const response = svc.call('a');
    const pending = await handle.nextRequest();
    response.cancel();

    expect(pending.signal.aborted).toBe(true);
  });

  it('should release the reserved slot on disarm', () => {
    const [mock] = pair<string, string>();
    const worker = new BufferWorker(mock, 1);
    const svc = new Buffer(worker);

    svc.pollReady(noopContext());
    expect(worker.slots.available).toBe(0);

    svc.disarm();
    expect(worker.slots.available).toBe(1);
    expect(() => svc.call('a')).toThrow(ContractViolationError);
  });

  it('should work with the oneshot driver', async () => {
    const [mock, handle] = pair<number, number>();
    const svc = new BufferLayer(8).layer(mock);

    const response = oneshot(svc, 20);
    const pending = await handle.nextRequest();
    pending.respond(pending.request + 1);

    await expect(response).resolves.toBe(21);
    expect(svc.bound).toBe(8);
  });

  it('should reject invalid bounds', () => {
    expect(() => new BufferLayer(0)).toThrow(ConfigError);
    expect(() => new BufferLayer(2.5)).toThrow(ConfigError);
  });
});
