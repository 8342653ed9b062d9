/**
 * Driving a service from async code
 *
 * `ready` turns the poll/wake protocol into a promise: it polls once, then
 * only polls again after the service wakes it, re-polling on the microtask
 * queue so control always returns to the event loop first.
 */

import { CancelledError, intoError } from './errors.js';
import type { ResponseFuture } from './future.js';
import { contextFrom, type Readiness } from './readiness.js';
import type { Service } from './service.js';

/**
 * Wait until `service` reports ready.
 *
 * Rejects with the failure when the service fails permanently, and with a
 * `CancelledError` when `signal` aborts first. An aborted wait disarms the
 * service so no partial reservation is left behind.
 */
export function ready<Req, Res>(service: Service<Req, Res>, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    let done = false;

    const onAbort = (): void => {
      if (done) {
        return;
      }
      done = true;
      service.disarm();
      reject(new CancelledError('readiness wait aborted'));
    };

    const finish = (): void => {
      done = true;
      signal?.removeEventListener('abort', onAbort);
    };

    const attempt = (): void => {
      if (done) {
        return;
      }
      let readiness: Readiness;
      try {
        readiness = service.pollReady(contextFrom(() => queueMicrotask(attempt)));
      } catch (error) {
        finish();
        reject(intoError(error));
        return;
      }
      switch (readiness.status) {
        case 'ready':
          finish();
          resolve();
          return;
        case 'failed':
          finish();
          reject(readiness.error);
          return;
        case 'pending':
          return;
      }
    };

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });
    attempt();
  });
}

/**
 * Wait for readiness, issue one request and await its response.
 */
export async function oneshot<Req, Res>(
  service: Service<Req, Res>,
  request: Req,
  signal?: AbortSignal
): Promise<Res> {
  await ready(service, signal);
  if (signal?.aborted) {
    service.disarm();
    throw new CancelledError('oneshot aborted');
  }
  const future = service.call(request);
  if (signal === undefined) {
    return future;
  }
  const onAbort = (): void => future.cancel('oneshot aborted');
  signal.addEventListener('abort', onAbort, { once: true });
  try {
    return await future;
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

/**
 * Drive `service` over a stream of requests.
 *
 * Requests are issued as soon as the service is ready for them; responses
 * are yielded in request order. Stopping early, or a failed response,
 * cancels every request still in flight.
 */
export async function* callAll<Req, Res>(
  service: Service<Req, Res>,
  requests: Iterable<Req> | AsyncIterable<Req>
): AsyncGenerator<Res, void, undefined> {
  const inFlight: ResponseFuture<Res>[] = [];
  try {
    for await (const request of requests) {
      await ready(service);
      const future = service.call(request);
      // Failures surface when the future reaches the head
      void future.then(undefined, () => undefined);
      inFlight.push(future);

      for (let head = inFlight[0]; head?.isSettled; head = inFlight[0]) {
        inFlight.shift();
        yield await head;
      }
    }
    for (let head = inFlight.shift(); head !== undefined; head = inFlight.shift()) {
      yield await head;
    }
  } finally {
    for (const future of inFlight) {
      future.cancel('callAll stopped');
    }
  }
}
