/**
 * @strata/mock - Mock service and its controlling handle
 *
 * Testing utilities only. `pair()` gives a service that forwards every
 * request to a `Handle`, where the test decides how and when it is
 * answered. The handle also controls readiness: it sets how many more
 * requests are allowed, injects permanent failures and closes the service.
 *
 * The mock enforces the readiness contract: `call` without a preceding
 * `ready` throws `ContractViolationError`.
 */

import { expect } from 'vitest';
import {
  ContractViolationError,
  PENDING,
  READY,
  ResponseFuture,
  ServiceFailedError,
  failed,
  intoError,
  type Context,
  type Readiness,
  type Service,
  type Waker,
} from '@strata/service';

/**
 * A request received by the mock, waiting for the test to answer it.
 */
export interface PendingRequest<Req, Res> {
  readonly request: Req;
  /** Aborts when the caller cancels the response future */
  readonly signal: AbortSignal;
  respond(response: Res): void;
  fail(error: unknown): void;
}

interface MockState<Req, Res> {
  /** Requests still allowed before the mock reports pending */
  remaining: number;
  wakers: Map<number, Waker>;
  closed: boolean;
  error?: Error;
  nextCloneId: number;
  queue: PendingRequest<Req, Res>[];
  receivers: Array<(pending: PendingRequest<Req, Res>) => void>;
}

function wakeAll<Req, Res>(state: MockState<Req, Res>): void {
  const wakers = [...state.wakers.values()];
  state.wakers.clear();
  for (const waker of wakers) {
    waker.wake();
  }
}

function closedError(): ServiceFailedError {
  return new ServiceFailedError('mock service closed');
}

export class MockService<Req, Res> implements Service<Req, Res> {
  private canSend = false;

  constructor(
    private readonly state: MockState<Req, Res>,
    private readonly id: number
  ) {}

  pollReady(cx: Context): Readiness {
    const state = this.state;
    if (state.closed) {
      return failed(closedError());
    }
    if (state.error) {
      const error = state.error;
      state.error = undefined;
      return failed(error);
    }
    if (this.canSend) {
      return READY;
    }
    if (state.remaining > 0) {
      state.wakers.delete(this.id);
      this.canSend = true;
      return READY;
    }
    state.wakers.set(this.id, cx.waker);
    return PENDING;
  }

  call(request: Req): ResponseFuture<Res> {
    if (!this.canSend) {
      throw new ContractViolationError();
    }
    this.canSend = false;

    const state = this.state;
    if (state.closed) {
      return ResponseFuture.reject(closedError());
    }
    if (state.remaining > 0) {
      state.remaining -= 1;
    }

    return ResponseFuture.from(
      (signal) =>
        new Promise<Res>((resolve, reject) => {
          const pending: PendingRequest<Req, Res> = {
            request,
            signal,
            respond: resolve,
            fail: (error) => reject(intoError(error)),
          };
          const receiver = state.receivers.shift();
          if (receiver) {
            receiver(pending);
          } else {
            state.queue.push(pending);
          }
        })
    );
  }

  clone(): MockService<Req, Res> {
    const id = this.state.nextCloneId;
    this.state.nextCloneId += 1;
    return new MockService(this.state, id);
  }

  disarm(): void {
    this.canSend = false;
  }

  /** Whether this instance holds a ready it has not used */
  get isArmed(): boolean {
    return this.canSend;
  }
}

export class Handle<Req, Res> {
  constructor(private readonly state: MockState<Req, Res>) {}

  /**
   * Allow `count` more requests across all clones. Zero makes every poll
   * report pending until the next `allow`.
   */
  allow(count: number): void {
    this.state.remaining = count;
    if (count > 0) {
      wakeAll(this.state);
    }
  }

  /**
   * Make the next poll, on any clone, fail permanently with `error`.
   */
  sendError(error: unknown): void {
    this.state.error = intoError(error);
    wakeAll(this.state);
  }

  /**
   * Next request received, in arrival order.
   */
  nextRequest(): Promise<PendingRequest<Req, Res>> {
    const queued = this.state.queue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    return new Promise((resolve) => {
      this.state.receivers.push(resolve);
    });
  }

  /** Requests received and not yet taken with `nextRequest` */
  get pendingRequests(): number {
    return this.state.queue.length;
  }

  /** Clones currently parked on a pending poll */
  get waitingPolls(): number {
    return this.state.wakers.size;
  }

  /**
   * Close the mock: every poll fails and new calls are rejected.
   */
  close(): void {
    this.state.closed = true;
    wakeAll(this.state);
  }
}

/**
 * Create a mock service and the handle that drives it.
 */
export function pair<Req, Res>(): [MockService<Req, Res>, Handle<Req, Res>] {
  const state: MockState<Req, Res> = {
    remaining: Number.POSITIVE_INFINITY,
    wakers: new Map(),
    closed: false,
    nextCloneId: 1,
    queue: [],
    receivers: [],
  };
  return [new MockService(state, 0), new Handle(state)];
}

/**
 * Take the next request and check it equals `expected`.
 */
export async function expectRequest<Req, Res>(
  handle: Handle<Req, Res>,
  expected: Req
): Promise<PendingRequest<Req, Res>> {
  const pending = await handle.nextRequest();
  expect(pending.request).toEqual(expected);
  return pending;
}
