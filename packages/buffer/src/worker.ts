/**
 * @strata/buffer - Buffer worker
 *
 * The worker owns the inner service and drains a FIFO queue of messages:
 * for each one it waits until the inner service is ready, then dispatches
 * it. It never waits for a response before taking the next message.
 *
 * When the inner service fails permanently the worker stops and every
 * queued and later request fails with a `ServiceFailedError` whose `cause`
 * is the inner failure.
 */

import { Semaphore, type Permit } from '@strata/limit';
import {
  ServiceFailedError,
  intoError,
  ready,
  type ResponseFuture,
  type Service,
  type Waker,
} from '@strata/service';
import { logger } from '@strata/telemetry';
import { BufferClosedError } from './errors.js';

export interface Message<Req, Res> {
  readonly request: Req;
  /** Aborts when the caller cancels the response future */
  readonly signal: AbortSignal;
  /** Queue slot, released once the message leaves the queue */
  readonly permit: Permit;
  resolve(response: Res): void;
  reject(error: Error): void;
}

export class BufferWorker<Req, Res> {
  readonly slots: Semaphore;
  /** Settles once the worker loop has exited */
  readonly stopped: Promise<void>;

  private readonly queue: Message<Req, Res>[] = [];
  private readonly parked = new Set<Waker>();
  private readonly shutdown = new AbortController();
  private notify?: (message: Message<Req, Res> | undefined) => void;
  private failure?: ServiceFailedError;

  constructor(
    private readonly service: Service<Req, Res>,
    bound: number
  ) {
    this.slots = new Semaphore(bound);
    this.stopped = this.run();
  }

  get bound(): number {
    return this.slots.permits;
  }

  /** Messages waiting to be dispatched */
  get queued(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.shutdown.signal.aborted;
  }

  /**
   * Why the buffer no longer accepts requests, if it doesn't.
   */
  get error(): Error | undefined {
    if (this.failure) {
      return this.failure;
    }
    return this.isClosed ? new BufferClosedError() : undefined;
  }

  /**
   * Keep `waker` until the worker fails or closes.
   */
  park(waker: Waker): void {
    this.parked.add(waker);
  }

  enqueue(message: Message<Req, Res>): void {
    const error = this.error;
    if (error) {
      message.permit.release();
      message.reject(error);
      return;
    }

    message.signal.addEventListener(
      'abort',
      () => {
        const index = this.queue.indexOf(message);
        if (index !== -1) {
          this.queue.splice(index, 1);
        }
        message.permit.release();
      },
      { once: true }
    );

    const notify = this.notify;
    if (notify) {
      this.notify = undefined;
      notify(message);
    } else {
      this.queue.push(message);
    }
  }

  /**
   * Stop the worker. Queued requests fail with `BufferClosedError`;
   * requests already dispatched run to completion.
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.shutdown.abort();
    this.drain(new BufferClosedError());
    logger.debug('Buffer closed');
  }

  private async run(): Promise<void> {
    for (;;) {
      const message = await this.take();
      if (message === undefined) {
        return;
      }
      if (message.signal.aborted) {
        continue;
      }
      if (this.isClosed) {
        message.permit.release();
        message.reject(new BufferClosedError());
        return;
      }

      const dispatched = await this.waitReady(message);
      if (dispatched === 'stop') {
        return;
      }
      if (dispatched === 'skip') {
        continue;
      }

      message.permit.release();
      this.dispatch(message);
    }
  }

  private take(): Promise<Message<Req, Res> | undefined> {
    const message = this.queue.shift();
    if (message !== undefined || this.isClosed) {
      return Promise.resolve(message);
    }
    return new Promise((resolve) => {
      this.notify = resolve;
    });
  }

  private async waitReady(message: Message<Req, Res>): Promise<'ready' | 'skip' | 'stop'> {
    const wait = new AbortController();
    const abortWait = (): void => wait.abort();
    message.signal.addEventListener('abort', abortWait, { once: true });
    this.shutdown.signal.addEventListener('abort', abortWait, { once: true });

    try {
      await ready(this.service, wait.signal);
      return 'ready';
    } catch (error) {
      if (this.isClosed) {
        message.permit.release();
        message.reject(new BufferClosedError());
        return 'stop';
      }
      if (message.signal.aborted) {
        return 'skip';
      }
      this.fail(intoError(error), message);
      return 'stop';
    } finally {
      message.signal.removeEventListener('abort', abortWait);
      this.shutdown.signal.removeEventListener('abort', abortWait);
    }
  }

  private dispatch(message: Message<Req, Res>): void {
    let response: ResponseFuture<Res>;
    try {
      response = this.service.call(message.request);
    } catch (error) {
      message.reject(intoError(error));
      return;
    }
    const cancel = (): void => response.cancel('buffered request cancelled');
    message.signal.addEventListener('abort', cancel, { once: true });
    void response.then(
      (value) => {
        message.signal.removeEventListener('abort', cancel);
        message.resolve(value);
      },
      (error: unknown) => {
        message.signal.removeEventListener('abort', cancel);
        message.reject(intoError(error));
      }
    );
  }

  private fail(cause: Error, current: Message<Req, Res>): void {
    this.failure = new ServiceFailedError('buffered service failed', { cause });
    logger.debug({ err: cause }, 'Buffered service failed');
    current.permit.release();
    current.reject(this.failure);
    this.drain(this.failure);
  }

  private drain(error: Error): void {
    const pending = this.queue.splice(0);
    for (const message of pending) {
      message.permit.release();
      message.reject(error);
    }
    this.notify?.(undefined);
    this.notify = undefined;

    const parked = [...this.parked];
    this.parked.clear();
    for (const waker of parked) {
      waker.wake();
    }
  }
}
