/**
 * Timeout middleware
 *
 * Each request races the inner response against a deadline timer. The
 * first to finish decides the outcome:
 *
 *   racing ──response──▶ response-won   (inner result forwarded)
 *     │
 *     ├──deadline──▶ timeout-won        (ElapsedError, inner cancelled)
 *     │
 *     └──cancel────▶ cancelled          (inner cancelled)
 *
 * Terminal states take no further transitions. Readiness is the inner
 * service's: a timeout never refuses work on its own.
 */

import { z } from 'zod';
import {
  ResponseFuture,
  intoError,
  parseConfig,
  type Context,
  type Readiness,
  type Service,
} from '@strata/service';
import { logger } from '@strata/telemetry';
import { ElapsedError } from './errors.js';

export const durationSchema = z.number().finite().positive();

export type RaceState = 'racing' | 'response-won' | 'timeout-won' | 'cancelled';

export class Timeout<Req, Res> implements Service<Req, Res> {
  readonly durationMs: number;

  constructor(
    private readonly inner: Service<Req, Res>,
    durationMs: number
  ) {
    this.durationMs = parseConfig(durationSchema, durationMs, 'durationMs');
  }

  pollReady(cx: Context): Readiness {
    return this.inner.pollReady(cx);
  }

  call(request: Req): ResponseFuture<Res> {
    return race(this.inner.call(request), this.durationMs);
  }

  clone(): Timeout<Req, Res> {
    return new Timeout(this.inner.clone(), this.durationMs);
  }

  disarm(): void {
    this.inner.disarm();
  }
}

/**
 * Race `response` against a `durationMs` deadline.
 *
 * @param onTransition - Observer for state changes, used by tests
 */
export function race<T>(
  response: ResponseFuture<T>,
  durationMs: number,
  onTransition?: (state: RaceState) => void
): ResponseFuture<T> {
  return ResponseFuture.from<T>(
    (signal) =>
      new Promise<T>((resolve, reject) => {
        let state: RaceState = 'racing';

        const settle = (next: RaceState): boolean => {
          if (state !== 'racing') {
            return false;
          }
          state = next;
          clearTimeout(timer);
          signal.removeEventListener('abort', onAbort);
          onTransition?.(next);
          return true;
        };

        const timer = setTimeout(() => {
          if (!settle('timeout-won')) {
            return;
          }
          logger.trace({ durationMs }, 'Timeout elapsed');
          response.cancel('timeout elapsed');
          reject(new ElapsedError(durationMs));
        }, durationMs);

        const onAbort = (): void => {
          if (settle('cancelled')) {
            response.cancel('timeout future cancelled');
          }
        };
        signal.addEventListener('abort', onAbort, { once: true });

        void response.then(
          (value) => {
            if (settle('response-won')) {
              resolve(value);
            }
          },
          (error: unknown) => {
            if (settle('response-won')) {
              reject(intoError(error));
            }
          }
        );
      })
  );
}
