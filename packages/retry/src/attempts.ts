/**
 * Retry failed requests a fixed number of times.
 */

import { z } from 'zod';
import { StrataError, parseConfig } from '@strata/service';
import { logger } from '@strata/telemetry';
import { sleep, type ExponentialBackoff } from './backoff.js';
import type { Outcome, Policy } from './policy.js';

export interface AttemptsOptions<Req> {
  /** Wait between attempts; retries immediately when absent */
  backoff?: ExponentialBackoff;

  /** Which errors to retry. Defaults to every error not marked non-retriable */
  isRetryable?: (error: Error) => boolean;

  /** Defaults to reusing the request unchanged */
  cloneRequest?: (request: Req) => Req | undefined;
}

const retriesSchema = z.number().int().nonnegative();

function retriableByDefault(error: Error): boolean {
  return !(error instanceof StrataError) || error.retriable;
}

export class Attempts<Req, Res> implements Policy<Req, Res> {
  /** Retries left */
  readonly remaining: number;

  constructor(
    remaining: number,
    private readonly options: AttemptsOptions<Req> = {},
    private readonly retries = 0
  ) {
    this.remaining = parseConfig(retriesSchema, remaining, 'attempts');
  }

  retry(_request: Req, outcome: Outcome<Res>, signal: AbortSignal): Promise<Attempts<Req, Res>> | undefined {
    if (outcome.status === 'ok' || this.remaining === 0) {
      return undefined;
    }
    const isRetryable = this.options.isRetryable ?? retriableByDefault;
    if (!isRetryable(outcome.error)) {
      return undefined;
    }

    const next = new Attempts<Req, Res>(this.remaining - 1, this.options, this.retries + 1);
    const delayMs = this.options.backoff?.delay(this.retries) ?? 0;
    logger.debug({ retry: this.retries + 1, delayMs, err: outcome.error }, 'Retrying request');
    if (delayMs === 0) {
      return Promise.resolve(next);
    }
    return sleep(delayMs, signal).then(() => next);
  }

  cloneRequest(request: Req): Req | undefined {
    return this.options.cloneRequest ? this.options.cloneRequest(request) : request;
  }
}
