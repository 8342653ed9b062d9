/**
 * @strata/telemetry - Request tracing middleware
 *
 * Logs how each request ended and how long it took, and reports the same
 * to the telemetry provider. Readiness passes straight through.
 */

import {
  StrataError,
  type Context,
  type Readiness,
  type ResponseFuture,
  type Service,
} from '@strata/service';
import { STRATA_ATTRS, STRATA_EVENTS } from './attributes.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import { emit } from './provider.js';
import type { RequestOutcome } from './types.js';

export interface TraceOptions {
  /** Name reported with every record */
  name: string;

  /** Logger to use instead of the shared one */
  logger?: Logger;
}

export class Trace<Req, Res> implements Service<Req, Res> {
  private readonly log: Logger;

  constructor(
    private readonly inner: Service<Req, Res>,
    private readonly options: TraceOptions,
    log?: Logger
  ) {
    this.log = log ?? (options.logger ?? defaultLogger).child({ [STRATA_ATTRS.SERVICE]: options.name });
  }

  pollReady(cx: Context): Readiness {
    const readiness = this.inner.pollReady(cx);
    if (readiness.status === 'failed') {
      this.log.warn({ err: readiness.error }, 'Service failed');
    }
    return readiness;
  }

  call(request: Req): ResponseFuture<Res> {
    const service = this.options.name;
    const startedAt = Date.now();
    emit((p) => p.onRequestStarted({ service, startedAt }));
    this.log.trace({ [STRATA_ATTRS.EVENT]: STRATA_EVENTS.REQUEST_STARTED }, 'Request started');

    let finished = false;
    const finish = (outcome: RequestOutcome, error?: Error): void => {
      if (finished) {
        return;
      }
      finished = true;
      const durationMs = Date.now() - startedAt;
      const errorCode = error instanceof StrataError ? error.code : undefined;
      emit((p) => p.onRequestFinished({ service, outcome, durationMs, errorCode }));

      const fields = {
        [STRATA_ATTRS.EVENT]: STRATA_EVENTS.REQUEST_FINISHED,
        [STRATA_ATTRS.OUTCOME]: outcome,
        [STRATA_ATTRS.DURATION_MS]: durationMs,
        ...(errorCode ? { [STRATA_ATTRS.ERROR_CODE]: errorCode } : {}),
      };
      if (error) {
        this.log.debug({ ...fields, err: error }, 'Request failed');
      } else {
        this.log.debug(fields, outcome === 'ok' ? 'Request completed' : 'Request cancelled');
      }
    };

    const traced = this.inner.call(request).map(
      (response) => {
        finish('ok');
        return response;
      },
      (error) => {
        finish('error', error);
        throw error;
      }
    );
    traced.onRelease(() => {
      if (traced.status === 'cancelled') {
        finish('cancelled');
      }
    });
    return traced;
  }

  clone(): Trace<Req, Res> {
    return new Trace(this.inner.clone(), this.options, this.log);
  }

  disarm(): void {
    this.inner.disarm();
  }
}

export class TraceLayer {
  constructor(private readonly options: TraceOptions) {}

  layer<Req, Res>(inner: Service<Req, Res>): Trace<Req, Res> {
    return new Trace(inner, this.options);
  }
}

