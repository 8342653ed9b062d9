import { parseConfig, type Service } from '@strata/service';
import { Timeout, durationSchema } from './timeout.js';

/**
 * Applies a per-request timeout to every service it wraps.
 */
export class TimeoutLayer {
  readonly durationMs: number;

  constructor(durationMs: number) {
    this.durationMs = parseConfig(durationSchema, durationMs, 'durationMs');
  }

  layer<Req, Res>(inner: Service<Req, Res>): Timeout<Req, Res> {
    return new Timeout(inner, this.durationMs);
  }
}
