import { ErrorCodes, StrataError } from '@strata/service';

/**
 * The deadline elapsed before the inner service responded.
 */
export class ElapsedError extends StrataError {
  readonly durationMs: number;

  constructor(durationMs: number) {
    super(ErrorCodes.TIMEOUT_ELAPSED, `request timed out after ${durationMs}ms`);
    this.name = 'ElapsedError';
    this.durationMs = durationMs;
  }
}
