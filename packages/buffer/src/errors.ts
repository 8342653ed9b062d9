import { ErrorCodes, StrataError } from '@strata/service';

/**
 * The buffer was closed before the request was dispatched.
 */
export class BufferClosedError extends StrataError {
  constructor(message = 'buffer closed') {
    super(ErrorCodes.BUFFER_CLOSED, message);
    this.name = 'BufferClosedError';
  }
}
