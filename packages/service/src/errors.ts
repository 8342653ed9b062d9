/**
 * Strata error codes and the erased error helpers.
 *
 * Every failure that crosses a service boundary is an `Error`. Middleware
 * either forwards the inner error or replaces it with one of the
 * distinguished errors below, never both. Callers recover a specific kind
 * with `downcast`.
 */

/**
 * Error code constants
 */
export const ErrorCodes = {
  /** `call` issued without a prior ready */
  NOT_READY: 'E_NOT_READY',
  /** Response future cancelled, or a readiness wait aborted */
  CANCELLED: 'E_CANCELLED',
  /** Timeout deadline elapsed before the response */
  TIMEOUT_ELAPSED: 'E_TIMEOUT_ELAPSED',
  /** Load shed rejected the request */
  OVERLOADED: 'E_OVERLOADED',
  /** Buffer worker closed */
  BUFFER_CLOSED: 'E_BUFFER_CLOSED',
  /** Filter predicate rejected the request */
  REJECTED: 'E_REJECTED',
  /** Permanent service failure, or a thrown value that was not an Error */
  SERVICE_FAILED: 'E_SERVICE_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ErrorDefinition {
  code: ErrorCode;
  title: string;
  /** Whether issuing the same request again may succeed */
  retriable: boolean;
}

/**
 * Error definitions map
 */
export const ERRORS: Record<ErrorCode, ErrorDefinition> = {
  [ErrorCodes.NOT_READY]: {
    code: ErrorCodes.NOT_READY,
    title: 'Service Not Ready',
    retriable: false,
  },
  [ErrorCodes.CANCELLED]: {
    code: ErrorCodes.CANCELLED,
    title: 'Cancelled',
    retriable: false,
  },
  [ErrorCodes.TIMEOUT_ELAPSED]: {
    code: ErrorCodes.TIMEOUT_ELAPSED,
    title: 'Timeout Elapsed',
    retriable: true,
  },
  [ErrorCodes.OVERLOADED]: {
    code: ErrorCodes.OVERLOADED,
    title: 'Service Overloaded',
    retriable: true,
  },
  [ErrorCodes.BUFFER_CLOSED]: {
    code: ErrorCodes.BUFFER_CLOSED,
    title: 'Buffer Closed',
    retriable: false,
  },
  [ErrorCodes.REJECTED]: {
    code: ErrorCodes.REJECTED,
    title: 'Request Rejected',
    retriable: false,
  },
  [ErrorCodes.SERVICE_FAILED]: {
    code: ErrorCodes.SERVICE_FAILED,
    title: 'Service Failed',
    retriable: false,
  },
};

/**
 * Base class for errors raised by Strata itself.
 */
export class StrataError extends Error {
  readonly code: ErrorCode;
  readonly retriable: boolean;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StrataError';
    this.code = code;
    this.retriable = ERRORS[code].retriable;
  }
}

/**
 * A request was issued without the service reporting ready first.
 *
 * This is a bug in the caller, not a runtime condition to recover from.
 */
export class ContractViolationError extends StrataError {
  constructor(message = 'service not ready; pollReady must report ready before call') {
    super(ErrorCodes.NOT_READY, message);
    this.name = 'ContractViolationError';
  }
}

export class CancelledError extends StrataError {
  constructor(message = 'cancelled') {
    super(ErrorCodes.CANCELLED, message);
    this.name = 'CancelledError';
  }
}

export class ServiceFailedError extends StrataError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.SERVICE_FAILED, message, options);
    this.name = 'ServiceFailedError';
  }
}

/**
 * Constructor of an error kind, used as the type tag for `downcast`.
 */
export type ErrorKind<E extends Error> = abstract new (...args: never[]) => E;

/**
 * Normalise a thrown or rejected value into an `Error`.
 *
 * Errors pass through unchanged so their identity survives any number of
 * middleware layers.
 */
export function intoError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new ServiceFailedError(`non-error value thrown: ${String(value)}`, { cause: value });
}

/**
 * Recover a specific error kind from an erased error.
 *
 * Looks at the error itself, then along its `cause` chain.
 *
 * @example
 * ```typescript
 * try {
 *   await oneshot(svc, request);
 * } catch (e) {
 *   const elapsed = downcast(e, ElapsedError);
 *   if (elapsed) {
 *     // deadline hit
 *   }
 * }
 * ```
 */
export function downcast<E extends Error>(error: unknown, kind: ErrorKind<E>): E | undefined {
  const seen = new Set<Error>();
  let current: unknown = error;
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof kind) {
      return current;
    }
    seen.add(current);
    current = current.cause;
  }
  return undefined;
}

/**
 * Whether `error` or anything on its `cause` chain is a `kind`.
 */
export function isErrorKind<E extends Error>(error: unknown, kind: ErrorKind<E>): boolean {
  return downcast(error, kind) !== undefined;
}
