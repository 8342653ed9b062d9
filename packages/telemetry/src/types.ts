/**
 * @strata/telemetry - Telemetry types and interfaces
 *
 * Provider hooks are runtime-portable and carry no request payloads.
 */

/**
 * How a traced request ended
 */
export type RequestOutcome = 'ok' | 'error' | 'cancelled';

/**
 * Input for request started telemetry event
 */
export interface RequestStartedInput {
  /** Name given to the traced service */
  service: string;

  /** Start time (Unix milliseconds) */
  startedAt: number;
}

/**
 * Input for request finished telemetry event
 */
export interface RequestFinishedInput {
  /** Name given to the traced service */
  service: string;

  outcome: RequestOutcome;

  /** Wall-clock time from call to settlement in milliseconds */
  durationMs: number;

  /** Strata error code, when the failure carries one */
  errorCode?: string;
}

/**
 * Telemetry provider interface
 *
 * Implementations SHOULD be no-throw. Strata guards all calls,
 * but well-behaved providers should not throw.
 */
export interface TelemetryProvider {
  /**
   * Called when a traced service accepts a request
   */
  onRequestStarted(input: RequestStartedInput): void;

  /**
   * Called once a traced request settles or is cancelled
   */
  onRequestFinished(input: RequestFinishedInput): void;
}
