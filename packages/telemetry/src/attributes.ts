/**
 * @strata/telemetry - Attribute constants
 *
 * Field names used in log records and provider attributes.
 */

export const STRATA_ATTRS = {
  SERVICE: 'strata.service',
  OUTCOME: 'strata.outcome',
  DURATION_MS: 'strata.duration_ms',
  ERROR_CODE: 'strata.error_code',
  EVENT: 'strata.event',
} as const;

/** Values of the `strata.event` field on Trace log records */
export const STRATA_EVENTS = {
  REQUEST_STARTED: 'strata.request.started',
  REQUEST_FINISHED: 'strata.request.finished',
} as const;
