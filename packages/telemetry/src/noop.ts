/**
 * @strata/telemetry - No-op telemetry provider
 *
 * Fallback provider for when telemetry is disabled.
 */

import type { TelemetryProvider } from './types.js';

export const noopProvider: TelemetryProvider = {
  onRequestStarted: () => {},
  onRequestFinished: () => {},
};
