/**
 * @strata/telemetry - Provider registry
 *
 * When no provider is set, tracing costs one `if (!p)` check per event.
 */

import { logger } from './logger.js';
import type { TelemetryProvider } from './types.js';

/**
 * Process-wide provider reference. Hot paths read `providerRef.current`
 * directly.
 */
export const providerRef: { current?: TelemetryProvider } = {
  current: undefined,
};

/**
 * Set the telemetry provider, or pass undefined to disable telemetry.
 */
export function setTelemetryProvider(provider: TelemetryProvider | undefined): void {
  providerRef.current = provider;
}

export function getTelemetryProvider(): TelemetryProvider | undefined {
  return providerRef.current;
}

export function isTelemetryEnabled(): boolean {
  return providerRef.current !== undefined;
}

/**
 * Deliver one event to the current provider. A throwing provider is logged
 * and never reaches the request path.
 */
export function emit(deliver: (provider: TelemetryProvider) => void): void {
  const p = providerRef.current;
  if (!p) {
    return;
  }
  try {
    deliver(p);
  } catch (error) {
    logger.debug({ err: error }, 'Telemetry provider threw');
  }
}
