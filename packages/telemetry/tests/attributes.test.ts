/**
 * @strata/telemetry - Attribute constants tests
 */

import { describe, it, expect } from 'vitest';
import { STRATA_ATTRS, STRATA_EVENTS } from '../src/attributes.js';

describe('STRATA_ATTRS', () => {
  it('should namespace every attribute under strata.', () => {
    for (const name of Object.values(STRATA_ATTRS)) {
      expect(name.startsWith('strata.')).toBe(true);
    }
  });

  it('should define request attributes', () => {
    expect(STRATA_ATTRS.SERVICE).toBe('strata.service');
    expect(STRATA_ATTRS.OUTCOME).toBe('strata.outcome');
    expect(STRATA_ATTRS.DURATION_MS).toBe('strata.duration_ms');
    expect(STRATA_ATTRS.ERROR_CODE).toBe('strata.error_code');
    expect(STRATA_ATTRS.EVENT).toBe('strata.event');
  });
});

describe('STRATA_EVENTS', () => {
  it('should define request lifecycle events', () => {
    expect(STRATA_EVENTS.REQUEST_STARTED).toBe('strata.request.started');
    expect(STRATA_EVENTS.REQUEST_FINISHED).toBe('strata.request.finished');
  });
});
