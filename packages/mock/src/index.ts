/**
 * @strata/mock
 *
 * Test doubles for Strata services. Not for production use.
 *
 * @example
 * ```typescript
 * import { pair, expectRequest } from '@strata/mock';
 *
 * const [svc, handle] = pair<string, number>();
 * const response = oneshot(svc, 'len');
 * (await expectRequest(handle, 'len')).respond(3);
 * await response; // 3
 * ```
 *
 * @packageDocumentation
 */

export type { PendingRequest } from './mock.js';
export { MockService, Handle, pair, expectRequest } from './mock.js';
