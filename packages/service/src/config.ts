/**
 * Middleware option validation
 *
 * Middleware checks its options when it is constructed, so a bad stack
 * fails at assembly time instead of on the first request.
 */

import type { z } from 'zod';

/**
 * Validation error for one option
 */
export interface ConfigValidationError {
  field: string;
  message: string;
}

/**
 * Configuration validation error
 */
export class ConfigError extends Error {
  readonly errors: ConfigValidationError[];

  constructor(errors: ConfigValidationError[]) {
    const message = errors.map((e) => `${e.field}: ${e.message}`).join('; ');
    super(`Invalid middleware configuration: ${message}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

/**
 * Parse `input` with `schema`, or throw a `ConfigError` listing every issue.
 *
 * @param prefix - Field name prepended to issue paths (e.g. `timeout`)
 *
 * @example
 * ```typescript
 * try {
 *   parseConfig(positiveMillis, -1, 'durationMs');
 * } catch (e) {
 *   if (e instanceof ConfigError) {
 *     console.error('Config errors:', e.errors);
 *   }
 * }
 * ```
 */
export function parseConfig<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  prefix?: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  throw new ConfigError(
    result.error.issues.map((issue) => ({
      field: [prefix, ...issue.path].filter((part) => part !== undefined && part !== '').join('.') || '(root)',
      message: issue.message,
    }))
  );
}
