/**
 * Stack configuration
 *
 * A `StackConfig` describes which standard middleware to put in front of a
 * service. It can come from code, from a JSON file, or from `STRATA_*`
 * environment variables; every source goes through the same schema.
 */

import { z } from 'zod';
import { rateSchema } from '@strata/limit';
import { parseConfig } from '@strata/service';

export const stackConfigSchema = z
  .object({
    /** Per-request deadline */
    timeoutMs: z.number().finite().positive().optional(),
    /** Maximum in-flight requests across clones */
    concurrencyLimit: z.number().int().positive().optional(),
    rateLimit: rateSchema.optional(),
    /** Fail with `OverloadedError` instead of waiting for capacity */
    loadShed: z.boolean().optional(),
    /** Queue size of a buffer worker in front of the service */
    bufferBound: z.number().int().positive().optional(),
    trace: z.object({ name: z.string().min(1) }).optional(),
  })
  .strict();

export type StackConfig = z.infer<typeof stackConfigSchema>;

/**
 * Parse a stack configuration, or throw `ConfigError` listing every
 * invalid field.
 */
export function validateStackConfig(input: unknown): StackConfig {
  return parseConfig(stackConfigSchema, input);
}

function num(v: string | undefined): number | undefined {
  return v === undefined || v.trim() === '' ? undefined : Number(v);
}

function bool(v: string | undefined): boolean | string | undefined {
  if (v === undefined || v.trim() === '') {
    return undefined;
  }
  return v === 'true' ? true : v === 'false' ? false : v;
}

/**
 * Read a stack configuration from environment variables.
 *
 * | Variable                   | Field                |
 * | -------------------------- | -------------------- |
 * | `STRATA_TIMEOUT_MS`        | `timeoutMs`          |
 * | `STRATA_CONCURRENCY_LIMIT` | `concurrencyLimit`   |
 * | `STRATA_RATE_LIMIT_NUM`    | `rateLimit.num`      |
 * | `STRATA_RATE_LIMIT_PER_MS` | `rateLimit.perMs`    |
 * | `STRATA_LOAD_SHED`         | `loadShed`           |
 * | `STRATA_BUFFER_BOUND`      | `bufferBound`        |
 * | `STRATA_TRACE_NAME`        | `trace.name`         |
 *
 * Unset or empty variables leave their field out. The rate limit is
 * configured only when one of its two variables is set, and then needs
 * both.
 */
export function loadStackConfig(env: NodeJS.ProcessEnv = process.env): StackConfig {
  const rateNum = num(env.STRATA_RATE_LIMIT_NUM);
  const ratePerMs = num(env.STRATA_RATE_LIMIT_PER_MS);
  const traceName = env.STRATA_TRACE_NAME;

  const raw = {
    timeoutMs: num(env.STRATA_TIMEOUT_MS),
    concurrencyLimit: num(env.STRATA_CONCURRENCY_LIMIT),
    rateLimit: rateNum === undefined && ratePerMs === undefined ? undefined : { num: rateNum, perMs: ratePerMs },
    loadShed: bool(env.STRATA_LOAD_SHED),
    bufferBound: num(env.STRATA_BUFFER_BOUND),
    trace: traceName ? { name: traceName } : undefined,
  };

  return validateStackConfig(raw);
}
