import { z } from 'zod';
import { CancelledError, parseConfig } from '@strata/service';

export const backoffSchema = z
  .object({
    initialDelayMs: z.number().finite().positive(),
    maxDelayMs: z.number().finite().positive(),
    multiplier: z.number().finite().min(1).default(2),
    /** Fraction of each delay that is randomised away, 0 to 1 */
    jitter: z.number().min(0).max(1).default(0),
  })
  .refine((b) => b.maxDelayMs >= b.initialDelayMs, {
    message: 'maxDelayMs must not be less than initialDelayMs',
    path: ['maxDelayMs'],
  });

export type BackoffOptions = z.input<typeof backoffSchema>;

/**
 * Delay before retry `n` (counting from 0) is
 * `min(initialDelayMs * multiplier^n, maxDelayMs)`, reduced by up to
 * `jitter` of itself at random.
 */
export class ExponentialBackoff {
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly multiplier: number;
  readonly jitter: number;

  constructor(
    options: BackoffOptions,
    private readonly random: () => number = Math.random
  ) {
    const parsed = parseConfig(backoffSchema, options, 'backoff');
    this.initialDelayMs = parsed.initialDelayMs;
    this.maxDelayMs = parsed.maxDelayMs;
    this.multiplier = parsed.multiplier;
    this.jitter = parsed.jitter;
  }

  delay(retry: number): number {
    const base = Math.min(this.initialDelayMs * Math.pow(this.multiplier, retry), this.maxDelayMs);
    return Math.round(base - base * this.jitter * this.random());
  }
}

/**
 * Resolve after `ms`, or reject with `CancelledError` when `signal` aborts.
 */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new CancelledError('backoff aborted'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError('backoff aborted'));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
