/**
 * Retry policies
 *
 * A policy looks at how an attempt ended and decides whether to try again.
 * Deciding "yes" returns a promise of the policy for the next attempt; the
 * promise is where a policy waits out its backoff. A rejected promise means
 * no retry after all.
 */

export type Outcome<Res> =
  | { readonly status: 'ok'; readonly response: Res }
  | { readonly status: 'error'; readonly error: Error };

export interface Policy<Req, Res> {
  /**
   * @param signal - Aborts when the caller cancels the request; a policy
   * that waits should stop waiting
   * @returns `undefined` to stop and forward `outcome`
   */
  retry(request: Req, outcome: Outcome<Res>, signal: AbortSignal): Promise<Policy<Req, Res>> | undefined;

  /**
   * Copy of `request` for a later attempt, or `undefined` when the request
   * cannot be sent twice.
   */
  cloneRequest(request: Req): Req | undefined;
}
