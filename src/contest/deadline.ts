import type { Agent } from '../agents/types';

export type DecisionResult<A> =
  | { status: 'decided'; action: A; elapsedMs: number }
  | { status: 'timed_out'; elapsedMs: number }
  | { status: 'failed'; error: unknown; elapsedMs: number };

export interface DeadlineOptions {
  timeBudgetMs: number;
  toleranceMs: number;
  now?: () => number;
}

/**
 * Runs one decision against a timer set to budget + tolerance. A pending
 * decision is abandoned when the timer fires, and the agent's `abort` hook is
 * called so it can stop the work (WorkerAgent terminates its thread). A
 * decision that settles late is reported as timed out as well.
 *
 * In-process agents share the runner's thread: one that blocks without
 * yielding cannot be interrupted. Host such agents in a WorkerAgent.
 */
export async function decideWithDeadline<S, A>(
  agent: Agent<S, A>,
  state: S,
  options: DeadlineOptions
): Promise<DecisionResult<A>> {
  const now = options.now ?? (() => performance.now());
  const limitMs = options.timeBudgetMs + options.toleranceMs;
  const t0 = now();

  // Never rejects, so an abandoned decision cannot raise an unhandled rejection.
  const settled = Promise.resolve()
    .then(() => agent.decide(state, options.timeBudgetMs))
    .then(
      (action) => ({ status: 'decided' as const, action }),
      (error: unknown) => ({ status: 'failed' as const, error })
    );

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<{ status: 'timed_out' }>((resolve) => {
    timer = setTimeout(() => resolve({ status: 'timed_out' }), limitMs);
  });

  try {
    const result = await Promise.race([settled, expired]);
    const elapsedMs = now() - t0;
    if (result.status === 'timed_out') {
      if (agent.abort) {
        try {
          await agent.abort();
        } catch (error) {
          return { status: 'failed', error, elapsedMs };
        }
      }
      return { status: 'timed_out', elapsedMs };
    }
    if (elapsedMs > limitMs) {
      return { status: 'timed_out', elapsedMs };
    }
    if (result.status === 'failed') {
      return { status: 'failed', error: result.error, elapsedMs };
    }
    return { status: 'decided', action: result.action, elapsedMs };
  } finally {
    clearTimeout(timer);
  }
}
