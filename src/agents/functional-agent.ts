import type { Agent } from './types';

export type DecideFn<S, A> = (state: S, timeBudgetMs: number) => A | Promise<A>;

/** Wraps a plain function as an Agent. */
export function createFunctionalAgent<S, A>(name: string, decide: DecideFn<S, A>): Agent<S, A> {
  return { name, decide };
}
