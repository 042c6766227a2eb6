import type { GameModel } from '../engine/types';
import type { Evaluator } from './evaluator';
import type { TieBreak } from '../config';

/**
 * Decision contract. `decide` must return one of `legalActions(state)` and
 * should settle within `timeBudgetMs` plus a small overshoot.
 */
export interface Agent<S, A> {
  readonly name: string;
  decide(state: S, timeBudgetMs: number): A | Promise<A>;
  /** Called when a pending decision is abandoned at the deadline. */
  abort?(): void | Promise<void>;
}

export interface AgentOptions {
  maxSearchDepth: number;
  tieBreak: TieBreak;
  seed: number;
}

export type AgentFactory = <S, A>(
  game: GameModel<S, A>,
  options: AgentOptions,
  evaluator?: Evaluator<S>
) => Agent<S, A>;

// Re-export for convenience
export type { Evaluator, GameModel };
