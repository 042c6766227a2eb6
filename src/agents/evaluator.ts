import type { Player } from '../engine/types';

/**
 * Heuristic value of a non-terminal state from `player`'s point of view.
 * Values should stay within the game's utility range so that proven wins and
 * losses dominate heuristic guesses.
 */
export interface Evaluator<S> {
  evaluate(state: S, player: Player): number;
}

export const zeroEvaluator: Evaluator<unknown> = {
  evaluate(): number {
    return 0;
  },
};
