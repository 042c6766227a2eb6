import { z } from 'zod';
import type { Evaluator } from '../agents/evaluator';
import type { GameModel } from '../engine/types';
import { Player, opponent } from '../engine/types';

export interface CountingState {
  total: number;
  toMove: Player;
  /** Player who made the last increment; null before the first move. */
  lastMover: Player | null;
}

export interface CountingAction {
  increment: number;
}

/** Wire shapes, for agents hosted in a worker thread. */
export const countingStateSchema = z.object({
  total: z.number().int().nonnegative(),
  toMove: z.nativeEnum(Player),
  lastMover: z.nativeEnum(Player).nullable(),
});

export const countingActionSchema = z.object({ increment: z.number().int() });

export interface CountingGameOptions {
  target?: number;
  maxIncrement?: number;
}

/**
 * Players take turns adding 1..maxIncrement to a shared total. Whoever brings
 * the total to the target (or past it) wins.
 */
export function createCountingGame(
  options: CountingGameOptions = {}
): GameModel<CountingState, CountingAction> {
  const target = options.target ?? 21;
  const maxIncrement = options.maxIncrement ?? 3;
  if (!Number.isInteger(target) || target < 1) {
    throw new Error(`Invalid counting target ${target}`);
  }
  if (!Number.isInteger(maxIncrement) || maxIncrement < 1) {
    throw new Error(`Invalid counting maxIncrement ${maxIncrement}`);
  }

  return {
    name: `counting-${target}`,

    initialState(): CountingState {
      return { total: 0, toMove: Player.One, lastMover: null };
    },

    currentPlayer(state: CountingState): Player {
      return state.toMove;
    },

    legalActions(state: CountingState): CountingAction[] {
      if (state.total >= target) return [];
      return Array.from({ length: maxIncrement }, (_, i) => ({ increment: i + 1 }));
    },

    apply(state: CountingState, action: CountingAction): CountingState {
      if (state.total >= target) {
        throw new Error('Invalid move: game is over');
      }
      const { increment } = action;
      if (!Number.isInteger(increment) || increment < 1 || increment > maxIncrement) {
        throw new Error(`Invalid move: increment ${increment} out of range [1, ${maxIncrement}]`);
      }
      return {
        total: state.total + increment,
        toMove: opponent(state.toMove),
        lastMover: state.toMove,
      };
    },

    isTerminal(state: CountingState): boolean {
      return state.total >= target;
    },

    utility(state: CountingState, player: Player): number {
      if (state.total < target || state.lastMover === null) {
        throw new Error('utility is only defined for terminal states');
      }
      return state.lastMover === player ? 1 : -1;
    },

    statesEqual(a: CountingState, b: CountingState): boolean {
      return a.total === b.total && a.toMove === b.toMove && a.lastMover === b.lastMover;
    },

    actionsEqual(a: CountingAction, b: CountingAction): boolean {
      return a.increment === b.increment;
    },

    stateKey(state: CountingState): string {
      return `${state.total}:${state.toMove}`;
    },

    describeAction(action: CountingAction): string {
      return `+${action.increment}`;
    },

    describeState(state: CountingState): string {
      return `total ${state.total}/${target}, ${state.toMove} to move`;
    },
  };
}

/**
 * The side to move is lost when the distance to the target is a multiple of
 * maxIncrement + 1.
 */
export function createCountingEvaluator(
  options: CountingGameOptions = {}
): Evaluator<CountingState> {
  const target = options.target ?? 21;
  const period = (options.maxIncrement ?? 3) + 1;
  return {
    evaluate(state: CountingState, player: Player): number {
      const moverLoses = (target - state.total) % period === 0;
      const good = moverLoses ? opponent(state.toMove) : state.toMove;
      return good === player ? 0.5 : -0.5;
    },
  };
}
