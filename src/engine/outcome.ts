import { ContestError } from './errors';
import type { GameModel } from './types';
import { Player, opponent } from './types';

export type ViolationKind = 'IllegalAction' | 'Timeout';

export interface Violation {
  player: Player;
  kind: ViolationKind;
  message: string;
}

export interface FinalOutcome {
  utilities: Record<Player, number>;
  winner: Player | null;
  reason: 'terminal' | 'forfeit';
  violation?: Violation;
}

const ZERO_SUM_EPSILON = 1e-9;

function winnerOf(utilities: Record<Player, number>): Player | null {
  if (utilities[Player.One] > utilities[Player.Two]) return Player.One;
  if (utilities[Player.Two] > utilities[Player.One]) return Player.Two;
  return null;
}

export function isZeroSum(utilities: Record<Player, number>): boolean {
  return Math.abs(utilities[Player.One] + utilities[Player.Two]) <= ZERO_SUM_EPSILON;
}

/**
 * Reads the utilities of a terminal state. Throws GameModelFailure if the
 * state is not terminal or the game breaks the zero-sum invariant.
 */
export function terminalOutcome<S, A>(game: GameModel<S, A>, state: S): FinalOutcome {
  if (!game.isTerminal(state)) {
    throw new ContestError('GameModelFailure', `${game.name}: utility requested for a non-terminal state`);
  }
  const utilities: Record<Player, number> = {
    [Player.One]: game.utility(state, Player.One),
    [Player.Two]: game.utility(state, Player.Two),
  };
  if (!isZeroSum(utilities)) {
    throw new ContestError(
      'GameModelFailure',
      `${game.name}: utilities ${utilities[Player.One]} and ${utilities[Player.Two]} do not sum to zero`
    );
  }
  return { utilities, winner: winnerOf(utilities), reason: 'terminal' };
}

export function forfeitOutcome(violation: Violation, forfeitUtility: number): FinalOutcome {
  const winner = opponent(violation.player);
  const utilities: Record<Player, number> = {
    [Player.One]: winner === Player.One ? forfeitUtility : -forfeitUtility,
    [Player.Two]: winner === Player.Two ? forfeitUtility : -forfeitUtility,
  };
  return { utilities, winner, reason: 'forfeit', violation };
}
