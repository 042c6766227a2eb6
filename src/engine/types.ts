export enum Player {
  One = 'one',
  Two = 'two',
}

export const PLAYERS: Player[] = [Player.One, Player.Two];

export function opponent(player: Player): Player {
  return player === Player.One ? Player.Two : Player.One;
}

/**
 * Rules contract every game implements. States and actions are treated as
 * immutable values; `apply` returns a fresh state.
 */
export interface GameModel<S, A> {
  readonly name: string;
  initialState(): S;
  currentPlayer(state: S): Player;
  /** Non-empty unless the state is terminal. Order is stable across calls. */
  legalActions(state: S): A[];
  /** Only defined for members of `legalActions(state)`; throws otherwise. */
  apply(state: S, action: A): S;
  isTerminal(state: S): boolean;
  /** Terminal states only. utility(s, One) + utility(s, Two) === 0. */
  utility(state: S, player: Player): number;
  statesEqual(a: S, b: S): boolean;
  actionsEqual(a: A, b: A): boolean;
  /** Canonical key of a state, used for transposition lookups. */
  stateKey?(state: S): string;
  describeAction?(action: A): string;
  /** Human-readable rendering, shown to interactive players. */
  describeState?(state: S): string;
}
