import type { FinalOutcome } from './outcome';
import type { GameModel, Player } from './types';

export interface Transition<S, A> {
  index: number;
  player: Player;
  before: S;
  action: A;
  after: S;
  elapsedMs: number;
}

export type ReplayResult<S> =
  | { ok: true; finalState: S }
  | { ok: false; index: number; reason: string };

/**
 * Append-only record of a contest. Each transition must start from the state
 * the previous one ended in.
 */
export class History<S, A> implements Iterable<Transition<S, A>> {
  readonly initialState: S;
  private readonly transitions: Transition<S, A>[] = [];

  constructor(initialState: S) {
    this.initialState = initialState;
  }

  get length(): number {
    return this.transitions.length;
  }

  get finalState(): S {
    const last = this.transitions[this.transitions.length - 1];
    return last ? last.after : this.initialState;
  }

  at(index: number): Transition<S, A> | undefined {
    return this.transitions[index];
  }

  append(
    game: GameModel<S, A>,
    entry: Omit<Transition<S, A>, 'index'>
  ): Transition<S, A> {
    if (!game.statesEqual(entry.before, this.finalState)) {
      throw new Error(
        `History is append-only: transition ${this.transitions.length} does not start from the last recorded state`
      );
    }
    const transition = Object.freeze({ ...entry, index: this.transitions.length });
    this.transitions.push(transition);
    return transition;
  }

  actions(): A[] {
    return this.transitions.map((t) => t.action);
  }

  toArray(): Transition<S, A>[] {
    return [...this.transitions];
  }

  [Symbol.iterator](): Iterator<Transition<S, A>> {
    return this.toArray()[Symbol.iterator]();
  }

  /**
   * Re-applies the recorded actions from the initial state and checks every
   * recorded state is reproduced.
   */
  replay(game: GameModel<S, A>): ReplayResult<S> {
    let state = this.initialState;
    for (const t of this.transitions) {
      if (!game.statesEqual(state, t.before)) {
        return { ok: false, index: t.index, reason: 'state before action differs from replayed state' };
      }
      try {
        state = game.apply(state, t.action);
      } catch (err) {
        return { ok: false, index: t.index, reason: `apply failed: ${String(err)}` };
      }
      if (!game.statesEqual(state, t.after)) {
        return { ok: false, index: t.index, reason: 'replayed state differs from recorded state' };
      }
    }
    return { ok: true, finalState: state };
  }
}

export interface SerializedTransition<S, A> {
  index: number;
  player: Player;
  action: A;
  description?: string;
  after: S;
  elapsedMs: number;
}

export interface SerializedHistory<S, A> {
  game: string;
  initialState: S;
  transitions: SerializedTransition<S, A>[];
  outcome?: FinalOutcome;
}

/**
 * JSON-ready form of a history. `before` is dropped since it always equals the
 * previous transition's `after`.
 */
export function serializeHistory<S, A>(
  history: History<S, A>,
  game: GameModel<S, A>,
  outcome?: FinalOutcome
): SerializedHistory<S, A> {
  return {
    game: game.name,
    initialState: history.initialState,
    transitions: history.toArray().map((t) => ({
      index: t.index,
      player: t.player,
      action: t.action,
      ...(game.describeAction && { description: game.describeAction(t.action) }),
      after: t.after,
      elapsedMs: t.elapsedMs,
    })),
    ...(outcome && { outcome }),
  };
}
