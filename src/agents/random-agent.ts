import { GameAlreadyOverError } from '../engine/errors';
import type { GameModel } from '../engine/types';
import { createSeededRNG } from './seeded-rng';
import type { SeededRNG } from './seeded-rng';
import type { Agent } from './types';

/**
 * Baseline agent: picks a uniformly random legal action from a seeded RNG.
 * The RNG advances across calls, so a series of contests stays reproducible.
 */
export class RandomAgent<S, A> implements Agent<S, A> {
  readonly name: string;
  private readonly game: GameModel<S, A>;
  private readonly rng: SeededRNG;

  constructor(game: GameModel<S, A>, seed = 42, name = 'Random') {
    this.game = game;
    this.rng = createSeededRNG(seed);
    this.name = name;
  }

  decide(state: S): A {
    const actions = this.game.legalActions(state);
    if (actions.length === 0) {
      throw new GameAlreadyOverError(`${this.name}: no legal actions, game is over`);
    }
    return actions[this.rng.nextIndex(actions.length)];
  }
}
