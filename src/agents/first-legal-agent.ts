import { GameAlreadyOverError } from '../engine/errors';
import type { GameModel } from '../engine/types';
import type { Agent } from './types';

/** Always plays the first action in the game's enumeration order. */
export class FirstLegalAgent<S, A> implements Agent<S, A> {
  readonly name: string;
  private readonly game: GameModel<S, A>;

  constructor(game: GameModel<S, A>, name = 'FirstLegal') {
    this.game = game;
    this.name = name;
  }

  decide(state: S): A {
    const [first] = this.game.legalActions(state);
    if (first === undefined) {
      throw new GameAlreadyOverError(`${this.name}: no legal actions, game is over`);
    }
    return first;
  }
}
