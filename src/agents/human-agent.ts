import { GameAlreadyOverError } from '../engine/errors';
import type { GameModel } from '../engine/types';
import type { Agent } from './types';

/** Line source, e.g. a `readline/promises` interface. */
export interface LinePrompt {
  question(query: string): Promise<string>;
}

export interface HumanAgentOptions {
  prompt: LinePrompt;
  write?: (text: string) => void;
  name?: string;
}

/**
 * Asks a person for each move: prints the position and the numbered legal
 * actions, then reads an index until a valid one is entered.
 */
export class HumanAgent<S, A> implements Agent<S, A> {
  readonly name: string;
  private readonly game: GameModel<S, A>;
  private readonly prompt: LinePrompt;
  private readonly write: (text: string) => void;

  constructor(game: GameModel<S, A>, options: HumanAgentOptions) {
    this.game = game;
    this.prompt = options.prompt;
    this.write = options.write ?? ((text) => console.log(text));
    this.name = options.name ?? 'Human';
  }

  async decide(state: S): Promise<A> {
    const actions = this.game.legalActions(state);
    if (actions.length === 0) {
      throw new GameAlreadyOverError(`${this.name}: no legal actions, game is over`);
    }

    if (this.game.describeState) {
      this.write(this.game.describeState(state));
    }
    this.write(`${this.name} (${this.game.currentPlayer(state)}) to move:`);
    actions.forEach((action, i) => {
      const label = this.game.describeAction ? this.game.describeAction(action) : JSON.stringify(action);
      this.write(`  (${i}) ${label}`);
    });

    for (;;) {
      const answer = (await this.prompt.question('> ')).trim();
      const index = Number(answer);
      if (answer !== '' && Number.isInteger(index) && index >= 0 && index < actions.length) {
        return actions[index];
      }
      this.write(`Enter a number from 0 to ${actions.length - 1}.`);
    }
  }
}
