import type { Evaluator } from '../agents/evaluator';
import { ConfigurationError } from '../engine/errors';
import type { GameModel } from '../engine/types';
import { createConnectFour, createConnectFourEvaluator } from './connect-four';
import { createCountingEvaluator, createCountingGame } from './counting-game';
import { createTicTacToe, createTicTacToeEvaluator } from './tic-tac-toe';

export interface GameEntry {
  name: string;
  description: string;
  create: () => GameModel<unknown, unknown>;
  evaluator?: Evaluator<unknown>;
}

/**
 * Games available to the simulator and the HTTP API.
 */
export function getGames(): GameEntry[] {
  return [
    {
      name: 'tic-tac-toe',
      description: '3x3 tic-tac-toe',
      create: () => createTicTacToe(3),
      evaluator: createTicTacToeEvaluator(3),
    },
    {
      name: 'tic-tac-toe-4x4',
      description: '4x4 tic-tac-toe, four in a row',
      create: () => createTicTacToe(4),
      evaluator: createTicTacToeEvaluator(4),
    },
    {
      name: 'connect-four',
      description: 'Connect-4 on a 7x6 board',
      create: () => createConnectFour(),
      evaluator: createConnectFourEvaluator(),
    },
    {
      name: 'counting-21',
      description: 'Add 1-3 to a running total; reaching 21 wins',
      create: () => createCountingGame({ target: 21, maxIncrement: 3 }),
      evaluator: createCountingEvaluator({ target: 21, maxIncrement: 3 }),
    },
  ];
}

export function getGame(name: string): GameEntry {
  const entry = getGames().find((g) => g.name === name);
  if (!entry) {
    throw new ConfigurationError(`Unknown game "${name}"`);
  }
  return entry;
}
