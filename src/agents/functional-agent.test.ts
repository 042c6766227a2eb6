import { createFunctionalAgent } from './functional-agent';
import { createTicTacToe } from '../games/tic-tac-toe';
import type { Cell, TicTacToeState } from '../games/tic-tac-toe';

const game = createTicTacToe();

describe('createFunctionalAgent', () => {
  it('forwards state and budget', async () => {
    const seen: number[] = [];
    const agent = createFunctionalAgent<TicTacToeState, Cell>('fn', async (state, budget) => {
      seen.push(budget);
      return game.legalActions(state)[0];
    });
    expect(agent.name).toBe('fn');
    await expect(Promise.resolve(agent.decide(game.initialState(), 250))).resolves.toEqual({ row: 0, col: 0 });
    expect(seen).toEqual([250]);
  });

  it('passes synchronous answers straight through', () => {
    const agent = createFunctionalAgent<TicTacToeState, Cell>('sync', () => ({ row: 2, col: 2 }));
    expect(agent.decide(game.initialState(), 10)).toEqual({ row: 2, col: 2 });
  });
});
