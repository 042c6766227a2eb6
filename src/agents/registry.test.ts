import { getAgent, getAgents } from './registry';
import { ConfigurationError } from '../engine/errors';
import { createCountingEvaluator, createCountingGame } from '../games/counting-game';

describe('agent registry', () => {
  const game = createCountingGame({ target: 10 });
  const options = { maxSearchDepth: 10, tieBreak: 'first' as const, seed: 1 };

  it('lists the built-in agents', () => {
    expect(getAgents().map((a) => a.name)).toEqual(['Minimax', 'Random', 'FirstLegal']);
  });

  it('builds agents that play legal actions', async () => {
    const state = game.initialState();
    for (const entry of getAgents()) {
      const agent = entry.factory(game, options, createCountingEvaluator({ target: 10 }));
      expect(agent.name).toBe(entry.name);
      const action = await agent.decide(state, 1000);
      expect(game.legalActions(state)).toContainEqual(action);
    }
  });

  it('wires search depth into Minimax', async () => {
    const agent = getAgent('Minimax').factory(game, options);
    await expect(Promise.resolve(agent.decide(game.initialState(), 5000))).resolves.toEqual({ increment: 2 });
  });

  it('throws ConfigurationError for unknown agents', () => {
    expect(() => getAgent('Oracle')).toThrow(ConfigurationError);
  });
});
