import { getGame, getGames } from './registry';
import { ConfigurationError } from '../engine/errors';

describe('game registry', () => {
  it('builds every registered game under its own name', () => {
    for (const entry of getGames()) {
      const game = entry.create();
      expect(game.name).toBe(entry.name);
      expect(game.legalActions(game.initialState()).length).toBeGreaterThan(0);
      expect(entry.evaluator).toBeDefined();
    }
  });

  it('looks games up by name', () => {
    expect(getGame('counting-21').create().name).toBe('counting-21');
  });

  it('throws ConfigurationError for unknown games', () => {
    expect(() => getGame('chess')).toThrow(ConfigurationError);
    expect(() => getGame('chess')).toThrow('Unknown game "chess"');
  });
});
