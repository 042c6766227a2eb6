import { FirstLegalAgent } from './first-legal-agent';
import { createTicTacToe, parseBoard } from '../games/tic-tac-toe';

const game = createTicTacToe();

describe('FirstLegalAgent', () => {
  it('plays the first enumerated action', () => {
    const agent = new FirstLegalAgent(game);
    expect(agent.decide(parseBoard(['X..', '...', '...']))).toEqual({ row: 0, col: 1 });
    expect(agent.name).toBe('FirstLegal');
  });

  it('throws when the game is over', () => {
    expect(() => new FirstLegalAgent(game).decide(parseBoard(['XXX', 'OO.', '...']))).toThrow(
      'FirstLegal: no legal actions, game is over'
    );
  });
});
