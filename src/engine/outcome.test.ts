import { forfeitOutcome, isZeroSum, terminalOutcome } from './outcome';
import { ContestError } from './errors';
import { Player } from './types';
import { createTicTacToe, parseBoard } from '../games/tic-tac-toe';

const game = createTicTacToe();

describe('terminalOutcome', () => {
  it('names the winner of a finished game', () => {
    const state = parseBoard(['XXX', 'OO.', '...']);
    expect(terminalOutcome(game, state)).toEqual({
      utilities: { [Player.One]: 1, [Player.Two]: -1 },
      winner: Player.One,
      reason: 'terminal',
    });
  });

  it('reports a draw with no winner', () => {
    const state = parseBoard(['XOX', 'XOO', 'OXX']);
    const outcome = terminalOutcome(game, state);
    expect(outcome.winner).toBeNull();
    expect(outcome.utilities).toEqual({ [Player.One]: 0, [Player.Two]: 0 });
  });

  it('refuses a non-terminal state', () => {
    expect(() => terminalOutcome(game, game.initialState())).toThrow(ContestError);
  });

  it('flags utilities that do not sum to zero', () => {
    const broken = { ...game, utility: () => 1 };
    try {
      terminalOutcome(broken, parseBoard(['XXX', 'OO.', '...']));
      throw new Error('expected terminalOutcome to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ContestError);
      if (err instanceof ContestError) {
        expect(err.kind).toBe('GameModelFailure');
        expect(err.message).toBe('tic-tac-toe: utilities 1 and 1 do not sum to zero');
      }
    }
  });
});

describe('forfeitOutcome', () => {
  it('awards the forfeit to the opponent of the violator', () => {
    const violation = { player: Player.Two, kind: 'Timeout' as const, message: 'slow' };
    expect(forfeitOutcome(violation, 1)).toEqual({
      utilities: { [Player.One]: 1, [Player.Two]: -1 },
      winner: Player.One,
      reason: 'forfeit',
      violation,
    });
  });

  it('scales by the forfeit utility', () => {
    const outcome = forfeitOutcome({ player: Player.One, kind: 'IllegalAction', message: 'bad' }, 3);
    expect(outcome.utilities[Player.One]).toBe(-3);
    expect(outcome.utilities[Player.Two]).toBe(3);
    expect(outcome.winner).toBe(Player.Two);
    expect(isZeroSum(outcome.utilities)).toBe(true);
  });
});

describe('isZeroSum', () => {
  it('tolerates rounding noise only', () => {
    expect(isZeroSum({ [Player.One]: 0.1 + 0.2, [Player.Two]: -0.3 })).toBe(true);
    expect(isZeroSum({ [Player.One]: 0.5, [Player.Two]: -0.4 })).toBe(false);
  });
});
