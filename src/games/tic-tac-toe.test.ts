import {
  createTicTacToe,
  createTicTacToeEvaluator,
  parseBoard,
  renderBoard,
  winningLines,
} from './tic-tac-toe';
import { Player } from '../engine/types';
import type { TicTacToeState } from './tic-tac-toe';

describe('createTicTacToe', () => {
  const game = createTicTacToe();

  it('starts empty with X to move and nine legal cells in row-major order', () => {
    const s = game.initialState();
    expect(game.currentPlayer(s)).toBe(Player.One);
    expect(game.isTerminal(s)).toBe(false);
    const actions = game.legalActions(s);
    expect(actions).toHaveLength(9);
    expect(actions[0]).toEqual({ row: 0, col: 0 });
    expect(actions[8]).toEqual({ row: 2, col: 2 });
  });

  it('apply places the mark and passes the turn without touching the input', () => {
    const s = game.initialState();
    const next = game.apply(s, { row: 1, col: 2 });
    expect(renderBoard(next)).toBe('...\n..X\n...');
    expect(game.currentPlayer(next)).toBe(Player.Two);
    expect(renderBoard(s)).toBe('...\n...\n...');
  });

  it('rejects occupied and off-board cells', () => {
    const s = game.apply(game.initialState(), { row: 0, col: 0 });
    expect(() => game.apply(s, { row: 0, col: 0 })).toThrow('Invalid move: cell (0, 0) is occupied');
    expect(() => game.apply(s, { row: 3, col: 0 })).toThrow('Invalid move: cell (3, 0) is off the board');
  });

  it('scores a diagonal win for X', () => {
    const s = parseBoard(['XO.', 'OX.', '..X']);
    expect(game.isTerminal(s)).toBe(true);
    expect(game.utility(s, Player.One)).toBe(1);
    expect(game.utility(s, Player.Two)).toBe(-1);
    expect(game.legalActions(s)).toEqual([]);
    expect(() => game.apply(s, { row: 0, col: 2 })).toThrow('Invalid move: game is over');
  });

  it('scores a full board without a line as a draw', () => {
    const s = parseBoard(['XOX', 'XOO', 'OXX']);
    expect(game.isTerminal(s)).toBe(true);
    expect(game.utility(s, Player.One)).toBe(0);
  });

  it('compares states and actions by value', () => {
    const a = game.apply(game.initialState(), { row: 0, col: 1 });
    const b = game.apply(game.initialState(), { row: 0, col: 1 });
    expect(a).not.toBe(b);
    expect(game.statesEqual(a, b)).toBe(true);
    expect(game.actionsEqual({ row: 1, col: 1 }, { row: 1, col: 1 })).toBe(true);
    expect(game.actionsEqual({ row: 1, col: 1 }, { row: 1, col: 0 })).toBe(false);
  });

  it('keys and describes', () => {
    const s = parseBoard(['X..', '.O.', '...']);
    expect(game.stateKey?.(s)).toBe('X../.O./...');
    expect(game.describeAction?.({ row: 2, col: 0 })).toBe('(2, 0)');
  });

  it('is zero-sum on every reachable terminal position', () => {
    const seen = new Set<string>();
    const terminals: TicTacToeState[] = [];
    const walk = (state: TicTacToeState): void => {
      const key = renderBoard(state);
      if (seen.has(key)) return;
      seen.add(key);
      if (game.isTerminal(state)) {
        terminals.push(state);
        return;
      }
      for (const action of game.legalActions(state)) {
        walk(game.apply(state, action));
      }
    };
    walk(game.initialState());

    expect(seen.size).toBe(5478);
    expect(terminals).toHaveLength(958);
    for (const state of terminals) {
      expect(game.utility(state, Player.One) + game.utility(state, Player.Two)).toBe(0);
    }
    const xWins = terminals.filter((s) => game.utility(s, Player.One) === 1).length;
    const draws = terminals.filter((s) => game.utility(s, Player.One) === 0).length;
    expect([xWins, draws]).toEqual([626, 16]);
  });

  it('supports larger boards', () => {
    const big = createTicTacToe(4);
    expect(big.name).toBe('tic-tac-toe-4x4');
    expect(big.legalActions(big.initialState())).toHaveLength(16);
    expect(winningLines(4)).toHaveLength(10);
  });
});

describe('parseBoard', () => {
  it('derives the mover from the mark counts', () => {
    expect(parseBoard(['X..', '...', '...']).toMove).toBe(Player.Two);
    expect(parseBoard(['XO.', '...', '...']).toMove).toBe(Player.One);
  });

  it('rejects impossible counts and bad cells', () => {
    expect(() => parseBoard(['OO.', '...', '...'])).toThrow('Invalid board: 0 X marks and 2 O marks');
    expect(() => parseBoard(['X?.', '...', '...'])).toThrow('Invalid board: unexpected cell "?"');
    expect(() => parseBoard(['X..', '..', '...'])).toThrow('Invalid board: row ".." must have 3 cells');
  });
});

describe('createTicTacToeEvaluator', () => {
  const evaluator = createTicTacToeEvaluator(3);

  it('is zero on the empty board', () => {
    expect(evaluator.evaluate(createTicTacToe().initialState(), Player.One)).toBe(0);
  });

  it('favours the centre and is antisymmetric', () => {
    const s = parseBoard(['...', '.X.', '...']);
    // The centre lies on four open lines: 4 / (8 * 3 + 1).
    expect(evaluator.evaluate(s, Player.One)).toBeCloseTo(4 / 25);
    expect(evaluator.evaluate(s, Player.Two)).toBeCloseTo(-4 / 25);
  });
});
