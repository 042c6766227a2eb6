import type { Evaluator } from '../agents/evaluator';
import type { GameModel } from '../engine/types';
import { Player, opponent } from '../engine/types';

export type Mark = Player | null;

export interface TicTacToeState {
  size: number;
  /** Row-major cells. */
  board: readonly Mark[];
  toMove: Player;
}

export interface Cell {
  row: number;
  col: number;
}

const MARK_SYMBOL: Record<Player, string> = {
  [Player.One]: 'X',
  [Player.Two]: 'O',
};

/** All rows, columns and both diagonals as lists of cell indices. */
export function winningLines(size: number): number[][] {
  const lines: number[][] = [];
  for (let r = 0; r < size; r++) {
    lines.push(Array.from({ length: size }, (_, c) => r * size + c));
  }
  for (let c = 0; c < size; c++) {
    lines.push(Array.from({ length: size }, (_, r) => r * size + c));
  }
  lines.push(Array.from({ length: size }, (_, i) => i * size + i));
  lines.push(Array.from({ length: size }, (_, i) => i * size + (size - 1 - i)));
  return lines;
}

export function lineWinner(state: TicTacToeState, lines: number[][]): Player | null {
  for (const line of lines) {
    const first = state.board[line[0]];
    if (first !== null && line.every((i) => state.board[i] === first)) {
      return first;
    }
  }
  return null;
}

export function renderBoard(state: TicTacToeState): string {
  const rows: string[] = [];
  for (let r = 0; r < state.size; r++) {
    const cells = state.board.slice(r * state.size, (r + 1) * state.size);
    rows.push(cells.map((m) => (m === null ? '.' : MARK_SYMBOL[m])).join(''));
  }
  return rows.join('\n');
}

/**
 * Builds a state from rows such as ['X.O', '.X.', '...']. The mover is derived
 * from the mark counts (X moves first).
 */
export function parseBoard(rows: string[]): TicTacToeState {
  const size = rows.length;
  const board: Mark[] = [];
  for (const row of rows) {
    if (row.length !== size) {
      throw new Error(`Invalid board: row "${row}" must have ${size} cells`);
    }
    for (const ch of row) {
      if (ch === 'X') board.push(Player.One);
      else if (ch === 'O') board.push(Player.Two);
      else if (ch === '.') board.push(null);
      else throw new Error(`Invalid board: unexpected cell "${ch}"`);
    }
  }
  const xs = board.filter((m) => m === Player.One).length;
  const os = board.filter((m) => m === Player.Two).length;
  if (xs !== os && xs !== os + 1) {
    throw new Error(`Invalid board: ${xs} X marks and ${os} O marks`);
  }
  return { size, board, toMove: xs === os ? Player.One : Player.Two };
}

export function createTicTacToe(size = 3): GameModel<TicTacToeState, Cell> {
  if (!Number.isInteger(size) || size < 2) {
    throw new Error(`Invalid tic-tac-toe size ${size}`);
  }
  const lines = winningLines(size);

  const isFull = (state: TicTacToeState): boolean => state.board.every((m) => m !== null);

  return {
    name: size === 3 ? 'tic-tac-toe' : `tic-tac-toe-${size}x${size}`,

    initialState(): TicTacToeState {
      return { size, board: new Array<Mark>(size * size).fill(null), toMove: Player.One };
    },

    currentPlayer(state: TicTacToeState): Player {
      return state.toMove;
    },

    legalActions(state: TicTacToeState): Cell[] {
      if (this.isTerminal(state)) return [];
      const actions: Cell[] = [];
      state.board.forEach((mark, i) => {
        if (mark === null) actions.push({ row: Math.floor(i / size), col: i % size });
      });
      return actions;
    },

    apply(state: TicTacToeState, action: Cell): TicTacToeState {
      const { row, col } = action;
      if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || row >= size || col < 0 || col >= size) {
        throw new Error(`Invalid move: cell (${row}, ${col}) is off the board`);
      }
      if (this.isTerminal(state)) {
        throw new Error('Invalid move: game is over');
      }
      const idx = row * size + col;
      if (state.board[idx] !== null) {
        throw new Error(`Invalid move: cell (${row}, ${col}) is occupied`);
      }
      const board = state.board.slice();
      board[idx] = state.toMove;
      return { size, board, toMove: opponent(state.toMove) };
    },

    isTerminal(state: TicTacToeState): boolean {
      return lineWinner(state, lines) !== null || isFull(state);
    },

    utility(state: TicTacToeState, player: Player): number {
      const winner = lineWinner(state, lines);
      if (winner === null) {
        if (!isFull(state)) throw new Error('utility is only defined for terminal states');
        return 0;
      }
      return winner === player ? 1 : -1;
    },

    statesEqual(a: TicTacToeState, b: TicTacToeState): boolean {
      return (
        a.size === b.size &&
        a.toMove === b.toMove &&
        a.board.every((m, i) => m === b.board[i])
      );
    },

    actionsEqual(a: Cell, b: Cell): boolean {
      return a.row === b.row && a.col === b.col;
    },

    stateKey(state: TicTacToeState): string {
      return renderBoard(state).replace(/\n/g, '/');
    },

    describeAction(action: Cell): string {
      return `(${action.row}, ${action.col})`;
    },

    describeState: renderBoard,
  };
}

/**
 * Counts lines still open for each side: a line holding only one player's
 * marks scores one point per mark for that player.
 */
export function createTicTacToeEvaluator(size = 3): Evaluator<TicTacToeState> {
  const lines = winningLines(size);
  return {
    evaluate(state: TicTacToeState, player: Player): number {
      let score = 0;
      for (const line of lines) {
        let mine = 0;
        let theirs = 0;
        for (const i of line) {
          const mark = state.board[i];
          if (mark === player) mine++;
          else if (mark !== null) theirs++;
        }
        if (theirs === 0) score += mine;
        else if (mine === 0) score -= theirs;
      }
      // Keep heuristic values strictly inside the (-1, 1) utility range.
      return score / (lines.length * size + 1);
    },
  };
}
