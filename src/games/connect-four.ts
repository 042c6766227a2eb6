import type { Evaluator } from '../agents/evaluator';
import type { GameModel } from '../engine/types';
import { Player, opponent } from '../engine/types';

export const COLUMNS = 7;
export const ROWS = 6;
const CONNECT = 4;

export interface ConnectFourState {
  /** One stack per column, bottom piece first. */
  columns: readonly (readonly Player[])[];
  toMove: Player;
  winner: Player | null;
  moves: number;
}

export interface Drop {
  column: number;
}

const SYMBOL: Record<Player, string> = {
  [Player.One]: 'X',
  [Player.Two]: 'O',
};

const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [1, 0],
  [0, 1],
  [1, 1],
  [1, -1],
];

function pieceAt(columns: ConnectFourState['columns'], col: number, row: number): Player | null {
  if (col < 0 || col >= COLUMNS || row < 0) return null;
  return columns[col][row] ?? null;
}

function connectsAt(columns: ConnectFourState['columns'], col: number, row: number, player: Player): boolean {
  for (const [dc, dr] of DIRECTIONS) {
    let run = 1;
    for (const sign of [1, -1]) {
      let c = col + sign * dc;
      let r = row + sign * dr;
      while (pieceAt(columns, c, r) === player) {
        run++;
        c += sign * dc;
        r += sign * dr;
      }
    }
    if (run >= CONNECT) return true;
  }
  return false;
}

/** Every run of four cells on the board, as [col, row] pairs. */
export function connectFourWindows(): Array<Array<[number, number]>> {
  const windows: Array<Array<[number, number]>> = [];
  for (let c = 0; c < COLUMNS; c++) {
    for (let r = 0; r < ROWS; r++) {
      for (const [dc, dr] of DIRECTIONS) {
        const endC = c + (CONNECT - 1) * dc;
        const endR = r + (CONNECT - 1) * dr;
        if (endC < 0 || endC >= COLUMNS || endR < 0 || endR >= ROWS) continue;
        windows.push(Array.from({ length: CONNECT }, (_, i): [number, number] => [c + i * dc, r + i * dr]));
      }
    }
  }
  return windows;
}

export function renderConnectFour(state: ConnectFourState): string {
  const rows: string[] = [];
  for (let r = ROWS - 1; r >= 0; r--) {
    let line = '';
    for (let c = 0; c < COLUMNS; c++) {
      const piece = pieceAt(state.columns, c, r);
      line += piece === null ? '.' : SYMBOL[piece];
    }
    rows.push(line);
  }
  return rows.join('\n');
}

/**
 * Builds a state from six rows of seven cells, top row first, e.g.
 * ['.......', ..., '...X...']. Pieces may not float over empty cells.
 */
export function parseConnectFour(rows: string[]): ConnectFourState {
  if (rows.length !== ROWS || rows.some((row) => row.length !== COLUMNS)) {
    throw new Error(`Invalid board: expected ${ROWS} rows of ${COLUMNS} cells`);
  }
  const columns: Player[][] = Array.from({ length: COLUMNS }, () => []);
  for (let c = 0; c < COLUMNS; c++) {
    for (let r = 0; r < ROWS; r++) {
      const ch = rows[ROWS - 1 - r][c];
      if (ch === '.') continue;
      if (ch !== 'X' && ch !== 'O') {
        throw new Error(`Invalid board: unexpected cell "${ch}"`);
      }
      if (columns[c].length !== r) {
        throw new Error(`Invalid board: floating piece in column ${c}`);
      }
      columns[c].push(ch === 'X' ? Player.One : Player.Two);
    }
  }
  const xs = columns.flat().filter((p) => p === Player.One).length;
  const os = columns.flat().filter((p) => p === Player.Two).length;
  if (xs !== os && xs !== os + 1) {
    throw new Error(`Invalid board: ${xs} X pieces and ${os} O pieces`);
  }

  let winner: Player | null = null;
  for (const window of connectFourWindows()) {
    const first = pieceAt(columns, window[0][0], window[0][1]);
    if (first !== null && window.every(([c, r]) => pieceAt(columns, c, r) === first)) {
      winner = first;
      break;
    }
  }
  return { columns, toMove: xs === os ? Player.One : Player.Two, winner, moves: xs + os };
}

/**
 * Connect-4 on a 7x6 board: players drop pieces into columns and the first
 * to line up four in any direction wins. A full board is a draw.
 */
export function createConnectFour(): GameModel<ConnectFourState, Drop> {
  const isTerminal = (state: ConnectFourState): boolean =>
    state.winner !== null || state.moves === COLUMNS * ROWS;

  return {
    name: 'connect-four',

    initialState(): ConnectFourState {
      return {
        columns: Array.from({ length: COLUMNS }, () => []),
        toMove: Player.One,
        winner: null,
        moves: 0,
      };
    },

    currentPlayer(state: ConnectFourState): Player {
      return state.toMove;
    },

    legalActions(state: ConnectFourState): Drop[] {
      if (isTerminal(state)) return [];
      const actions: Drop[] = [];
      state.columns.forEach((stack, column) => {
        if (stack.length < ROWS) actions.push({ column });
      });
      return actions;
    },

    apply(state: ConnectFourState, action: Drop): ConnectFourState {
      const { column } = action;
      if (!Number.isInteger(column) || column < 0 || column >= COLUMNS) {
        throw new Error(`Invalid move: column ${column} is off the board`);
      }
      if (isTerminal(state)) {
        throw new Error('Invalid move: game is over');
      }
      const stack = state.columns[column];
      if (stack.length >= ROWS) {
        throw new Error(`Invalid move: column ${column} is full`);
      }
      const columns = state.columns.slice();
      columns[column] = [...stack, state.toMove];
      return {
        columns,
        toMove: opponent(state.toMove),
        winner: connectsAt(columns, column, stack.length, state.toMove) ? state.toMove : null,
        moves: state.moves + 1,
      };
    },

    isTerminal,

    utility(state: ConnectFourState, player: Player): number {
      if (!isTerminal(state)) {
        throw new Error('utility is only defined for terminal states');
      }
      if (state.winner === null) return 0;
      return state.winner === player ? 1 : -1;
    },

    statesEqual(a: ConnectFourState, b: ConnectFourState): boolean {
      return (
        a.toMove === b.toMove &&
        a.winner === b.winner &&
        a.moves === b.moves &&
        a.columns.every((stack, c) => stack.length === b.columns[c].length && stack.every((p, r) => p === b.columns[c][r]))
      );
    },

    actionsEqual(a: Drop, b: Drop): boolean {
      return a.column === b.column;
    },

    stateKey(state: ConnectFourState): string {
      return state.columns.map((stack) => stack.map((p) => SYMBOL[p]).join('')).join('|');
    },

    describeAction(action: Drop): string {
      return `column ${action.column}`;
    },

    describeState: renderConnectFour,
  };
}

/**
 * Same open-window count as the tic-tac-toe evaluator, over every run of four
 * cells. Central cells sit in more windows, so they score higher.
 */
export function createConnectFourEvaluator(): Evaluator<ConnectFourState> {
  const windows = connectFourWindows();
  const scale = windows.length * CONNECT + 1;
  return {
    evaluate(state: ConnectFourState, player: Player): number {
      let score = 0;
      for (const window of windows) {
        let mine = 0;
        let theirs = 0;
        for (const [c, r] of window) {
          const piece = pieceAt(state.columns, c, r);
          if (piece === player) mine++;
          else if (piece !== null) theirs++;
        }
        if (theirs === 0) score += mine;
        else if (mine === 0) score -= theirs;
      }
      return score / scale;
    },
  };
}
