import { History, serializeHistory } from './history';
import { Player } from './types';
import { createTicTacToe } from '../games/tic-tac-toe';
import type { Cell, TicTacToeState } from '../games/tic-tac-toe';

const game = createTicTacToe();

function play(cells: Cell[]): History<TicTacToeState, Cell> {
  const history = new History<TicTacToeState, Cell>(game.initialState());
  let state = history.initialState;
  for (const action of cells) {
    const after = game.apply(state, action);
    history.append(game, { player: game.currentPlayer(state), before: state, action, after, elapsedMs: 1 });
    state = after;
  }
  return history;
}

describe('History', () => {
  it('starts empty at the initial state', () => {
    const history = new History<TicTacToeState, Cell>(game.initialState());
    expect(history.length).toBe(0);
    expect(history.finalState).toBe(history.initialState);
    expect(history.at(0)).toBeUndefined();
  });

  it('numbers transitions in order and tracks the final state', () => {
    const history = play([{ row: 0, col: 0 }, { row: 1, col: 1 }]);
    expect(history.length).toBe(2);
    expect(history.at(0)?.index).toBe(0);
    expect(history.at(0)?.player).toBe(Player.One);
    expect(history.at(1)?.index).toBe(1);
    expect(history.at(1)?.player).toBe(Player.Two);
    expect(history.actions()).toEqual([{ row: 0, col: 0 }, { row: 1, col: 1 }]);
    expect(history.finalState.board[4]).toBe(Player.Two);
  });

  it('rejects a transition that does not continue from the last state', () => {
    const history = play([{ row: 0, col: 0 }]);
    const stale = history.initialState;
    expect(() =>
      history.append(game, {
        player: Player.One,
        before: stale,
        action: { row: 2, col: 2 },
        after: game.apply(stale, { row: 2, col: 2 }),
        elapsedMs: 0,
      })
    ).toThrow(/append-only/);
    expect(history.length).toBe(1);
  });

  it('freezes recorded transitions', () => {
    const history = play([{ row: 0, col: 0 }]);
    expect(Object.isFrozen(history.at(0))).toBe(true);
  });

  it('iterates the transitions', () => {
    const history = play([{ row: 0, col: 0 }, { row: 0, col: 1 }, { row: 0, col: 2 }]);
    expect([...history].map((t) => t.index)).toEqual([0, 1, 2]);
  });

  it('replays to the same final state', () => {
    const history = play([{ row: 0, col: 0 }, { row: 1, col: 1 }, { row: 2, col: 2 }]);
    const replayed = history.replay(game);
    expect(replayed.ok).toBe(true);
    if (replayed.ok) {
      expect(game.statesEqual(replayed.finalState, history.finalState)).toBe(true);
    }
  });

  it('reports where a replay diverges under different rules', () => {
    const history = play([{ row: 0, col: 0 }, { row: 1, col: 1 }]);
    const rigged = {
      ...game,
      apply: (state: TicTacToeState, action: Cell): TicTacToeState => {
        const next = game.apply(state, action);
        return action.row === 1 ? { ...next, toMove: state.toMove } : next;
      },
    };
    expect(history.replay(rigged)).toEqual({
      ok: false,
      index: 1,
      reason: 'replayed state differs from recorded state',
    });
  });
});

describe('serializeHistory', () => {
  it('describes each action and attaches the outcome', () => {
    const history = play([{ row: 0, col: 0 }]);
    const outcome = {
      utilities: { [Player.One]: 1, [Player.Two]: -1 },
      winner: Player.One,
      reason: 'terminal' as const,
    };
    const serialized = serializeHistory(history, game, outcome);
    expect(serialized.game).toBe('tic-tac-toe');
    expect(serialized.transitions).toHaveLength(1);
    expect(serialized.transitions[0]).toMatchObject({
      index: 0,
      player: Player.One,
      action: { row: 0, col: 0 },
      description: '(0, 0)',
      elapsedMs: 1,
    });
    expect(serialized.outcome).toBe(outcome);
  });

  it('omits the outcome when none is given', () => {
    const serialized = serializeHistory(play([]), game);
    expect(serialized.transitions).toEqual([]);
    expect('outcome' in serialized).toBe(false);
  });
});
