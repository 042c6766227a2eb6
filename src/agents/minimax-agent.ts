import { ConfigurationError, GameAlreadyOverError } from '../engine/errors';
import type { GameModel, Player } from '../engine/types';
import type { Evaluator } from './evaluator';
import { zeroEvaluator } from './evaluator';
import type { Agent } from './types';
import type { TieBreak } from '../config';

export interface MinimaxOptions<S> {
  /** Ply limit of the deepest iteration. */
  maxDepth: number;
  /** Scores non-terminal leaves at the depth limit. Defaults to a constant 0. */
  evaluator?: Evaluator<S>;
  tieBreak?: TieBreak;
  /**
   * Search children best-first by their static score (utility if terminal,
   * else the evaluator). On by default when an evaluator is given.
   */
  moveOrdering?: boolean;
  /** Reserved out of each budget for unwinding and returning. */
  safetyMarginMs?: number;
  now?: () => number;
  name?: string;
}

export interface SearchReport<A> {
  action: A;
  /** Value of `action` for the mover; null when no iteration completed. */
  value: number | null;
  completedDepth: number;
  nodes: number;
  aborted: boolean;
}

interface SearchContext {
  rootPlayer: Player;
  deadline: number;
  nodes: number;
  /** Set when some leaf was cut at the depth limit rather than being terminal. */
  depthCutoff: boolean;
}

class SearchAborted extends Error {
  constructor() {
    super('search deadline reached');
  }
}

const DEFAULT_SAFETY_MARGIN_MS = 5;

/**
 * Iterative-deepening Minimax with alpha-beta pruning. The deadline is polled
 * at every node expansion; an interrupted iteration is discarded and the best
 * action of the deepest completed one is returned.
 */
export class MinimaxAgent<S, A> implements Agent<S, A> {
  readonly name: string;
  private readonly game: GameModel<S, A>;
  private readonly maxDepth: number;
  private readonly evaluator: Evaluator<S>;
  private readonly tieBreak: TieBreak;
  private readonly moveOrdering: boolean;
  private readonly safetyMarginMs: number;
  private readonly now: () => number;

  constructor(game: GameModel<S, A>, options: MinimaxOptions<S>) {
    if (!Number.isInteger(options.maxDepth) || options.maxDepth < 1) {
      throw new ConfigurationError(`MinimaxAgent: maxDepth must be a positive integer, got ${options.maxDepth}`);
    }
    this.game = game;
    this.maxDepth = options.maxDepth;
    this.evaluator = options.evaluator ?? zeroEvaluator;
    this.tieBreak = options.tieBreak ?? 'first';
    this.moveOrdering = options.moveOrdering ?? options.evaluator !== undefined;
    this.safetyMarginMs = options.safetyMarginMs ?? DEFAULT_SAFETY_MARGIN_MS;
    this.now = options.now ?? (() => performance.now());
    this.name = options.name ?? `Minimax(${options.maxDepth})`;
  }

  decide(state: S, timeBudgetMs: number): A {
    return this.search(state, timeBudgetMs).action;
  }

  search(state: S, timeBudgetMs: number): SearchReport<A> {
    if (this.game.isTerminal(state)) {
      throw new GameAlreadyOverError(`${this.name}: cannot decide on a terminal state`);
    }
    const actions = this.game.legalActions(state);
    if (actions.length === 0) {
      throw new Error(`${this.game.name}: non-terminal state has no legal actions`);
    }

    const ctx: SearchContext = {
      rootPlayer: this.game.currentPlayer(state),
      deadline: this.now() + Math.max(0, timeBudgetMs - this.safetyMarginMs),
      nodes: 0,
      depthCutoff: false,
    };

    let best: { action: A; value: number | null; depth: number } = {
      action: actions[0],
      value: null,
      depth: 0,
    };

    for (let depth = 1; depth <= this.maxDepth; depth++) {
      ctx.depthCutoff = false;
      try {
        const { action, value } = this.searchRoot(state, actions, depth, ctx);
        best = { action, value, depth };
      } catch (err) {
        if (err instanceof SearchAborted) {
          return { action: best.action, value: best.value, completedDepth: best.depth, nodes: ctx.nodes, aborted: true };
        }
        throw err;
      }
      // Every leaf was terminal: deeper iterations cannot change the result.
      if (!ctx.depthCutoff) break;
    }

    return { action: best.action, value: best.value, completedDepth: best.depth, nodes: ctx.nodes, aborted: false };
  }

  private searchRoot(state: S, actions: A[], depth: number, ctx: SearchContext): { action: A; value: number } {
    ctx.nodes++;
    let bestAction = actions[0];
    let bestValue = -Infinity;
    let alpha = -Infinity;

    for (const action of actions) {
      this.checkDeadline(ctx);
      // 'last' needs exact values for every root child, so no root window.
      const lower = this.tieBreak === 'first' ? alpha : -Infinity;
      const value = this.alphaBeta(this.game.apply(state, action), depth - 1, lower, Infinity, ctx);
      if (value > bestValue || (this.tieBreak === 'last' && value === bestValue)) {
        bestValue = value;
        bestAction = action;
      }
      alpha = Math.max(alpha, bestValue);
    }
    return { action: bestAction, value: bestValue };
  }

  private alphaBeta(state: S, depth: number, alpha: number, beta: number, ctx: SearchContext): number {
    ctx.nodes++;
    if (this.game.isTerminal(state)) {
      return this.game.utility(state, ctx.rootPlayer);
    }
    if (depth === 0) {
      ctx.depthCutoff = true;
      return this.evaluator.evaluate(state, ctx.rootPlayer);
    }
    this.checkDeadline(ctx);

    const actions = this.game.legalActions(state);
    if (actions.length === 0) {
      throw new Error(`${this.game.name}: non-terminal state has no legal actions`);
    }

    const maximizing = this.game.currentPlayer(state) === ctx.rootPlayer;
    const children = this.children(state, actions, depth, maximizing, ctx);

    if (maximizing) {
      let value = -Infinity;
      for (const child of children) {
        value = Math.max(value, this.alphaBeta(child, depth - 1, alpha, beta, ctx));
        alpha = Math.max(alpha, value);
        if (alpha >= beta) break;
      }
      return value;
    }

    let value = Infinity;
    for (const child of children) {
      value = Math.min(value, this.alphaBeta(child, depth - 1, alpha, beta, ctx));
      beta = Math.min(beta, value);
      if (beta <= alpha) break;
    }
    return value;
  }

  /**
   * Successor states in search order. Unordered children are built lazily;
   * ordering scores all of them first and applies with two or more plies left.
   */
  private *children(state: S, actions: A[], depth: number, maximizing: boolean, ctx: SearchContext): Generator<S> {
    if (!this.moveOrdering || depth < 2) {
      for (const action of actions) {
        yield this.game.apply(state, action);
      }
      return;
    }
    const scored = actions.map((action) => {
      const child = this.game.apply(state, action);
      const score = this.game.isTerminal(child)
        ? this.game.utility(child, ctx.rootPlayer)
        : this.evaluator.evaluate(child, ctx.rootPlayer);
      return { child, score };
    });
    // Stable: equal scores keep enumeration order.
    scored.sort((a, b) => (maximizing ? b.score - a.score : a.score - b.score));
    for (const { child } of scored) {
      yield child;
    }
  }

  private checkDeadline(ctx: SearchContext): void {
    if (this.now() >= ctx.deadline) {
      throw new SearchAborted();
    }
  }
}
