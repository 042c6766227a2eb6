import type { Agent } from '../agents/types';
import type { ContestConfig, ContestConfigInput } from '../config';
import { createContestConfig } from '../config';
import { ContestError, GameAlreadyOverError } from '../engine/errors';
import { History } from '../engine/history';
import type { Transition } from '../engine/history';
import { forfeitOutcome, terminalOutcome } from '../engine/outcome';
import type { FinalOutcome, Violation } from '../engine/outcome';
import type { GameModel } from '../engine/types';
import { Player } from '../engine/types';
import { decideWithDeadline } from './deadline';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type ContestStatus = 'not_started' | 'in_progress' | 'completed' | 'aborted';

export interface ContestResult<S, A> {
  history: History<S, A>;
  outcome: FinalOutcome;
}

export interface ContestOptions<S> {
  /** Start from this state instead of game.initialState(). */
  initialState?: S;
  now?: () => number;
}

/**
 * One game between two agents. Agent A plays Player.One, agent B Player.Two.
 * The contest owns its state and history; agents only ever see states.
 */
export class Contest<S, A> {
  readonly config: ContestConfig;
  private readonly game: GameModel<S, A>;
  private readonly agents: Record<Player, Agent<S, A>>;
  private readonly now: () => number;
  private readonly _history: History<S, A>;
  private _state: S;
  private _status: ContestStatus = 'not_started';
  private _outcome: FinalOutcome | null = null;
  private _error: ContestError | null = null;
  private stepping = false;

  constructor(
    agentA: Agent<S, A>,
    agentB: Agent<S, A>,
    game: GameModel<S, A>,
    config: ContestConfigInput,
    options: ContestOptions<S> = {}
  ) {
    this.config = createContestConfig(config);
    this.game = game;
    this.agents = { [Player.One]: agentA, [Player.Two]: agentB };
    this.now = options.now ?? (() => performance.now());
    this._state = options.initialState ?? game.initialState();
    this._history = new History(this._state);
  }

  get status(): ContestStatus {
    return this._status;
  }

  get state(): S {
    return this._state;
  }

  get history(): History<S, A> {
    return this._history;
  }

  get outcome(): FinalOutcome | null {
    return this._outcome;
  }

  get error(): ContestError | null {
    return this._error;
  }

  agentFor(player: Player): Agent<S, A> {
    return this.agents[player];
  }

  /** Plays to the end. Throws ContestError on a fatal failure. */
  async run(): Promise<ContestResult<S, A>> {
    while (this._status !== 'completed') {
      await this.step();
    }
    if (!this._outcome) {
      throw new ContestError('GameModelFailure', 'Contest finished without an outcome', { history: this._history });
    }
    return { history: this._history, outcome: this._outcome };
  }

  /**
   * Plays one ply. Returns the applied transition, or null once the contest
   * has completed (terminal state reached or a player forfeited).
   */
  async step(): Promise<Transition<S, A> | null> {
    if (this.stepping) {
      throw new Error('Contest.step called while another step is in progress');
    }
    this.stepping = true;
    try {
      return await this.playTurn();
    } finally {
      this.stepping = false;
    }
  }

  private async playTurn(): Promise<Transition<S, A> | null> {
    if (this._status === 'completed') {
      throw new GameAlreadyOverError('Contest is already completed');
    }
    if (this._status === 'aborted' && this._error) {
      throw this._error;
    }
    this._status = 'in_progress';

    const state = this._state;
    if (this.guardGame(() => this.game.isTerminal(state))) {
      this.complete(this.guardGame(() => terminalOutcome(this.game, state)));
      return null;
    }

    const player = this.guardGame(() => this.game.currentPlayer(state));
    const legal = this.guardGame(() => this.game.legalActions(state));
    if (legal.length === 0) {
      throw this.abort(new ContestError('GameModelFailure', `${this.game.name}: non-terminal state has no legal actions`, {
        history: this._history,
      }));
    }

    const agent = this.agents[player];
    const decision = await decideWithDeadline(agent, state, {
      timeBudgetMs: this.config.timeBudgetPerMoveMs,
      toleranceMs: this.config.timeToleranceMs,
      now: this.now,
    });

    if (decision.status === 'failed') {
      throw this.abort(new ContestError('AgentFailure', `${agent.name} (${player}) failed to decide: ${String(decision.error)}`, {
        player,
        history: this._history,
        cause: decision.error,
      }));
    }

    if (decision.status === 'timed_out') {
      return this.violate({
        player,
        kind: 'Timeout',
        message: `${agent.name} (${player}) took ${decision.elapsedMs.toFixed(1)}ms, limit ${
          this.config.timeBudgetPerMoveMs + this.config.timeToleranceMs
        }ms`,
      });
    }

    const chosen = decision.action;
    const legalMatch = this.matchLegal(legal, chosen);
    if (!legalMatch.ok) {
      return this.violate({
        player,
        kind: 'IllegalAction',
        message: `${agent.name} (${player}) ${legalMatch.reason}`,
      });
    }

    const action = legalMatch.action;
    const after = this.guardGame(() => this.game.apply(state, action));
    const transition = this._history.append(this.game, {
      player,
      before: state,
      action,
      after,
      elapsedMs: decision.elapsedMs,
    });
    this._state = after;
    return transition;
  }

  /**
   * Finds the legal action equal to the agent's answer. Missing or malformed
   * answers (including ones that make `actionsEqual` throw) are illegal.
   */
  private matchLegal(legal: A[], chosen: A): { ok: true; action: A } | { ok: false; reason: string } {
    if (chosen === undefined || chosen === null) {
      return { ok: false, reason: `returned no action (${String(chosen)})` };
    }
    let match: A | undefined;
    try {
      match = legal.find((a) => this.game.actionsEqual(a, chosen));
    } catch (err) {
      return { ok: false, reason: `returned a malformed action ${this.describe(chosen)}: ${errorMessage(err)}` };
    }
    if (match === undefined) {
      return { ok: false, reason: `chose illegal action ${this.describe(chosen)}` };
    }
    return { ok: true, action: match };
  }

  private describe(action: A): string {
    try {
      return this.game.describeAction ? this.game.describeAction(action) : JSON.stringify(action);
    } catch (err) {
      return `<undescribable action: ${errorMessage(err)}>`;
    }
  }

  private violate(violation: Violation): null {
    if (!this.config.forfeitOnViolation) {
      throw this.abort(new ContestError(violation.kind, violation.message, {
        player: violation.player,
        history: this._history,
      }));
    }
    this.complete(forfeitOutcome(violation, this.config.forfeitUtility));
    return null;
  }

  private complete(outcome: FinalOutcome): void {
    this._outcome = outcome;
    this._status = 'completed';
  }

  private abort(error: ContestError): ContestError {
    this._error = error;
    this._status = 'aborted';
    return error;
  }

  /** Runs a game model call, turning any failure into a fatal GameModelFailure. */
  private guardGame<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof ContestError) {
        throw this.abort(new ContestError(err.kind, err.message, {
          player: err.player,
          history: this._history,
          cause: err,
        }));
      }
      throw this.abort(new ContestError('GameModelFailure', `${this.game.name}: ${errorMessage(err)}`, {
        history: this._history,
        cause: err,
      }));
    }
  }
}

/**
 * Plays a full contest. Resolves with the history and outcome; rejects with a
 * ContestError whose `history` holds every transition applied before the
 * failure.
 */
export async function runContest<S, A>(
  agentA: Agent<S, A>,
  agentB: Agent<S, A>,
  game: GameModel<S, A>,
  config: ContestConfigInput,
  options: ContestOptions<S> = {}
): Promise<ContestResult<S, A>> {
  return new Contest(agentA, agentB, game, config, options).run();
}
