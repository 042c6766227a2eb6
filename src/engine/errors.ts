import type { History } from './history';
import type { Player } from './types';

export type ContestErrorKind =
  | 'IllegalAction'
  | 'Timeout'
  | 'AgentFailure'
  | 'GameAlreadyOver'
  | 'ConfigurationError'
  | 'GameModelFailure';

export interface ContestErrorDetails<S, A> {
  player?: Player;
  history?: History<S, A>;
  cause?: unknown;
}

/**
 * Fatal contest failure. When raised by the runner it carries the history
 * accumulated up to the failing turn.
 */
export class ContestError<S = unknown, A = unknown> extends Error {
  readonly kind: ContestErrorKind;
  readonly player?: Player;
  readonly history?: History<S, A>;

  constructor(kind: ContestErrorKind, message: string, details: ContestErrorDetails<S, A> = {}) {
    super(message, { cause: details.cause });
    this.name = 'ContestError';
    this.kind = kind;
    this.player = details.player;
    this.history = details.history;
  }
}

export class ConfigurationError extends ContestError {
  constructor(message: string) {
    super('ConfigurationError', message);
    this.name = 'ConfigurationError';
  }
}

export class GameAlreadyOverError extends ContestError {
  constructor(message = 'Game is already over') {
    super('GameAlreadyOver', message);
    this.name = 'GameAlreadyOverError';
  }
}
