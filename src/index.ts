export { Player, PLAYERS, opponent } from './engine/types';
export type { GameModel } from './engine/types';
export { ContestError, ConfigurationError, GameAlreadyOverError } from './engine/errors';
export type { ContestErrorKind, ContestErrorDetails } from './engine/errors';
export { History, serializeHistory } from './engine/history';
export type { Transition, ReplayResult, SerializedHistory, SerializedTransition } from './engine/history';
export { terminalOutcome, forfeitOutcome, isZeroSum } from './engine/outcome';
export type { FinalOutcome, Violation, ViolationKind } from './engine/outcome';
export { perft, formatNodesPerSecond } from './engine/perft';
export type { PerftOptions, PerftResult } from './engine/perft';

export type { Agent, AgentFactory, AgentOptions } from './agents/types';
export type { Evaluator } from './agents/evaluator';
export { zeroEvaluator } from './agents/evaluator';
export { MinimaxAgent } from './agents/minimax-agent';
export type { MinimaxOptions, SearchReport } from './agents/minimax-agent';
export { RandomAgent } from './agents/random-agent';
export { FirstLegalAgent } from './agents/first-legal-agent';
export { ScriptedAgent } from './agents/scripted-agent';
export { createFunctionalAgent } from './agents/functional-agent';
export { HumanAgent } from './agents/human-agent';
export type { HumanAgentOptions, LinePrompt } from './agents/human-agent';
export { WorkerAgent, decisionResponseSchema } from './agents/worker-agent';
export type { DecisionRequest, DecisionResponse, WorkerAgentOptions } from './agents/worker-agent';
export { serveAgent } from './agents/worker-host';
export { getAgents, getAgent } from './agents/registry';

export { Contest, runContest } from './contest/contest';
export type { ContestStatus, ContestResult, ContestOptions } from './contest/contest';
export { decideWithDeadline } from './contest/deadline';
export type { DecisionResult } from './contest/deadline';

export { createContestConfig, createSimulationConfig, DEFAULT_CONTEST_CONFIG } from './config';
export type { ContestConfig, ContestConfigInput, SimulationConfig, TieBreak } from './config';

export { createTicTacToe, createTicTacToeEvaluator, parseBoard, renderBoard } from './games/tic-tac-toe';
export type { TicTacToeState, Cell } from './games/tic-tac-toe';
export {
  createCountingGame,
  createCountingEvaluator,
  countingStateSchema,
  countingActionSchema,
} from './games/counting-game';
export type { CountingState, CountingAction } from './games/counting-game';
export {
  createConnectFour,
  createConnectFourEvaluator,
  parseConnectFour,
  renderConnectFour,
} from './games/connect-four';
export type { ConnectFourState, Drop } from './games/connect-four';
export { getGames, getGame } from './games/registry';

export { runSimulation } from './simulator/runner';
export { computeAggregateMetrics, formatMatchup } from './statistics/metrics';
export { writeResults } from './storage/results-writer';
