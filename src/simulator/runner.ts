import type { SimulationConfig } from '../config';
import { getAgent, getAgents } from '../agents/registry';
import type { AgentEntry } from '../agents/registry';
import { runContest } from '../contest/contest';
import { serializeHistory } from '../engine/history';
import type { SerializedHistory } from '../engine/history';
import type { FinalOutcome } from '../engine/outcome';
import { Player } from '../engine/types';
import { getGame } from '../games/registry';

export type ContestResultKind = 'win_a' | 'win_b' | 'draw';

export interface ContestRecord {
  index: number;
  aMovesFirst: boolean;
  result: ContestResultKind;
  utilityA: number;
  plies: number;
  /** Which side forfeited, if the contest ended on a violation. */
  forfeitedBy: 'a' | 'b' | null;
  outcome: FinalOutcome;
}

export interface MatchupResult {
  agentA: string;
  agentB: string;
  contests: ContestRecord[];
  timing: {
    totalMs: number;
    avgPerContestMs: number;
    avgDecisionMs: number;
    maxDecisionMs: number;
  };
  histories?: SerializedHistory<unknown, unknown>[];
}

export interface SimulationResult {
  game: string;
  matchups: MatchupResult[];
}

/**
 * Every unordered pair of the given agents, self-play included, in
 * registry order.
 */
export function pairAgents(entries: AgentEntry[]): [AgentEntry, AgentEntry][] {
  const pairs: [AgentEntry, AgentEntry][] = [];
  for (let i = 0; i < entries.length; i++) {
    for (let j = i; j < entries.length; j++) {
      pairs.push([entries[i], entries[j]]);
    }
  }
  return pairs;
}

export function seatOf(aMovesFirst: boolean, side: 'a' | 'b'): Player {
  return (side === 'a') === aMovesFirst ? Player.One : Player.Two;
}

export async function runMatchup(
  config: SimulationConfig,
  entryA: AgentEntry,
  entryB: AgentEntry
): Promise<MatchupResult> {
  const gameEntry = getGame(config.gameName);
  const game = gameEntry.create();
  const collectHistories = config.loggingMode === 'debug';
  const contests: ContestRecord[] = [];
  const decisionTimes: number[] = [];
  const histories: SerializedHistory<unknown, unknown>[] = [];

  const t0 = performance.now();

  for (let index = 0; index < config.contestCount; index++) {
    const aMovesFirst = !config.swapSeats || index % 2 === 0;
    const options = { maxSearchDepth: config.maxSearchDepth, tieBreak: config.tieBreak };
    const agentA = entryA.factory(game, { ...options, seed: config.seed + 2 * index }, gameEntry.evaluator);
    const agentB = entryB.factory(game, { ...options, seed: config.seed + 2 * index + 1 }, gameEntry.evaluator);

    const [first, second] = aMovesFirst ? [agentA, agentB] : [agentB, agentA];
    const { history, outcome } = await runContest(first, second, game, config);

    for (const t of history) {
      decisionTimes.push(t.elapsedMs);
    }

    const seatA = seatOf(aMovesFirst, 'a');
    const utilityA = outcome.utilities[seatA];
    let result: ContestResultKind = 'draw';
    if (outcome.winner !== null) {
      result = outcome.winner === seatA ? 'win_a' : 'win_b';
    }
    let forfeitedBy: 'a' | 'b' | null = null;
    if (outcome.violation) {
      forfeitedBy = outcome.violation.player === seatA ? 'a' : 'b';
    }

    contests.push({ index, aMovesFirst, result, utilityA, plies: history.length, forfeitedBy, outcome });
    if (collectHistories) {
      histories.push(serializeHistory(history, game, outcome));
    }
  }

  const totalMs = performance.now() - t0;
  const avgDecisionMs =
    decisionTimes.length > 0
      ? decisionTimes.reduce((a, b) => a + b, 0) / decisionTimes.length
      : 0;
  const maxDecisionMs = decisionTimes.length > 0 ? Math.max(...decisionTimes) : 0;

  return {
    agentA: entryA.name,
    agentB: entryB.name,
    contests,
    timing: {
      totalMs,
      avgPerContestMs: contests.length > 0 ? totalMs / contests.length : 0,
      avgDecisionMs,
      maxDecisionMs,
    },
    ...(collectHistories && { histories }),
  };
}

/**
 * Plays `contestCount` contests for every pair of the selected agents.
 * Contests run one after another; a fatal ContestError stops the run.
 */
export async function runSimulation(
  config: SimulationConfig,
  agentNames?: string[]
): Promise<SimulationResult> {
  const entries = agentNames ? [...new Set(agentNames)].map((name) => getAgent(name)) : getAgents();
  const matchups: MatchupResult[] = [];
  for (const [a, b] of pairAgents(entries)) {
    matchups.push(await runMatchup(config, a, b));
  }
  return { game: config.gameName, matchups };
}
