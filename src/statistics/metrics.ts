import type { MatchupResult } from '../simulator/runner';

export interface AggregateMetrics {
  contests: number;
  winsA: number;
  winsB: number;
  draws: number;
  forfeitsA: number;
  forfeitsB: number;
  /** (wins + draws / 2) / contests, from A's side. */
  scoreRateA: number;
  avgUtilityA: number;
  stdDev: number;
  stdError: number;
  ci95: { lower: number; upper: number };
  avgPlies: number;
  /** Share of decisive contests won by the side that moved first. */
  firstMoverWinRate: number;
}

function mean(arr: number[]): number {
  if (arr.length === 0) return 0;
  return arr.reduce((a, b) => a + b, 0) / arr.length;
}

function sampleStdDev(arr: number[], m?: number): number {
  const n = arr.length;
  if (n < 2) return 0;
  const avg = m ?? mean(arr);
  const sumSq = arr.reduce((s, x) => s + (x - avg) ** 2, 0);
  return Math.sqrt(sumSq / (n - 1));
}

export function computeAggregateMetrics(result: MatchupResult): AggregateMetrics {
  const { contests } = result;
  const n = contests.length;

  const winsA = contests.filter((c) => c.result === 'win_a').length;
  const winsB = contests.filter((c) => c.result === 'win_b').length;
  const draws = n - winsA - winsB;

  const utilities = contests.map((c) => c.utilityA);
  const avgUtilityA = mean(utilities);
  const stdDev = sampleStdDev(utilities, avgUtilityA);
  const stdError = n > 1 ? stdDev / Math.sqrt(n) : 0;
  const halfWidth = 1.96 * stdError;

  const decisive = contests.filter((c) => c.result !== 'draw');
  const firstMoverWins = decisive.filter(
    (c) => (c.result === 'win_a') === c.aMovesFirst
  ).length;

  return {
    contests: n,
    winsA,
    winsB,
    draws,
    forfeitsA: contests.filter((c) => c.forfeitedBy === 'a').length,
    forfeitsB: contests.filter((c) => c.forfeitedBy === 'b').length,
    scoreRateA: n > 0 ? (winsA + draws / 2) / n : 0,
    avgUtilityA,
    stdDev,
    stdError,
    ci95: { lower: avgUtilityA - halfWidth, upper: avgUtilityA + halfWidth },
    avgPlies: mean(contests.map((c) => c.plies)),
    firstMoverWinRate: decisive.length > 0 ? firstMoverWins / decisive.length : 0,
  };
}

/**
 * One-line summary, e.g. "Minimax vs Random: +8 =2 -0, score 90.0%, 7.4 plies".
 */
export function formatMatchup(result: MatchupResult): string {
  const m = computeAggregateMetrics(result);
  const forfeits =
    m.forfeitsA + m.forfeitsB > 0 ? `, forfeits ${m.forfeitsA}/${m.forfeitsB}` : '';
  return (
    `${result.agentA} vs ${result.agentB}: +${m.winsA} =${m.draws} -${m.winsB}, ` +
    `score ${(m.scoreRateA * 100).toFixed(1)}%, ${m.avgPlies.toFixed(1)} plies${forfeits}`
  );
}
