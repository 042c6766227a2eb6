import * as fs from 'fs';
import * as path from 'path';
import type { SimulationResult } from '../simulator/runner';
import type { SimulationConfig } from '../config';
import { computeAggregateMetrics } from '../statistics/metrics';
import type { AggregateMetrics } from '../statistics/metrics';

export const DEFAULT_RESULTS_DIR = path.join(process.cwd(), 'results');

export function matchupKey(agentA: string, agentB: string): string {
  return `${agentA}_vs_${agentB}`;
}

export function historyFilename(agentA: string, agentB: string, index: number): string {
  return `${sanitizeFilename(matchupKey(agentA, agentB))}_${index}.json`;
}

/**
 * Writes simulation results to {baseDir}/{timestamp}/. Returns the output directory path.
 */
export function writeResults(
  simulationResult: SimulationResult,
  config: SimulationConfig,
  baseDir = DEFAULT_RESULTS_DIR
): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  const resultsDir = path.join(baseDir, timestamp);
  fs.mkdirSync(resultsDir, { recursive: true });

  const outcomes: Record<string, unknown[]> = {};
  const stats: Record<string, AggregateMetrics> = {};
  const timing: Record<string, { totalMs: number; avgPerContestMs: number; avgDecisionMs: number; maxDecisionMs: number }> = {};

  for (const m of simulationResult.matchups) {
    const key = matchupKey(m.agentA, m.agentB);
    outcomes[key] = m.contests.map((c) => ({
      index: c.index,
      aMovesFirst: c.aMovesFirst,
      result: c.result,
      utilityA: c.utilityA,
      plies: c.plies,
      forfeitedBy: c.forfeitedBy,
    }));
    stats[key] = computeAggregateMetrics(m);
    timing[key] = m.timing;
  }

  const summaryPayload: Record<string, unknown> = {
    timestamp,
    game: simulationResult.game,
    matchups: simulationResult.matchups.map((m) => ({ agentA: m.agentA, agentB: m.agentB })),
    contestCount: config.contestCount,
    timing,
    config: {
      timeBudgetPerMoveMs: config.timeBudgetPerMoveMs,
      timeToleranceMs: config.timeToleranceMs,
      maxSearchDepth: config.maxSearchDepth,
      forfeitOnViolation: config.forfeitOnViolation,
      tieBreak: config.tieBreak,
      swapSeats: config.swapSeats,
      seed: config.seed,
      loggingMode: config.loggingMode,
    },
  };

  if (config.loggingMode === 'debug') {
    const historyIndex: Record<string, { index: number; result: string; plies: number; filename: string }[]> = {};
    for (const m of simulationResult.matchups) {
      if (!m.histories) continue;
      historyIndex[matchupKey(m.agentA, m.agentB)] = m.contests.map((c) => ({
        index: c.index,
        result: c.result,
        plies: c.plies,
        filename: historyFilename(m.agentA, m.agentB, c.index),
      }));
    }
    summaryPayload.historyIndex = historyIndex;
  }

  fs.writeFileSync(
    path.join(resultsDir, 'summary.json'),
    JSON.stringify(summaryPayload, null, 2)
  );

  fs.writeFileSync(
    path.join(resultsDir, 'outcomes.json'),
    JSON.stringify(outcomes, null, 2)
  );

  fs.writeFileSync(
    path.join(resultsDir, 'stats.json'),
    JSON.stringify(stats, null, 2)
  );

  if (config.loggingMode === 'debug') {
    const historiesDir = path.join(resultsDir, 'histories');
    fs.mkdirSync(historiesDir, { recursive: true });

    for (const m of simulationResult.matchups) {
      if (!m.histories) continue;
      m.histories.forEach((history, i) => {
        fs.writeFileSync(
          path.join(historiesDir, historyFilename(m.agentA, m.agentB, i)),
          JSON.stringify(history, null, 2)
        );
      });
    }
  }

  return resultsDir;
}

function sanitizeFilename(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]/g, '_');
}
