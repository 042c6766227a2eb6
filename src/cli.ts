import * as readline from 'readline/promises';
import { runSimulation } from './simulator/runner';
import { writeResults } from './storage/results-writer';
import { CONFIG_PRESETS, getPreset } from './config/presets';
import { formatMatchup } from './statistics/metrics';
import { getGame } from './games/registry';
import { formatNodesPerSecond, perft } from './engine/perft';
import { HumanAgent } from './agents/human-agent';
import { MinimaxAgent } from './agents/minimax-agent';
import { runContest } from './contest/contest';
import { Player } from './engine/types';

const HUMAN_BUDGET_MS = 10 * 60 * 1000;

async function simulate(presetId: string): Promise<void> {
  const preset = getPreset(presetId);
  if (!preset) {
    const known = CONFIG_PRESETS.map((p) => p.id).join(', ');
    throw new Error(`Unknown preset "${presetId}" (available: ${known})`);
  }

  const config = preset.config;
  const result = await runSimulation(config);
  const outputDir = writeResults(result, config);

  console.log(`Contest simulation complete: ${result.game}, ${config.contestCount} contests per pairing.`);
  console.log(`Results written to ${outputDir}`);
  for (const m of result.matchups) {
    console.log(`  ${formatMatchup(m)}`);
  }
}

function runPerft(gameName: string, maxDepth: number): void {
  const game = getGame(gameName).create();
  const root = game.initialState();
  for (let depth = 1; depth <= maxDepth; depth++) {
    const result = perft(game, root, depth, { useTranspositions: true });
    console.log(
      `perft(${depth}) = ${result.nodes} in ${result.elapsedMs.toFixed(1)}ms (${formatNodesPerSecond(result)})`
    );
  }
}

async function play(gameName: string, depth: number): Promise<void> {
  const entry = getGame(gameName);
  const game = entry.create();
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const human = new HumanAgent(game, { prompt: rl, name: 'You' });
    const bot = new MinimaxAgent(game, { maxDepth: depth, evaluator: entry.evaluator });
    const { history, outcome } = await runContest(human, bot, game, {
      forfeitOnViolation: true,
      timeBudgetPerMoveMs: HUMAN_BUDGET_MS,
    });
    const last = history.at(history.length - 1);
    if (last && game.describeState) {
      console.log(game.describeState(last.after));
    }
    if (outcome.violation) {
      console.log(`Forfeit: ${outcome.violation.message}`);
    }
    console.log(outcome.winner === null ? 'Draw.' : `${outcome.winner === Player.One ? human.name : bot.name} won.`);
  } finally {
    rl.close();
  }
}

function parseDepth(raw: string | undefined, fallback: number, what: string): number {
  const depth = Number(raw ?? fallback);
  if (!Number.isInteger(depth) || depth < 1) {
    throw new Error(`${what} depth must be a positive integer, got "${raw}"`);
  }
  return depth;
}

async function main(args: string[]): Promise<void> {
  if (args[0] === 'perft') {
    runPerft(args[1] ?? 'tic-tac-toe', parseDepth(args[2], 5, 'perft'));
    return;
  }
  if (args[0] === 'play') {
    await play(args[1] ?? 'tic-tac-toe', parseDepth(args[2], 9, 'search'));
    return;
  }
  await simulate(args[0] ?? 'default');
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
