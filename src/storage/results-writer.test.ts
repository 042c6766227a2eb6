import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { historyFilename, matchupKey, writeResults } from './results-writer';
import { runSimulation } from '../simulator/runner';
import { createSimulationConfig } from '../config';

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

describe('writeResults', () => {
  let baseDir: string;

  beforeEach(() => {
    baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'contest-results-'));
  });

  afterEach(() => {
    fs.rmSync(baseDir, { recursive: true, force: true });
  });

  it('writes summary, outcomes and stats', async () => {
    const config = createSimulationConfig({ forfeitOnViolation: true, contestCount: 2 });
    const result = await runSimulation(config, ['FirstLegal']);
    const outputDir = writeResults(result, config, baseDir);

    expect(path.dirname(outputDir)).toBe(baseDir);
    expect(fs.readdirSync(outputDir).sort()).toEqual(['outcomes.json', 'stats.json', 'summary.json']);

    expect(readJson(path.join(outputDir, 'summary.json'))).toMatchObject({
      timestamp: path.basename(outputDir),
      game: 'tic-tac-toe',
      matchups: [{ agentA: 'FirstLegal', agentB: 'FirstLegal' }],
      contestCount: 2,
      config: { forfeitOnViolation: true, timeBudgetPerMoveMs: 1000, seed: 42 },
    });

    expect(readJson(path.join(outputDir, 'outcomes.json'))).toEqual({
      FirstLegal_vs_FirstLegal: [
        { index: 0, aMovesFirst: true, result: 'win_a', utilityA: 1, plies: 7, forfeitedBy: null },
        { index: 1, aMovesFirst: false, result: 'win_b', utilityA: -1, plies: 7, forfeitedBy: null },
      ],
    });

    expect(readJson(path.join(outputDir, 'stats.json'))).toMatchObject({
      FirstLegal_vs_FirstLegal: { contests: 2, winsA: 1, winsB: 1, draws: 0, firstMoverWinRate: 1 },
    });
  });

  it('writes histories and an index in debug mode', async () => {
    const config = createSimulationConfig({ forfeitOnViolation: true, contestCount: 2, loggingMode: 'debug' });
    const result = await runSimulation(config, ['FirstLegal']);
    const outputDir = writeResults(result, config, baseDir);

    const historiesDir = path.join(outputDir, 'histories');
    expect(fs.readdirSync(historiesDir).sort()).toEqual([
      'FirstLegal_vs_FirstLegal_0.json',
      'FirstLegal_vs_FirstLegal_1.json',
    ]);

    const summary = readJson(path.join(outputDir, 'summary.json'));
    expect(summary).toMatchObject({
      historyIndex: {
        FirstLegal_vs_FirstLegal: [
          { index: 0, result: 'win_a', plies: 7, filename: 'FirstLegal_vs_FirstLegal_0.json' },
          { index: 1, result: 'win_b', plies: 7, filename: 'FirstLegal_vs_FirstLegal_1.json' },
        ],
      },
    });

    const history = readJson(path.join(historiesDir, 'FirstLegal_vs_FirstLegal_0.json'));
    expect(history).toMatchObject({
      game: 'tic-tac-toe',
      transitions: expect.arrayContaining([
        expect.objectContaining({ index: 0, player: 'one', action: { row: 0, col: 0 }, description: '(0, 0)' }),
      ]),
      outcome: { winner: 'one', reason: 'terminal' },
    });
  });
});

describe('file naming', () => {
  it('builds matchup keys and safe history names', () => {
    expect(matchupKey('Minimax', 'Random')).toBe('Minimax_vs_Random');
    expect(historyFilename('Mini max', 'a/b', 3)).toBe('Mini_max_vs_a_b_3.json');
  });
});
