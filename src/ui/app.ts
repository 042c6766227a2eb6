import express from 'express';
import type { Express } from 'express';
import * as path from 'path';
import * as fs from 'fs';
import { z } from 'zod';
import { getAgents } from '../agents/registry';
import { getGames } from '../games/registry';
import { CONFIG_PRESETS, getPreset } from '../config/presets';
import { ContestError } from '../engine/errors';
import { runSimulation } from '../simulator/runner';
import { DEFAULT_RESULTS_DIR, writeResults } from '../storage/results-writer';

export interface AppOptions {
  resultsDir?: string;
}

const runRequestSchema = z.object({
  configId: z.string(),
  agentNames: z.array(z.string()).min(1).optional(),
});

function safeTimestamp(timestamp: string): boolean {
  return /^[\w-]+$/.test(timestamp) && !timestamp.includes('..');
}

function safeFilename(filename: string): boolean {
  return /^[\w.-]+$/.test(filename) && !filename.includes('..');
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

export function createApp(options: AppOptions = {}): Express {
  const resultsDir = options.resultsDir ?? DEFAULT_RESULTS_DIR;
  const app = express();
  app.use(express.json());

  app.get('/api/agents', (_req, res) => {
    res.json(getAgents().map((a) => ({ name: a.name })));
  });

  app.get('/api/games', (_req, res) => {
    res.json(getGames().map((g) => ({ name: g.name, description: g.description })));
  });

  app.get('/api/configs', (_req, res) => {
    res.json(CONFIG_PRESETS.map((p) => ({ id: p.id, label: p.label })));
  });

  app.post('/api/run', async (req, res) => {
    const body = runRequestSchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: 'Invalid request body' });
      return;
    }
    const preset = getPreset(body.data.configId);
    if (!preset) {
      res.status(400).json({ error: 'Invalid configId' });
      return;
    }

    try {
      const result = await runSimulation(preset.config, body.data.agentNames);
      const outputDir = writeResults(result, preset.config, resultsDir);
      res.json({ timestamp: path.basename(outputDir) });
    } catch (err) {
      if (err instanceof ContestError && err.kind === 'ConfigurationError') {
        res.status(400).json({ error: err.message });
        return;
      }
      console.error(err);
      res.status(500).json({ error: String(err) });
    }
  });

  app.get('/api/results', (_req, res) => {
    if (!fs.existsSync(resultsDir)) {
      res.json([]);
      return;
    }
    const timestamps = fs
      .readdirSync(resultsDir)
      .filter((d) => fs.statSync(path.join(resultsDir, d)).isDirectory());
    res.json(timestamps.sort().reverse());
  });

  app.get('/api/results/:timestamp', (req, res) => {
    const { timestamp } = req.params;
    if (!safeTimestamp(timestamp)) {
      res.status(400).json({ error: 'Invalid timestamp' });
      return;
    }

    const dir = path.join(resultsDir, timestamp);
    if (!fs.existsSync(dir)) {
      res.status(404).json({ error: 'Results not found' });
      return;
    }

    try {
      res.json({
        summary: readJson(path.join(dir, 'summary.json')),
        outcomes: readJson(path.join(dir, 'outcomes.json')),
        stats: readJson(path.join(dir, 'stats.json')),
      });
    } catch (err) {
      res.status(500).json({ error: String(err) });
    }
  });

  app.get('/api/results/:timestamp/histories', (req, res) => {
    const { timestamp } = req.params;
    if (!safeTimestamp(timestamp)) {
      res.status(400).json({ error: 'Invalid timestamp' });
      return;
    }

    const historiesPath = path.join(resultsDir, timestamp, 'histories');
    if (!fs.existsSync(historiesPath) || !fs.statSync(historiesPath).isDirectory()) {
      res.json([]);
      return;
    }
    res.json(fs.readdirSync(historiesPath).filter((f) => f.endsWith('.json')));
  });

  app.get('/api/results/:timestamp/histories/:filename', (req, res) => {
    const { timestamp, filename } = req.params;
    if (!safeTimestamp(timestamp) || !safeFilename(filename)) {
      res.status(400).json({ error: 'Invalid parameters' });
      return;
    }

    const historyPath = path.join(resultsDir, timestamp, 'histories', filename);
    if (!fs.existsSync(historyPath) || !fs.statSync(historyPath).isFile()) {
      res.status(404).json({ error: 'History not found' });
      return;
    }
    res.download(historyPath);
  });

  return app;
}
