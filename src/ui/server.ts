import express from 'express';
import type { Express, Response } from 'express';
import * as path from 'path';
import * as fs from 'fs';
import { getStrategies } from '../strategies/registry';
import { CONFIG_PRESETS, findPreset } from '../config/presets';
import { runSimulation } from '../simulator/runner';
import { resultsRoot, writeResults } from '../storage/results-writer';
import { compareConclusion, tTest } from '../statistics/metrics';
import { ConfigurationError } from '../engine/errors';

export function safeTimestamp(timestamp: string): boolean {
  return /^[\w-]+$/.test(timestamp) && !timestamp.includes('..');
}

export function safeFilename(filename: string): boolean {
  return /^[\w.-]+$/.test(filename) && !filename.includes('..');
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/**
 * Result set directories under `root`, newest first.
 */
export function listResultSets(root: string): string[] {
  if (!fs.existsSync(root)) return [];
  return fs
    .readdirSync(root)
    .filter((d) => fs.statSync(path.join(root, d)).isDirectory())
    .sort()
    .reverse();
}

function sendError(res: Response, err: unknown): void {
  if (err instanceof ConfigurationError) {
    res.status(400).json({ error: err.message });
    return;
  }
  console.error(err);
  res.status(500).json({ error: String(err) });
}

export function createApp(baseDir = process.cwd()): Express {
  const app = express();
  app.use(express.json());

  const resultsDir = resultsRoot(baseDir);

  app.get('/api/strategies', (_req, res) => {
    res.json(getStrategies().map((s) => ({ name: s.name })));
  });

  app.get('/api/configs', (_req, res) => {
    res.json(CONFIG_PRESETS.map((p) => ({ id: p.id, label: p.label })));
  });

  app.post('/api/run', (req, res) => {
    const body: unknown = req.body;
    const configId = isRecord(body) ? body.configId : undefined;
    const strategyNames = isRecord(body) ? body.strategyNames : undefined;
    const preset = typeof configId === 'string' ? findPreset(configId) : undefined;
    if (!preset) {
      res.status(400).json({ error: 'Invalid configId' });
      return;
    }
    if (strategyNames !== undefined && !isStringArray(strategyNames)) {
      res.status(400).json({ error: 'strategyNames must be an array of strings' });
      return;
    }

    try {
      const result = runSimulation(preset.config, strategyNames);
      const outputDir = writeResults(result, preset.config, baseDir);
      res.json({ timestamp: path.basename(outputDir), outputDir });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get('/api/results', (_req, res) => {
    res.json(listResultSets(resultsDir));
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
        rawScores: readJson(path.join(dir, 'raw_scores.json')),
        stats: readJson(path.join(dir, 'stats.json')),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get('/api/results/:timestamp/compare', (req, res) => {
    const { timestamp } = req.params;
    const { a, b } = req.query;

    if (!safeTimestamp(timestamp) || typeof a !== 'string' || typeof b !== 'string') {
      res.status(400).json({ error: 'Invalid parameters' });
      return;
    }

    const dir = path.join(resultsDir, timestamp);
    if (!fs.existsSync(dir)) {
      res.status(404).json({ error: 'Results not found' });
      return;
    }

    try {
      const rawScores = readJson(path.join(dir, 'raw_scores.json'));
      const scoresA = isRecord(rawScores) ? rawScores[a] : undefined;
      const scoresB = isRecord(rawScores) ? rawScores[b] : undefined;
      if (!isNumberArray(scoresA) || !isNumberArray(scoresB)) {
        res.status(400).json({ error: 'Player not found in results' });
        return;
      }

      const tt = tTest(scoresA, scoresB);
      const avg = (xs: number[]): number =>
        xs.length > 0 ? xs.reduce((s, x) => s + x, 0) / xs.length : 0;

      res.json({
        pValue: tt.pValue,
        meanDiff: tt.meanDiff,
        conclusion: compareConclusion(a, b, tt.pValue, avg(scoresA), avg(scoresB)),
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get('/api/results/:timestamp/traces', (req, res) => {
    const { timestamp } = req.params;

    if (!safeTimestamp(timestamp)) {
      res.status(400).json({ error: 'Invalid timestamp' });
      return;
    }

    const tracesPath = path.join(resultsDir, timestamp, 'traces');
    if (!fs.existsSync(tracesPath) || !fs.statSync(tracesPath).isDirectory()) {
      res.json([]);
      return;
    }

    res.json(fs.readdirSync(tracesPath).filter((f) => f.endsWith('.json')));
  });

  app.get('/api/results/:timestamp/traces/:filename', (req, res) => {
    const { timestamp, filename } = req.params;

    if (!safeTimestamp(timestamp) || !safeFilename(filename)) {
      res.status(400).json({ error: 'Invalid parameters' });
      return;
    }

    const tracePath = path.join(resultsDir, timestamp, 'traces', filename);
    if (!fs.existsSync(tracePath) || !fs.statSync(tracePath).isFile()) {
      res.status(404).json({ error: 'Trace not found' });
      return;
    }

    res.download(tracePath);
  });

  return app;
}

if (require.main === module) {
  const PORT = Number(process.env.PORT ?? 3000);
  createApp().listen(PORT, () => {
    console.log(`Midnight Simulator results at http://localhost:${PORT}`);
  });
}
