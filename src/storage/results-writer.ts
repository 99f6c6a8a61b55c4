import * as fs from 'fs';
import * as path from 'path';
import type { SimulationResult } from '../simulator/runner';
import type { GameConfig } from '../config';
import { computeAggregateMetrics } from '../statistics/metrics';
import type { AggregateMetrics } from '../statistics/metrics';

export function resultsRoot(baseDir = process.cwd()): string {
  return path.join(baseDir, 'results');
}

export function traceFilename(seed: number, index: number): string {
  return `game_${seed}_${index}.json`;
}

/**
 * Writes simulation results to results/{timestamp}/ under `baseDir`. Returns
 * the output directory path.
 */
export function writeResults(
  simulationResult: SimulationResult,
  config: GameConfig,
  baseDir = process.cwd()
): string {
  const stamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 23);
  const root = resultsRoot(baseDir);
  let timestamp = stamp;
  for (let n = 1; fs.existsSync(path.join(root, timestamp)); n++) {
    timestamp = `${stamp}-${n}`;
  }
  const resultsDir = path.join(root, timestamp);
  fs.mkdirSync(resultsDir, { recursive: true });

  const rawScores: Record<string, number[]> = {};
  const stats: Record<string, AggregateMetrics> = {};

  for (const seat of simulationResult.seats) {
    rawScores[seat.playerId] = seat.totalScores;
    stats[seat.playerId] = computeAggregateMetrics(seat);
  }

  const summaryPayload: Record<string, unknown> = {
    timestamp,
    seats: simulationResult.seats.map((s) => ({ playerId: s.playerId, strategy: s.strategy })),
    gameCount: simulationResult.seeds.length,
    roundCount: simulationResult.roundCount,
    timing: simulationResult.timing,
    config: {
      initialStake: config.initialStake,
      ante: config.ante,
      loggingMode: config.loggingMode,
    },
  };

  const traces = simulationResult.traces ?? [];
  if (config.loggingMode === 'debug') {
    summaryPayload.traceIndex = traces.map((trace, i) => ({
      seed: trace.seed,
      winners: trace.rounds.map((r) => r.winner),
      filename: traceFilename(trace.seed, i),
    }));
  }

  fs.writeFileSync(
    path.join(resultsDir, 'summary.json'),
    JSON.stringify(summaryPayload, null, 2)
  );

  fs.writeFileSync(
    path.join(resultsDir, 'raw_scores.json'),
    JSON.stringify(rawScores, null, 2)
  );

  fs.writeFileSync(
    path.join(resultsDir, 'stats.json'),
    JSON.stringify(stats, null, 2)
  );

  if (config.loggingMode === 'debug') {
    const tracesDir = path.join(resultsDir, 'traces');
    fs.mkdirSync(tracesDir, { recursive: true });

    traces.forEach((trace, i) => {
      fs.writeFileSync(
        path.join(tracesDir, traceFilename(trace.seed, i)),
        JSON.stringify(trace, null, 2)
      );
    });
  }

  return resultsDir;
}
