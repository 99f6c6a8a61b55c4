import type { GameConfig } from '../config';
import { SeededDiceRoller } from '../engine/dice';
import { ConfigurationError } from '../engine/errors';
import type { RoundSummary, TurnTrace } from '../engine/events';
import { Game } from '../engine/game';
import { Player } from '../engine/player';
import { playTurn } from '../engine/turn-engine';
import type { GameStatsRow } from '../statistics/tables';
import { findStrategy } from '../strategies/registry';
import type { StrategyEntry } from '../strategies/registry';
import type { MidnightStrategy } from '../strategies/types';

/**
 * Generates a deterministic list of seeds. Simple implementation: 0..count-1.
 */
export function generateSeedList(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i);
}

export interface PerGameMetrics {
  seed: number;
  totalScore: number;
  relativeStake: number;
  roundsWon: number;
  bustCount: number;
  qualifiedCount: number;
}

export interface GameTrace {
  seed: number;
  gameStats: GameStatsRow[];
  rounds: RoundSummary[];
  turns: TurnTrace[];
}

export interface SeatResult {
  playerId: string;
  strategy: string;
  /** Final total per game, in seed order. */
  totalScores: number[];
  /** Every round's score delta across all games. */
  roundScores: number[];
  perGameMetrics: PerGameMetrics[];
}

export interface SimulationResult {
  seats: SeatResult[];
  seeds: number[];
  roundCount: number;
  timing: {
    totalMs: number;
    avgPerGameMs: number;
  };
  traces?: GameTrace[];
}

export function seatId(seat: number): string {
  return `Player${seat + 1}`;
}

function validateConfig(config: GameConfig, seatCount: number): void {
  if (!Number.isInteger(config.roundCount) || config.roundCount < 1) {
    throw new ConfigurationError(`roundCount must be a positive integer, got ${config.roundCount}`);
  }
  if (!Number.isInteger(config.gameCount) || config.gameCount < 0) {
    throw new ConfigurationError(`gameCount must be a non-negative integer, got ${config.gameCount}`);
  }
  if (seatCount === 0) {
    throw new ConfigurationError('At least one player strategy is required');
  }
}

export function runSingleGame(
  seed: number,
  config: GameConfig,
  entries: StrategyEntry[],
  options: { collectTrace: boolean }
): { game: Game; metrics: PerGameMetrics[]; trace?: GameTrace } {
  const game = new Game({
    nRounds: config.roundCount,
    randomSeed: seed,
    ante: config.ante,
    collectTraces: options.collectTrace,
  });
  entries.forEach((entry, seat) => {
    game.addPlayer(
      new Player(entry.factory(), { id: seatId(seat), initialStake: config.initialStake })
    );
  });
  game.play();

  const records = game.getRoundRecords();
  const summaries = game.getRoundSummaries();
  const metrics = game.getPlayers().map((player) => {
    const own = records.filter((r) => r.playerId === player.id);
    return {
      seed,
      totalScore: player.totalScore,
      relativeStake: player.relativeStake,
      roundsWon: summaries.filter((s) => s.winner === player.id).length,
      bustCount: own.filter((r) => r.busted).length,
      qualifiedCount: own.filter((r) => r.scoreDelta > 0).length,
    };
  });

  let trace: GameTrace | undefined;
  if (options.collectTrace) {
    trace = {
      seed,
      gameStats: game.getGameStats().rows,
      rounds: [...summaries],
      turns: [...game.getTurnTraces()],
    };
  }

  return { game, metrics, trace };
}

export function runSimulation(
  config: GameConfig,
  strategyNames?: string[]
): SimulationResult {
  const seeds =
    config.seedList.length > 0
      ? config.seedList
      : generateSeedList(config.gameCount);

  const names =
    strategyNames && strategyNames.length > 0 ? strategyNames : config.playerStrategies;
  validateConfig(config, names.length);
  const entries = names.map((name) => findStrategy(name));

  const seats: SeatResult[] = entries.map((entry, seat) => ({
    playerId: seatId(seat),
    strategy: entry.name,
    totalScores: [],
    roundScores: [],
    perGameMetrics: [],
  }));
  const traces: GameTrace[] = [];
  const collectTrace = config.loggingMode === 'debug';

  const t0 = performance.now();

  for (const seed of seeds) {
    const { game, metrics, trace } = runSingleGame(seed, config, entries, { collectTrace });
    const records = game.getRoundRecords();
    seats.forEach((seat, i) => {
      seat.totalScores.push(metrics[i].totalScore);
      seat.perGameMetrics.push(metrics[i]);
      for (const r of records) {
        if (r.playerId === seat.playerId) seat.roundScores.push(r.scoreDelta);
      }
    });
    if (trace) traces.push(trace);
  }

  const totalMs = performance.now() - t0;

  return {
    seats,
    seeds,
    roundCount: config.roundCount,
    timing: {
      totalMs,
      avgPerGameMs: seeds.length > 0 ? totalMs / seeds.length : 0,
    },
    ...(collectTrace && { traces }),
  };
}

/**
 * Turn-score distribution of one strategy playing alone, with no round
 * context to react to.
 */
export function sampleTurnScores(
  strategy: MidnightStrategy,
  sampleCount: number,
  seed: number
): number[] {
  const roller = new SeededDiceRoller(seed);
  return Array.from({ length: sampleCount }, () =>
    playTurn('sample', strategy, roller, { round: 0, topScore: null, playersLeft: 0, pot: 0 })
      .scoreDelta
  );
}
