#!/usr/bin/env node
import { runSimulation } from './simulator/runner';
import { writeResults } from './storage/results-writer';
import { CONFIG_PRESETS, findPreset } from './config/presets';
import { computeAggregateMetrics, formatComparison } from './statistics/metrics';
import { formatTable } from './statistics/tables';
import { Game } from './engine/game';
import { Player } from './engine/player';
import { findStrategy } from './strategies/registry';

const presetId = process.argv[2] ?? 'default';
const preset = findPreset(presetId);
if (!preset) {
  console.error(
    `Unknown preset "${presetId}". Available: ${CONFIG_PRESETS.map((p) => p.id).join(', ')}`
  );
  process.exit(1);
}
const config = preset.config;

console.log('Midnight Simulator');
console.log(`Preset: ${preset.label}`);
console.log(`Players: ${config.playerStrategies.join(', ')}`);
console.log(`Rounds per game: ${config.roundCount}`);
console.log(`Initial stake: ${config.initialStake}`);

const showcase = new Game({ nRounds: 10, randomSeed: 0, ante: config.ante });
for (const name of config.playerStrategies) {
  showcase.addPlayer(
    new Player(findStrategy(name).factory(), { initialStake: config.initialStake })
  );
}
showcase.play();

console.log('\nShowcase game (seed 0), first 10 turns:');
console.log(formatTable(showcase.getGameStats(), 10));
console.log('\nShowcase scores:');
console.log(formatTable(showcase.getAllScores()));

const result = runSimulation(config);
const outputDir = writeResults(result, config);

console.log(`\nSimulation complete: ${result.seeds.length} games.`);
console.log(`Results written to ${outputDir}`);

for (const seat of result.seats) {
  const m = computeAggregateMetrics(seat);
  console.log(
    `  ${seat.playerId} (${seat.strategy}): avg ${m.avgTotalScore.toFixed(2)} ± ${m.stdError.toFixed(2)}, ` +
      `qualified ${(m.qualificationRate * 100).toFixed(1)}%, ` +
      `won ${(m.winRate * 100).toFixed(1)}%, ` +
      `stake ${m.avgRelativeStake >= 0 ? '+' : ''}${m.avgRelativeStake.toFixed(1)}`
  );
}

if (result.seats.length === 2) {
  console.log('\nComparison:');
  console.log(formatComparison(result.seats[0], result.seats[1]));
}
