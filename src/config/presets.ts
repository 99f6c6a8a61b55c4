import { createDefaultConfig } from './index';
import type { GameConfig } from './index';

export interface ConfigPreset {
  id: string;
  label: string;
  config: GameConfig;
}

export const CONFIG_PRESETS: ConfigPreset[] = [
  { id: 'default', label: 'Default (200 games x 100 rounds)', config: createDefaultConfig() },
  {
    id: 'quick',
    label: 'Quick (10 games x 20 rounds)',
    config: createDefaultConfig({ gameCount: 10, roundCount: 20 }),
  },
  {
    id: 'heads-up',
    label: 'Heads-up: conservative vs aggressive',
    config: createDefaultConfig({
      playerStrategies: ['AlwaysConservative', 'AlwaysAggressive'],
      gameCount: 500,
    }),
  },
  {
    id: 'chase',
    label: 'Chase the leader vs threshold 18',
    config: createDefaultConfig({
      playerStrategies: ['Threshold18', 'ChaseLeader'],
      gameCount: 500,
    }),
  },
  {
    id: 'debug',
    label: 'Debug (5 games x 10 rounds, full traces)',
    config: createDefaultConfig({ gameCount: 5, roundCount: 10, loggingMode: 'debug' }),
  },
];

export function findPreset(id: string): ConfigPreset | undefined {
  return CONFIG_PRESETS.find((p) => p.id === id);
}
