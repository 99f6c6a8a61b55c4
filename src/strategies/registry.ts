import { ConfigurationError } from '../engine/errors';
import type { MidnightStrategy } from './types';
import { ConservativeStrategy } from './conservative-strategy';
import { ThresholdStrategy } from './threshold-strategy';
import { AggressiveStrategy } from './aggressive-strategy';
import { ChaseLeaderStrategy } from './chase-leader-strategy';

export interface StrategyEntry {
  name: string;
  factory: () => MidnightStrategy;
}

/**
 * Returns the list of available strategies for the simulator and UI.
 */
export function getStrategies(): StrategyEntry[] {
  return [
    {
      name: 'AlwaysConservative',
      factory: () => new ConservativeStrategy(),
    },
    {
      name: 'Threshold12',
      factory: () => new ThresholdStrategy(12),
    },
    {
      name: 'Threshold18',
      factory: () => new ThresholdStrategy(18),
    },
    {
      name: 'AlwaysAggressive',
      factory: () => new AggressiveStrategy(),
    },
    {
      name: 'ChaseLeader',
      factory: () => new ChaseLeaderStrategy(),
    },
  ];
}

export function findStrategy(name: string): StrategyEntry {
  const entry = getStrategies().find((s) => s.name === name);
  if (!entry) {
    const available = getStrategies()
      .map((s) => s.name)
      .join(', ');
    throw new ConfigurationError(`Unknown strategy: ${name}. Available: ${available}`);
  }
  return entry;
}
