export type LoggingMode = 'normal' | 'debug';

export interface GameConfig {
  roundCount: number;
  /** Strategy registry names, one seat each, in play order. */
  playerStrategies: string[];
  gameCount: number;
  seedList: number[];
  initialStake: number;
  ante: number;
  loggingMode: LoggingMode;
}

export const DEFAULT_CONFIG: GameConfig = {
  roundCount: 100,
  playerStrategies: ['AlwaysConservative', 'Threshold18', 'AlwaysAggressive'],
  gameCount: 200,
  seedList: [],
  initialStake: 1000,
  ante: 1,
  loggingMode: 'normal',
};

export function createDefaultConfig(overrides?: Partial<GameConfig>): GameConfig {
  return {
    ...DEFAULT_CONFIG,
    playerStrategies: [...DEFAULT_CONFIG.playerStrategies],
    seedList: [...DEFAULT_CONFIG.seedList],
    ...overrides,
  };
}
