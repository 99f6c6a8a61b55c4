import { ChaseLeaderStrategy, DEFAULT_FALLBACK_THRESHOLD } from './chase-leader-strategy';
import type { TurnStateView } from './types';

function createMockView(overrides: Partial<TurnStateView> = {}): TurnStateView {
  return {
    playerId: 'p1',
    rolls: [[1, 4, 2, 2, 2, 2]],
    keptDice: [1, 4],
    tableDice: [2, 2, 2, 2],
    score: 8,
    rollCount: 1,
    diceInHand: 4,
    round: { round: 0, topScore: null, playersLeft: 1, pot: 1 },
    ...overrides,
  };
}

describe('ChaseLeaderStrategy', () => {
  it('plays to the fallback threshold when nobody has scored yet', () => {
    const strategy = new ChaseLeaderStrategy();
    expect(strategy.fallbackThreshold).toBe(DEFAULT_FALLBACK_THRESHOLD);
    expect(strategy.decide(createMockView({ score: 14 }))).toBe('continue');
    expect(strategy.decide(createMockView({ score: 15 }))).toBe('stop');
  });

  it('keeps rolling until strictly ahead of the leader', () => {
    const strategy = new ChaseLeaderStrategy();
    const round = { round: 2, topScore: 12, playersLeft: 0, pot: 5 };
    expect(strategy.decide(createMockView({ score: 10, round }))).toBe('continue');
    expect(strategy.decide(createMockView({ score: 12, round }))).toBe('continue');
    expect(strategy.decide(createMockView({ score: 13, round }))).toBe('stop');
  });

  it('stops on any score when the leader posted zero', () => {
    const strategy = new ChaseLeaderStrategy(20);
    const round = { round: 0, topScore: 0, playersLeft: 1, pot: 1 };
    expect(strategy.decide(createMockView({ score: 4, round }))).toBe('stop');
  });
});
