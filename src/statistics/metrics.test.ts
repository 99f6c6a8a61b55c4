import {
  compareConclusion,
  computeAggregateMetrics,
  tTest,
  scoreHistogram,
  formatComparison,
} from './metrics';
import type { PerGameMetrics, SeatResult } from '../simulator/runner';

function makeSeat(
  strategy: string,
  totalScores: number[],
  roundScores: number[] = totalScores,
  perGameMetrics?: PerGameMetrics[]
): SeatResult {
  const metrics =
    perGameMetrics ??
    totalScores.map((totalScore, seed) => ({
      seed,
      totalScore,
      relativeStake: 0,
      roundsWon: 0,
      bustCount: 0,
      qualifiedCount: 1,
    }));
  return {
    playerId: 'Player1',
    strategy,
    totalScores,
    roundScores,
    perGameMetrics: metrics,
  };
}

describe('scoreHistogram', () => {
  it('returns 25 bins (0-24)', () => {
    expect(scoreHistogram([])).toHaveLength(25);
  });

  it('counts scores into correct bins', () => {
    const hist = scoreHistogram([0, 0, 24, 24, 12]);
    expect(hist[0]).toBe(2);
    expect(hist[12]).toBe(1);
    expect(hist[24]).toBe(2);
  });
});

describe('computeAggregateMetrics', () => {
  it('derives rates per round played', () => {
    const seat = makeSeat('A', [10, 20, 24], [5, 5, 10, 10, 0, 24], [
      { seed: 0, totalScore: 10, relativeStake: -2, roundsWon: 1, bustCount: 0, qualifiedCount: 2 },
      { seed: 1, totalScore: 20, relativeStake: 4, roundsWon: 2, bustCount: 0, qualifiedCount: 2 },
      { seed: 2, totalScore: 24, relativeStake: -8, roundsWon: 0, bustCount: 1, qualifiedCount: 1 },
    ]);
    const m = computeAggregateMetrics(seat);
    expect(m.avgTotalScore).toBe(18);
    expect(m.avgRoundScore).toBe(9);
    expect(m.bustRate).toBeCloseTo(1 / 6);
    expect(m.qualificationRate).toBeCloseTo(5 / 6);
    expect(m.winRate).toBe(0.5);
    expect(m.avgRelativeStake).toBe(-2);
    expect(m.stdDev).toBeGreaterThan(0);
    expect(m.roundScoreHistogram[5]).toBe(2);
    expect(m.roundScoreHistogram[24]).toBe(1);
  });

  it('returns zero stats for an empty seat', () => {
    const m = computeAggregateMetrics(makeSeat('A', []));
    expect(m.avgTotalScore).toBe(0);
    expect(m.stdDev).toBe(0);
    expect(m.bustRate).toBe(0);
    expect(m.winRate).toBe(0);
    expect(m.roundScoreHistogram).toHaveLength(25);
  });
});

describe('tTest', () => {
  it('identical arrays yield p-value near 1', () => {
    const arr = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];
    const tt = tTest(arr, [...arr]);
    expect(tt.pValue).toBeGreaterThan(0.99);
    expect(tt.meanDiff).toBe(0);
  });

  it('very different arrays yield low p-value', () => {
    const a = [1, 2, 1, 2, 1, 2, 1, 2, 1, 2];
    const b = [10, 11, 10, 11, 10, 11, 10, 11, 10, 11];
    const tt = tTest(a, b);
    expect(tt.pValue).toBeLessThan(0.001);
    expect(tt.meanDiff).toBe(-9);
  });

  it('small samples return pValue 1', () => {
    const tt = tTest([1], [2]);
    expect(tt.pValue).toBe(1);
  });
});

describe('compareConclusion', () => {
  it('needs p < 0.05 to call a winner', () => {
    expect(compareConclusion('A', 'B', 0.2, 10, 5)).toBe('No significant difference');
    expect(compareConclusion('A', 'B', 0.01, 10, 5)).toBe('A statistically better');
    expect(compareConclusion('A', 'B', 0.01, 4, 5)).toBe('B statistically better');
  });
});

describe('formatComparison', () => {
  it('produces formatted output with all lines', () => {
    const a = makeSeat('Threshold18', [20, 21, 22, 23, 24]);
    const b = { ...makeSeat('ChaseLeader', [23, 24, 24, 24, 25]), playerId: 'Player2' };
    const lines = formatComparison(a, b).split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe('Player1 (Threshold18) avg: 22.00 ± 0.71');
    expect(lines[1]).toMatch(/^Player2 \(ChaseLeader\) avg: /);
    expect(lines[2]).toMatch(/^p-value: /);
    expect(lines[3]).toMatch(/^Conclusion: /);
  });
});
