import { MAX_SCORE } from '../engine/types';
import type { SeatResult } from '../simulator/runner';

export interface AggregateMetrics {
  avgTotalScore: number;
  stdDev: number;
  stdError: number;
  ci95: { lower: number; upper: number };
  avgRoundScore: number;
  bustRate: number;
  qualificationRate: number;
  winRate: number;
  avgRelativeStake: number;
  roundScoreHistogram: number[];
}

export interface TTestResult {
  pValue: number;
  meanDiff: number;
  ci95: { lower: number; upper: number };
}

function mean(arr: number[]): number {
  if (arr.length === 0) return 0;
  return arr.reduce((a, b) => a + b, 0) / arr.length;
}

function sampleStdDev(arr: number[], m?: number): number {
  const n = arr.length;
  if (n < 2) return 0;
  const avg = m ?? mean(arr);
  const sumSq = arr.reduce((s, x) => s + (x - avg) ** 2, 0);
  return Math.sqrt(sumSq / (n - 1));
}

function sum(arr: number[]): number {
  return arr.reduce((a, b) => a + b, 0);
}

/**
 * Round score histogram: bins 0..24, histogram[i] = count of turns scoring i.
 */
export function scoreHistogram(scores: number[]): number[] {
  const hist = new Array<number>(MAX_SCORE + 1).fill(0);
  for (const s of scores) {
    const bin = Math.max(0, Math.min(MAX_SCORE, Math.round(s)));
    hist[bin]++;
  }
  return hist;
}

export function computeAggregateMetrics(seat: SeatResult): AggregateMetrics {
  const { totalScores, roundScores, perGameMetrics } = seat;
  const n = totalScores.length;
  const rounds = roundScores.length;

  const avgTotalScore = mean(totalScores);
  const stdDev = sampleStdDev(totalScores, avgTotalScore);
  const stdError = n > 1 ? stdDev / Math.sqrt(n) : 0;
  const halfWidth = 1.96 * stdError;
  const ci95 = { lower: avgTotalScore - halfWidth, upper: avgTotalScore + halfWidth };

  const rate = (count: number): number => (rounds > 0 ? count / rounds : 0);

  return {
    avgTotalScore,
    stdDev,
    stdError,
    ci95,
    avgRoundScore: mean(roundScores),
    bustRate: rate(sum(perGameMetrics.map((m) => m.bustCount))),
    qualificationRate: rate(sum(perGameMetrics.map((m) => m.qualifiedCount))),
    winRate: rate(sum(perGameMetrics.map((m) => m.roundsWon))),
    avgRelativeStake: mean(perGameMetrics.map((m) => m.relativeStake)),
    roundScoreHistogram: scoreHistogram(roundScores),
  };
}

/**
 * Welch's t-test for comparing two independent samples (unequal variances).
 */
export function tTest(scoresA: number[], scoresB: number[]): TTestResult {
  const nA = scoresA.length;
  const nB = scoresB.length;
  if (nA < 2 || nB < 2) {
    return {
      pValue: 1,
      meanDiff: 0,
      ci95: { lower: 0, upper: 0 },
    };
  }

  const meanA = mean(scoresA);
  const meanB = mean(scoresB);
  const varA = sampleStdDev(scoresA, meanA) ** 2;
  const varB = sampleStdDev(scoresB, meanB) ** 2;
  const seDiff = Math.sqrt(varA / nA + varB / nB);
  if (seDiff === 0) {
    return {
      pValue: meanA === meanB ? 1 : 0,
      meanDiff: meanA - meanB,
      ci95: { lower: meanA - meanB, upper: meanA - meanB },
    };
  }

  const t = (meanA - meanB) / seDiff;
  // Normal approximation (valid for n > 30; typical runs play hundreds of games)
  const pValue = 2 * (1 - normalCdf(Math.abs(t)));
  const halfWidth = 1.96 * seDiff;
  const meanDiff = meanA - meanB;

  return {
    pValue,
    meanDiff,
    ci95: { lower: meanDiff - halfWidth, upper: meanDiff + halfWidth },
  };
}

function normalCdf(x: number): number {
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const t = 1 / (1 + p * Math.abs(x));
  const y =
    1 -
    ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-x * x);
  return x >= 0 ? y : 1 - y;
}

export function compareConclusion(
  labelA: string,
  labelB: string,
  pValue: number,
  avgA: number,
  avgB: number
): string {
  if (pValue >= 0.05) return 'No significant difference';
  return avgA > avgB ? `${labelA} statistically better` : `${labelB} statistically better`;
}

function seatLabel(seat: SeatResult): string {
  return `${seat.playerId} (${seat.strategy})`;
}

export function formatComparison(seatA: SeatResult, seatB: SeatResult): string {
  const metricsA = computeAggregateMetrics(seatA);
  const metricsB = computeAggregateMetrics(seatB);
  const tt = tTest(seatA.totalScores, seatB.totalScores);
  const labelA = seatLabel(seatA);
  const labelB = seatLabel(seatB);

  const lines: string[] = [];
  lines.push(`${labelA} avg: ${metricsA.avgTotalScore.toFixed(2)} ± ${metricsA.stdError.toFixed(2)}`);
  lines.push(`${labelB} avg: ${metricsB.avgTotalScore.toFixed(2)} ± ${metricsB.stdError.toFixed(2)}`);
  lines.push(`p-value: ${tt.pValue.toFixed(3)}`);
  lines.push(
    `Conclusion: ${compareConclusion(labelA, labelB, tt.pValue, metricsA.avgTotalScore, metricsB.avgTotalScore)}`
  );

  return lines.join('\n');
}
