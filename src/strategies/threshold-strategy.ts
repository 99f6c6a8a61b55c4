import { ConfigurationError } from '../engine/errors';
import { MAX_SCORE } from '../engine/types';
import type { Decision, MidnightStrategy, TurnStateView } from './types';

export function assertValidThreshold(threshold: number): void {
  if (!Number.isInteger(threshold) || threshold < 1 || threshold > MAX_SCORE) {
    throw new ConfigurationError(
      `Threshold must be an integer in 1..${MAX_SCORE}, got ${threshold}`
    );
  }
}

/**
 * Keeps rolling while the standing score is below `threshold`.
 */
export class ThresholdStrategy implements MidnightStrategy {
  readonly name: string;
  readonly threshold: number;

  constructor(threshold: number) {
    assertValidThreshold(threshold);
    this.threshold = threshold;
    this.name = `Threshold${threshold}`;
  }

  decide(view: TurnStateView): Decision {
    return view.score < this.threshold ? 'continue' : 'stop';
  }
}
