import { assertValidThreshold } from './threshold-strategy';
import type { Decision, MidnightStrategy, TurnStateView } from './types';

export const DEFAULT_FALLBACK_THRESHOLD = 15;

/**
 * Reads the round context: keeps rolling until strictly ahead of the best
 * score already posted this round. The first player to act has nothing to
 * beat and plays to `fallbackThreshold` instead.
 */
export class ChaseLeaderStrategy implements MidnightStrategy {
  readonly name = 'ChaseLeader';
  readonly fallbackThreshold: number;

  constructor(fallbackThreshold = DEFAULT_FALLBACK_THRESHOLD) {
    assertValidThreshold(fallbackThreshold);
    this.fallbackThreshold = fallbackThreshold;
  }

  decide(view: TurnStateView): Decision {
    const { topScore } = view.round;
    if (topScore === null) {
      return view.score < this.fallbackThreshold ? 'continue' : 'stop';
    }
    return view.score > topScore ? 'stop' : 'continue';
  }
}
