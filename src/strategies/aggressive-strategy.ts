import type { Decision, MidnightStrategy, TurnStateView } from './types';

/**
 * Never stands. The turn ends when the last die is set aside or the hand busts.
 */
export class AggressiveStrategy implements MidnightStrategy {
  readonly name = 'AlwaysAggressive';

  decide(_view: TurnStateView): Decision {
    return 'continue';
  }
}
