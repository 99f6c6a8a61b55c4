import type { Decision, MidnightStrategy, TurnStateView } from './types';

/**
 * Stands as soon as the hand is worth anything.
 */
export class ConservativeStrategy implements MidnightStrategy {
  readonly name = 'AlwaysConservative';

  decide(view: TurnStateView): Decision {
    return view.score > 0 ? 'stop' : 'continue';
  }
}
