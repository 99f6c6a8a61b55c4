import type { Decision, TurnStateView } from '../engine/types';

export type { Decision, TurnStateView };

/**
 * Strategy interface. `decide` is called after every roll that neither busts
 * nor uses up the last die, and must depend only on the view it is given.
 * One instance may be shared by several players.
 */
export interface MidnightStrategy {
  readonly name: string;
  decide(view: TurnStateView): Decision;
}
