import type { MidnightStrategy } from '../strategies/types';
import { rollDice } from './dice';
import type { DiceRoller } from './dice';
import { InvariantViolationError } from './errors';
import { applyRoll, createTurnState, diceInHand } from './scoring';
import { isDecision } from './types';
import type {
  DieFace,
  Roll,
  RoundContext,
  TurnEndReason,
  TurnPhase,
  TurnState,
  TurnStateView,
} from './types';

export interface TurnOutcome {
  playerId: string;
  /** Standing score when the turn ended; 0 on a bust. */
  scoreDelta: number;
  busted: boolean;
  endReason: TurnEndReason;
  rolls: Roll[];
  keptDice: DieFace[];
}

export function toTurnStateView(state: TurnState, context: RoundContext): TurnStateView {
  return Object.freeze({
    playerId: state.playerId,
    rolls: state.rolls.map((r) => [...r]),
    keptDice: [...state.keptDice],
    tableDice: [...state.tableDice],
    score: state.score,
    rollCount: state.rolls.length,
    diceInHand: diceInHand(state),
    round: Object.freeze({ ...context }),
  });
}

/**
 * Plays one turn: rolling -> deciding -> ... -> ended. Every rolling step sets
 * at least one die aside, so a turn never takes more than six rolls.
 */
export function playTurn(
  playerId: string,
  strategy: MidnightStrategy,
  roller: DiceRoller,
  context: RoundContext
): TurnOutcome {
  const state = createTurnState(playerId);
  let phase: TurnPhase = 'rolling';
  let endReason: TurnEndReason = 'stopped';

  while (phase !== 'ended') {
    if (phase === 'rolling') {
      const { bust } = applyRoll(state, rollDice(roller, diceInHand(state)));
      if (bust) {
        endReason = 'bust';
        phase = 'ended';
      } else if (diceInHand(state) === 0) {
        endReason = 'exhausted';
        phase = 'ended';
      } else {
        phase = 'deciding';
      }
    } else {
      const decision: unknown = strategy.decide(toTurnStateView(state, context));
      if (!isDecision(decision)) {
        throw new InvariantViolationError(
          `Strategy ${strategy.name} returned invalid decision: ${String(decision)}`
        );
      }
      if (decision === 'stop') {
        endReason = 'stopped';
        phase = 'ended';
      } else {
        phase = 'rolling';
      }
    }
  }

  return {
    playerId,
    scoreDelta: state.busted ? 0 : state.score,
    busted: state.busted,
    endReason,
    rolls: state.rolls,
    keptDice: state.keptDice,
  };
}
