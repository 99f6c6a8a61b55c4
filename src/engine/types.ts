export const DIE_FACES = [1, 2, 3, 4, 5, 6] as const;

export type DieFace = (typeof DIE_FACES)[number];

/** Faces produced by one rolling step, one per die in hand. */
export type Roll = readonly DieFace[];

/** Dice per turn. */
export const N_DICE = 6;

/** A hand must hold both of these faces to score. */
export const QUALIFIERS: readonly DieFace[] = [1, 4];

/** Four sixes beside the qualifiers. */
export const MAX_SCORE = 24;

export type Decision = 'continue' | 'stop';

export const DECISIONS: readonly Decision[] = ['continue', 'stop'];

export type TurnPhase = 'rolling' | 'deciding' | 'ended';

export type TurnEndReason = 'stopped' | 'bust' | 'exhausted';

/**
 * Mutable state of one turn. Owned by a single playTurn call and never handed
 * out; strategies receive a TurnStateView copy instead.
 */
export interface TurnState {
  playerId: string;
  rolls: Roll[];
  keptDice: DieFace[];
  /** Dice of the latest roll that were not set aside. */
  tableDice: DieFace[];
  /** Standing score: hand score of kept plus table dice. */
  score: number;
  busted: boolean;
}

export interface RoundContext {
  round: number;
  /** Best turn score already posted this round; null before anyone has played. */
  topScore: number | null;
  playersLeft: number;
  pot: number;
}

export interface TurnStateView {
  readonly playerId: string;
  readonly rolls: readonly Roll[];
  readonly keptDice: readonly DieFace[];
  readonly tableDice: readonly DieFace[];
  readonly score: number;
  readonly rollCount: number;
  readonly diceInHand: number;
  readonly round: Readonly<RoundContext>;
}

export function isDieFace(value: unknown): value is DieFace {
  return typeof value === 'number' && DIE_FACES.some((face) => face === value);
}

export function isDecision(value: unknown): value is Decision {
  return typeof value === 'string' && DECISIONS.some((d) => d === value);
}
