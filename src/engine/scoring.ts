import { InvariantViolationError } from './errors';
import { MAX_SCORE, N_DICE, QUALIFIERS, isDieFace } from './types';
import type { DieFace, Roll, TurnState } from './types';

export interface RollOutcome {
  scoreDelta: number;
  bust: boolean;
  /** Dice set aside from this roll. */
  kept: DieFace[];
}

export function createTurnState(playerId: string): TurnState {
  return {
    playerId,
    rolls: [],
    keptDice: [],
    tableDice: [],
    score: 0,
    busted: false,
  };
}

export function qualifies(dice: readonly DieFace[]): boolean {
  return QUALIFIERS.every((q) => dice.includes(q));
}

export function missingQualifiers(dice: readonly DieFace[]): DieFace[] {
  return QUALIFIERS.filter((q) => !dice.includes(q));
}

/**
 * Hand score: sum of everything but one 1 and one 4, or 0 without both.
 */
export function scoreDice(dice: readonly DieFace[]): number {
  if (!qualifies(dice)) return 0;
  const sum = dice.reduce<number>((acc, face) => acc + face, 0);
  return QUALIFIERS.reduce<number>((acc, q) => acc - q, sum);
}

export function diceInHand(state: Pick<TurnState, 'keptDice'>): number {
  return N_DICE - state.keptDice.length;
}

function removeDice(dice: readonly DieFace[], toRemove: readonly DieFace[]): DieFace[] {
  const rest = [...dice];
  for (const face of toRemove) {
    const idx = rest.indexOf(face);
    if (idx >= 0) rest.splice(idx, 1);
  }
  return rest;
}

/**
 * Dice the rules force aside from a roll: missing qualifiers first, then every
 * 6 once the hand qualifies, otherwise the single highest die.
 */
export function selectForcedKeep(kept: readonly DieFace[], roll: Roll): DieFace[] {
  const keep: DieFace[] = [];
  let rest = [...roll];

  for (const q of QUALIFIERS) {
    if (!kept.includes(q) && rest.includes(q)) {
      keep.push(q);
      rest = removeDice(rest, [q]);
    }
  }

  if (qualifies([...kept, ...keep])) {
    const sixes = rest.filter((face) => face === 6);
    keep.push(...sixes);
    rest = removeDice(rest, sixes);
  }

  if (keep.length === 0 && rest.length > 0) {
    keep.push(rest.reduce((a, b) => (b > a ? b : a)));
  }
  return keep;
}

function assertValidRoll(state: TurnState, roll: Roll): void {
  const expected = diceInHand(state);
  if (roll.length !== expected) {
    throw new InvariantViolationError(
      `Roll has ${roll.length} dice, expected ${expected}`
    );
  }
  for (const face of roll) {
    if (!isDieFace(face)) {
      throw new InvariantViolationError(`Invalid die face: ${face}`);
    }
  }
}

function assertValidScore(score: number): void {
  if (!Number.isInteger(score) || score < 0 || score > MAX_SCORE) {
    throw new InvariantViolationError(`Score ${score} outside 0..${MAX_SCORE}`);
  }
}

/**
 * Applies a roll to the turn. Mutates `state`: appends the roll, moves the
 * forced-keep dice to keptDice, replaces tableDice and the standing score, and
 * sets `busted` once the hand can no longer collect its qualifiers.
 */
export function applyRoll(state: TurnState, roll: Roll): RollOutcome {
  if (state.busted) {
    throw new InvariantViolationError('Cannot roll after a bust');
  }
  assertValidRoll(state, roll);

  const previous = state.score;
  const kept = selectForcedKeep(state.keptDice, roll);
  state.rolls.push([...roll]);
  state.keptDice.push(...kept);
  state.tableDice = removeDice(roll, kept);

  if (missingQualifiers(state.keptDice).length > diceInHand(state)) {
    state.busted = true;
    state.score = 0;
    return { scoreDelta: state.score - previous, bust: true, kept };
  }

  const score = scoreDice([...state.keptDice, ...state.tableDice]);
  assertValidScore(score);
  state.score = score;
  return { scoreDelta: score - previous, bust: false, kept };
}
