import { InvariantViolationError } from './errors';
import { createSeededRNG, generateSeed } from './seeded-rng';
import { DIE_FACES, isDieFace } from './types';
import type { DieFace, Roll } from './types';

export interface DiceRoller {
  roll(): DieFace;
}

/**
 * Uniform die backed by Mulberry32. One instance per game keeps parallel
 * simulations independent of each other.
 */
export class SeededDiceRoller implements DiceRoller {
  readonly seed: number;
  private rng: () => number;

  constructor(seed = generateSeed()) {
    this.seed = seed;
    this.rng = createSeededRNG(seed);
  }

  roll(): DieFace {
    return DIE_FACES[Math.floor(this.rng() * DIE_FACES.length)];
  }
}

/**
 * Replays a fixed list of faces, in order.
 */
export class ScriptedDiceRoller implements DiceRoller {
  private faces: readonly number[];
  private cursor = 0;

  constructor(faces: readonly number[]) {
    this.faces = faces;
  }

  get remaining(): number {
    return this.faces.length - this.cursor;
  }

  roll(): DieFace {
    if (this.cursor >= this.faces.length) {
      throw new InvariantViolationError(
        `Scripted dice exhausted after ${this.faces.length} rolls`
      );
    }
    const face = this.faces[this.cursor++];
    if (!isDieFace(face)) {
      throw new InvariantViolationError(`Invalid die face: ${face}`);
    }
    return face;
  }
}

export function rollDice(roller: DiceRoller, count: number): Roll {
  return Array.from({ length: count }, () => roller.roll());
}
