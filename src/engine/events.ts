import type { DieFace, Roll, TurnEndReason } from './types';

export interface RoundRecord {
  readonly round: number;
  readonly playerId: string;
  readonly scoreDelta: number;
  readonly busted: boolean;
}

export interface RoundSummary {
  readonly round: number;
  /** null when the top score was tied and the pot carries over. */
  readonly winner: string | null;
  readonly pot: number;
  readonly scores: Readonly<Record<string, number>>;
}

export interface TurnTrace {
  readonly round: number;
  readonly playerId: string;
  readonly rolls: readonly Roll[];
  readonly keptDice: readonly DieFace[];
  readonly endReason: TurnEndReason;
}
