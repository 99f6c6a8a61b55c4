import type { MidnightStrategy } from '../strategies/types';

export const DEFAULT_INITIAL_STAKE = 1000;

export interface PlayerOptions {
  /** Defaults to Player1, Player2, ... */
  id?: string;
  initialStake?: number;
}

/**
 * A seat at the table. The running total and stake are changed by the Game
 * between turns only.
 */
export class Player {
  private static created = 0;

  static resetCounter(): void {
    Player.created = 0;
  }

  readonly id: string;
  readonly strategy: MidnightStrategy;
  readonly initialStake: number;
  private total = 0;
  private currentStake: number;

  constructor(strategy: MidnightStrategy, options: PlayerOptions = {}) {
    Player.created++;
    this.id = options.id ?? `Player${Player.created}`;
    this.strategy = strategy;
    this.initialStake = options.initialStake ?? DEFAULT_INITIAL_STAKE;
    this.currentStake = this.initialStake;
  }

  get totalScore(): number {
    return this.total;
  }

  get stake(): number {
    return this.currentStake;
  }

  get relativeStake(): number {
    return this.currentStake - this.initialStake;
  }

  addScore(delta: number): void {
    this.total += delta;
  }

  adjustStake(amount: number): void {
    this.currentStake += amount;
  }

  resetStanding(): void {
    this.total = 0;
    this.currentStake = this.initialStake;
  }

  toString(): string {
    return `Player(id=${this.id}, strategy=${this.strategy.name}, total=${this.total}, stake=${this.currentStake})`;
  }
}
