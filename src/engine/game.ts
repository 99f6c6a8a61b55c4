import { buildGameStatsTable, buildScoresTable } from '../statistics/tables';
import type { GameStatsRow, PlayerScoreRow, Table } from '../statistics/tables';
import { SeededDiceRoller } from './dice';
import type { DiceRoller } from './dice';
import { ConfigurationError } from './errors';
import type { RoundRecord, RoundSummary, TurnTrace } from './events';
import type { Player } from './player';
import { playTurn } from './turn-engine';

export const DEFAULT_ANTE = 1;

export interface GameOptions {
  nRounds: number;
  /** Seeds the game's own dice roller. Ignored when `roller` is given. */
  randomSeed?: number;
  roller?: DiceRoller;
  ante?: number;
  collectTraces?: boolean;
}

/**
 * A Midnight game. Owns its players (insertion order is play order), its dice
 * and the recorded history. `play()` runs once; `reset()` is required before
 * playing again.
 */
export class Game {
  readonly nRounds: number;
  readonly ante: number;
  private readonly roller: DiceRoller;
  private readonly collectTraces: boolean;
  private players: Player[] = [];
  private records: RoundRecord[] = [];
  private summaries: RoundSummary[] = [];
  private traces: TurnTrace[] = [];
  private carriedPot = 0;
  private started = false;

  constructor(options: GameOptions) {
    if (!Number.isInteger(options.nRounds) || options.nRounds < 0) {
      throw new ConfigurationError(
        `nRounds must be a non-negative integer, got ${options.nRounds}`
      );
    }
    const ante = options.ante ?? DEFAULT_ANTE;
    if (!Number.isFinite(ante) || ante < 0) {
      throw new ConfigurationError(`ante must be a non-negative number, got ${ante}`);
    }
    this.nRounds = options.nRounds;
    this.ante = ante;
    this.roller = options.roller ?? new SeededDiceRoller(options.randomSeed);
    this.collectTraces = options.collectTraces ?? false;
  }

  get hasPlayed(): boolean {
    return this.started;
  }

  getPlayers(): readonly Player[] {
    return this.players;
  }

  addPlayer(player: Player): void {
    if (this.started) {
      throw new ConfigurationError('Cannot add players after the game has started');
    }
    if (this.players.some((p) => p.id === player.id)) {
      throw new ConfigurationError(`Duplicate player id: ${player.id}`);
    }
    // A player reused from another game starts from scratch here.
    player.resetStanding();
    this.players.push(player);
  }

  play(): void {
    if (this.started) {
      throw new ConfigurationError('Game has already been played; call reset() first');
    }
    if (this.players.length === 0) {
      throw new ConfigurationError('Cannot play without players');
    }
    if (this.nRounds === 0) {
      throw new ConfigurationError('Cannot play zero rounds');
    }

    this.started = true;
    try {
      for (let round = 0; round < this.nRounds; round++) {
        this.playRound(round);
      }
    } catch (err) {
      // No partial history survives a failed turn.
      this.reset();
      throw err;
    }
  }

  /**
   * Clears history, totals and stakes. The dice roller is not rewound.
   */
  reset(): void {
    this.records = [];
    this.summaries = [];
    this.traces = [];
    this.carriedPot = 0;
    this.started = false;
    for (const player of this.players) {
      player.resetStanding();
    }
  }

  private playRound(round: number): void {
    let pot = this.carriedPot;
    let topScore: number | null = null;
    const scores: Record<string, number> = {};

    this.players.forEach((player, i) => {
      const outcome = playTurn(player.id, player.strategy, this.roller, {
        round,
        topScore,
        playersLeft: this.players.length - i - 1,
        pot,
      });

      this.records.push({
        round,
        playerId: player.id,
        scoreDelta: outcome.scoreDelta,
        busted: outcome.busted,
      });
      player.addScore(outcome.busted ? 0 : outcome.scoreDelta);

      const wager = outcome.scoreDelta > 0 ? 2 * this.ante : this.ante;
      player.adjustStake(-wager);
      pot += wager;

      scores[player.id] = outcome.scoreDelta;
      topScore = topScore === null ? outcome.scoreDelta : Math.max(topScore, outcome.scoreDelta);

      if (this.collectTraces) {
        this.traces.push({
          round,
          playerId: player.id,
          rolls: outcome.rolls,
          keptDice: outcome.keptDice,
          endReason: outcome.endReason,
        });
      }
    });

    const best = Math.max(...this.players.map((p) => scores[p.id]));
    const leaders = this.players.filter((p) => scores[p.id] === best);
    let winner: string | null = null;
    if (leaders.length === 1) {
      leaders[0].adjustStake(pot);
      winner = leaders[0].id;
      this.carriedPot = 0;
    } else {
      this.carriedPot = pot;
    }

    this.summaries.push({ round, winner, pot, scores });
  }

  private assertPlayed(): void {
    if (!this.started) {
      throw new ConfigurationError('Statistics are not available before play()');
    }
  }

  getRoundRecords(): readonly RoundRecord[] {
    this.assertPlayed();
    return this.records;
  }

  getRoundSummaries(): readonly RoundSummary[] {
    this.assertPlayed();
    return this.summaries;
  }

  getTurnTraces(): readonly TurnTrace[] {
    this.assertPlayed();
    return this.traces;
  }

  getGameStats(): Table<GameStatsRow> {
    this.assertPlayed();
    return buildGameStatsTable(this.records);
  }

  getAllScores(): Table<PlayerScoreRow> {
    this.assertPlayed();
    return buildScoresTable(this.players);
  }
}
