import type { RoundRecord } from '../engine/events';
import type { Player } from '../engine/player';

/**
 * Row-oriented table: fixed columns, one object per row.
 */
export interface Table<Row> {
  columns: readonly (keyof Row & string)[];
  rows: Row[];
}

export interface GameStatsRow {
  round: number;
  player_id: string;
  score_delta: number;
  busted: boolean;
}

export interface PlayerScoreRow {
  player_id: string;
  strategy: string;
  total_score: number;
}

export const GAME_STATS_COLUMNS: readonly (keyof GameStatsRow)[] = [
  'round',
  'player_id',
  'score_delta',
  'busted',
];

export const PLAYER_SCORE_COLUMNS: readonly (keyof PlayerScoreRow)[] = [
  'player_id',
  'strategy',
  'total_score',
];

export function buildGameStatsTable(records: readonly RoundRecord[]): Table<GameStatsRow> {
  return {
    columns: GAME_STATS_COLUMNS,
    rows: records.map((r) => ({
      round: r.round,
      player_id: r.playerId,
      score_delta: r.scoreDelta,
      busted: r.busted,
    })),
  };
}

export function buildScoresTable(players: readonly Player[]): Table<PlayerScoreRow> {
  return {
    columns: PLAYER_SCORE_COLUMNS,
    rows: players.map((p) => ({
      player_id: p.id,
      strategy: p.strategy.name,
      total_score: p.totalScore,
    })),
  };
}

/**
 * Left-aligned text rendering, two spaces between columns. `limit` keeps the
 * first N rows.
 */
export function formatTable<Row>(table: Table<Row>, limit = table.rows.length): string {
  const header = table.columns.map((c) => c);
  const body = table.rows
    .slice(0, limit)
    .map((row) => table.columns.map((c) => String(row[c])));
  const widths = header.map((h, i) =>
    Math.max(h.length, ...body.map((cells) => cells[i].length))
  );
  const line = (cells: string[]): string =>
    cells.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd();
  return [line(header), ...body.map(line)].join('\n');
}
