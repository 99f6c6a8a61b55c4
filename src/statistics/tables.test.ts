import {
  PLAYER_SCORE_COLUMNS,
  buildGameStatsTable,
  buildScoresTable,
  formatTable,
} from './tables';
import type { PlayerScoreRow, Table } from './tables';
import { Player } from '../engine/player';
import { ThresholdStrategy } from '../strategies/threshold-strategy';

describe('buildGameStatsTable', () => {
  it('maps each record to a row with the downstream column names', () => {
    const table = buildGameStatsTable([
      { round: 0, playerId: 'alice', scoreDelta: 0, busted: true },
      { round: 0, playerId: 'bob', scoreDelta: 17, busted: false },
    ]);
    expect(table.columns).toEqual(['round', 'player_id', 'score_delta', 'busted']);
    expect(table.rows).toEqual([
      { round: 0, player_id: 'alice', score_delta: 0, busted: true },
      { round: 0, player_id: 'bob', score_delta: 17, busted: false },
    ]);
  });

  it('is empty for no records', () => {
    expect(buildGameStatsTable([]).rows).toEqual([]);
  });
});

describe('buildScoresTable', () => {
  it('reports each player with strategy tag and total', () => {
    const player = new Player(new ThresholdStrategy(18), { id: 'carol' });
    player.addScore(21);
    expect(buildScoresTable([player]).rows).toEqual([
      { player_id: 'carol', strategy: 'Threshold18', total_score: 21 },
    ]);
  });
});

describe('formatTable', () => {
  const table: Table<PlayerScoreRow> = {
    columns: PLAYER_SCORE_COLUMNS,
    rows: [
      { player_id: 'P1', strategy: 'AlwaysConservative', total_score: 5 },
      { player_id: 'Player10', strategy: 'Threshold18', total_score: 132 },
    ],
  };

  it('aligns columns to the widest cell', () => {
    expect(formatTable(table)).toBe(
      [
        'player_id  strategy            total_score',
        'P1         AlwaysConservative  5',
        'Player10   Threshold18         132',
      ].join('\n')
    );
  });

  it('limits the number of rows', () => {
    expect(formatTable(table, 1).split('\n')).toEqual([
      'player_id  strategy            total_score',
      'P1         AlwaysConservative  5',
    ]);
  });

  it('renders booleans', () => {
    const stats = buildGameStatsTable([
      { round: 0, playerId: 'alice', scoreDelta: 0, busted: true },
    ]);
    expect(formatTable(stats)).toBe(
      'round  player_id  score_delta  busted\n0      alice      0            true'
    );
  });
});
