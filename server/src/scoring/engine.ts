import db from '../db';
import { DataIntegrityError } from '../errors';
import { GameStatRowSchema } from '../ingest/types';
import type { GameStatRow } from '../ingest/types';
import { resolveLineup } from '../lineups/resolver';
import { refreshStandings } from '../standings/aggregator';
import type { ManagerDailyScore, PlayerGameScore, ResolvedLineup, ScoreBreakdown, StandingsEntry } from '../types';
import { STAT_CATEGORIES, STAT_COLUMNS, getScoringWeights, round2 } from './rules';
import type { ScoringWeights, StatCounts } from './rules';

/**
 * Fantasy scoring engine
 * Weighted box-score points per player per game, rolled up per manager per date
 * through the resolved active lineup.
 */

export interface PlayerScoreResult {
  points: number;
  breakdown: ScoreBreakdown[];
}

export interface RecomputeResult {
  batchesReplayed: number;
  playerGameScores: number;
  managerDailyScores: number;
  standings: StandingsEntry[];
}

interface GameStatsRow {
  player_id: number;
  one_pt_made: number;
  two_pt_made: number;
  ft_made: number;
  rebounds: number;
  assists: number;
  steals: number;
  blocks: number;
  turnovers: number;
  personal_fouls: number;
  game_winner: number;
  dunks: number;
}

function toStatCounts(row: GameStatsRow): StatCounts {
  return {
    '1PT_MADE': row.one_pt_made,
    '2PT_MADE': row.two_pt_made,
    'FT_MADE': row.ft_made,
    'REB': row.rebounds,
    'AST': row.assists,
    'STL': row.steals,
    'BLK': row.blocks,
    'TOV': row.turnovers,
    'PF': row.personal_fouls,
    'GAME_WINNER': row.game_winner,
    'DUNK': row.dunks,
  };
}

// ========== PLAYER SCORING ==========

export function calculatePlayerScore(counts: StatCounts, weights: ScoringWeights): PlayerScoreResult {
  const breakdown: ScoreBreakdown[] = [];
  let raw = 0;

  for (const category of STAT_CATEGORIES) {
    const value = counts[category];
    if (value === 0) continue;
    const points = value * weights[category];
    raw += points;
    breakdown.push({ category, value, points: round2(points) });
  }

  return { points: round2(raw), breakdown };
}

// ========== GAME STATS ==========

function getGameDate(gameId: number): string {
  const game = db.prepare<[number], { game_date: string }>('SELECT game_date FROM games WHERE id = ?').get(gameId);
  if (!game) {
    throw new DataIntegrityError(`Game ${gameId} is not on the schedule`);
  }
  return game.game_date;
}

/**
 * Replace the stored box score for a game with the given rows.
 */
export function writeGameStats(gameId: number, rows: GameStatRow[]): void {
  const columns = STAT_CATEGORIES.map((category) => STAT_COLUMNS[category]);
  const insert = db.prepare(`
    INSERT INTO game_stats (game_id, player_id, ${columns.join(', ')})
    VALUES (?, ?, ${columns.map(() => '?').join(', ')})
  `);

  db.prepare('DELETE FROM game_stats WHERE game_id = ?').run(gameId);
  for (const row of rows) {
    insert.run(gameId, row.playerId, ...STAT_CATEGORIES.map((category) => row[category]));
  }
}

export function getGameStatCounts(gameId: number): Map<number, StatCounts> {
  const rows = db
    .prepare<[number], GameStatsRow>(`
      SELECT player_id, one_pt_made, two_pt_made, ft_made, rebounds, assists, steals,
             blocks, turnovers, personal_fouls, game_winner, dunks
      FROM game_stats
      WHERE game_id = ?
      ORDER BY player_id ASC
    `)
    .all(gameId);

  const counts = new Map<number, StatCounts>();
  for (const row of rows) {
    counts.set(row.player_id, toStatCounts(row));
  }
  return counts;
}

// ========== MANAGER DAILY SCORES ==========

/**
 * Sum of the active players' points across every game on the date.
 * Null when none of the active players scored.
 */
export function calculateManagerDailyScore(
  managerId: number,
  date: string,
  lineup: ResolvedLineup = resolveLineup(managerId, date)
): ManagerDailyScore | null {
  if (lineup.activePlayerIds.length === 0) return null;

  const placeholders = lineup.activePlayerIds.map(() => '?').join(', ');
  const rows = db
    .prepare<(string | number)[], { player_id: number; fantasy_points: number }>(`
      SELECT player_id, fantasy_points
      FROM player_game_scores
      WHERE game_date = ? AND player_id IN (${placeholders})
      ORDER BY player_id ASC, game_id ASC
    `)
    .all(date, ...lineup.activePlayerIds);

  if (rows.length === 0) return null;

  let total = 0;
  const scored = new Set<number>();
  for (const row of rows) {
    total += row.fantasy_points;
    scored.add(row.player_id);
  }

  return {
    managerId,
    gameDate: date,
    totalPoints: round2(total),
    activePlayersCount: scored.size,
  };
}

export function writeManagerDailyScore(
  managerId: number,
  date: string,
  lineup?: ResolvedLineup
): ManagerDailyScore | null {
  const score = calculateManagerDailyScore(managerId, date, lineup);

  if (!score) {
    db.prepare('DELETE FROM manager_daily_scores WHERE manager_id = ? AND game_date = ?').run(managerId, date);
    return null;
  }

  db.prepare(`
    INSERT INTO manager_daily_scores (manager_id, game_date, total_points, active_players_count)
    VALUES (?, ?, ?, ?)
    ON CONFLICT (manager_id, game_date) DO UPDATE SET
      total_points = excluded.total_points,
      active_players_count = excluded.active_players_count
  `).run(score.managerId, score.gameDate, score.totalPoints, score.activePlayersCount);

  return score;
}

/**
 * Re-project a manager's daily scores for every scored date on or after fromDate.
 * Used after a lineup change, which can carry forward through inheritance.
 */
export function refreshManagerScoresFrom(managerId: number, fromDate: string): number {
  const dates = db
    .prepare<[string, number, string], { game_date: string }>(`
      SELECT DISTINCT game_date FROM player_game_scores WHERE game_date >= ?
      UNION
      SELECT game_date FROM manager_daily_scores WHERE manager_id = ? AND game_date >= ?
      ORDER BY game_date ASC
    `)
    .all(fromDate, managerId, fromDate);

  for (const { game_date } of dates) {
    writeManagerDailyScore(managerId, game_date);
  }
  return dates.length;
}

export function getManagerDailyScores(date: string): Array<ManagerDailyScore & { managerName: string; teamName: string }> {
  return db
    .prepare<[string], {
      manager_id: number;
      game_date: string;
      total_points: number;
      active_players_count: number;
      name: string;
      team_name: string;
    }>(`
      SELECT mds.manager_id, mds.game_date, mds.total_points, mds.active_players_count, m.name, m.team_name
      FROM manager_daily_scores mds
      JOIN managers m ON m.id = mds.manager_id
      WHERE mds.game_date = ?
      ORDER BY mds.total_points DESC, mds.manager_id ASC
    `)
    .all(date)
    .map((row) => ({
      managerId: row.manager_id,
      gameDate: row.game_date,
      totalPoints: row.total_points,
      activePlayersCount: row.active_players_count,
      managerName: row.name,
      teamName: row.team_name,
    }));
}

// ========== GAME APPLICATION ==========

/**
 * Rewrite a game's PlayerGameScores from its stored box score, then rescore
 * every manager whose resolved lineup on that date includes a player whose
 * score appeared, changed or vanished. Returns the number of managers rescored.
 */
export function applyGameScores(gameId: number, weights: ScoringWeights = getScoringWeights()): number {
  const gameDate = getGameDate(gameId);

  const previous = db
    .prepare<[number], { player_id: number }>('SELECT player_id FROM player_game_scores WHERE game_id = ?')
    .all(gameId)
    .map((row) => row.player_id);

  const counts = getGameStatCounts(gameId);
  const insert = db.prepare(`
    INSERT INTO player_game_scores (game_id, player_id, game_date, fantasy_points, breakdown_json)
    VALUES (?, ?, ?, ?, ?)
  `);

  db.prepare('DELETE FROM player_game_scores WHERE game_id = ?').run(gameId);
  for (const [playerId, playerCounts] of counts) {
    const score = calculatePlayerScore(playerCounts, weights);
    insert.run(gameId, playerId, gameDate, score.points, JSON.stringify(score.breakdown));
  }

  const affected = new Set<number>([...previous, ...counts.keys()]);
  const managerIds = db
    .prepare<[], { id: number }>('SELECT id FROM managers ORDER BY id ASC')
    .all()
    .map((row) => row.id);

  let updated = 0;
  for (const managerId of managerIds) {
    const lineup = resolveLineup(managerId, gameDate);
    if (!lineup.activePlayerIds.some((playerId) => affected.has(playerId))) continue;
    writeManagerDailyScore(managerId, gameDate, lineup);
    updated++;
  }
  return updated;
}

export function getPlayerGameScores(gameId: number): PlayerGameScore[] {
  return db
    .prepare<[number], { game_id: number; player_id: number; game_date: string; fantasy_points: number }>(`
      SELECT game_id, player_id, game_date, fantasy_points
      FROM player_game_scores
      WHERE game_id = ?
      ORDER BY player_id ASC
    `)
    .all(gameId)
    .map((row) => ({
      gameId: row.game_id,
      playerId: row.player_id,
      gameDate: row.game_date,
      fantasyPoints: row.fantasy_points,
    }));
}

// ========== FULL RECOMPUTE ==========

function assertBatchReferences(batchId: string, gameId: number, rows: GameStatRow[]): void {
  getGameDate(gameId);
  const findPlayer = db.prepare<[number], { id: number }>('SELECT id FROM players WHERE id = ?');
  const missing = rows.filter((row) => !findPlayer.get(row.playerId));
  if (missing.length > 0) {
    throw new DataIntegrityError(
      `Stat batch ${batchId} references unknown players`,
      missing.map((row) => `Player ${row.playerId} not found`)
    );
  }
}

/**
 * Rebuild game stats, player and manager scores, and standings by replaying the
 * stat batch log in ingestion order. Not reentrant.
 */
export function recomputeAll(): RecomputeResult {
  const batches = db
    .prepare<[], { id: string; game_id: number; rows_json: string }>(
      'SELECT id, game_id, rows_json FROM stat_batches ORDER BY seq ASC'
    )
    .all();

  const weights = batches.length > 0 ? getScoringWeights() : null;

  const standings = db.transaction(() => {
    db.prepare('DELETE FROM manager_daily_scores').run();
    db.prepare('DELETE FROM player_game_scores').run();
    db.prepare('DELETE FROM game_stats').run();

    for (const batch of batches) {
      const parsed = GameStatRowSchema.array().safeParse(JSON.parse(batch.rows_json));
      if (!parsed.success) {
        throw new DataIntegrityError(`Stat batch ${batch.id} is unreadable`, [parsed.error.message]);
      }
      assertBatchReferences(batch.id, batch.game_id, parsed.data);
      writeGameStats(batch.game_id, parsed.data);
      if (weights) {
        applyGameScores(batch.game_id, weights);
      }
    }

    return refreshStandings();
  })();

  const counts = db
    .prepare<[], { pgs: number; mds: number }>(`
      SELECT
        (SELECT COUNT(*) FROM player_game_scores) as pgs,
        (SELECT COUNT(*) FROM manager_daily_scores) as mds
    `)
    .get();

  console.log(`Recompute complete: ${batches.length} stat batches replayed`);

  return {
    batchesReplayed: batches.length,
    playerGameScores: counts?.pgs ?? 0,
    managerDailyScores: counts?.mds ?? 0,
    standings,
  };
}
