import db from '../db';
import { NotFoundError } from '../errors';
import { round2 } from '../scoring/rules';
import { StandingsEntry } from '../types';

interface StandingsRow {
  manager_id: number;
  name: string;
  team_name: string;
  total_points: number;
  days_with_scores: number;
}

export interface TopScorer {
  playerId: number;
  playerName: string;
  proTeam: string;
  managerId: number | null;
  totalPoints: number;
  gamesPlayed: number;
}

/**
 * Live standings from ManagerDailyScore. Every manager appears, scored or not;
 * ties on total go to the lower manager id.
 */
export function calculateStandings(): StandingsEntry[] {
  const rows = db
    .prepare<[], StandingsRow>(`
      SELECT
        m.id as manager_id,
        m.name,
        m.team_name,
        COALESCE(SUM(mds.total_points), 0) as total_points,
        COUNT(mds.game_date) as days_with_scores
      FROM managers m
      LEFT JOIN manager_daily_scores mds ON mds.manager_id = m.id
      GROUP BY m.id
    `)
    .all();

  const entries = rows.map((row) => {
    const totalPoints = round2(row.total_points);
    return {
      managerId: row.manager_id,
      managerName: row.name,
      teamName: row.team_name,
      totalPoints,
      daysWithScores: row.days_with_scores,
      avgPointsPerDay: row.days_with_scores > 0 ? round2(totalPoints / row.days_with_scores) : 0,
    };
  });

  entries.sort((a, b) => b.totalPoints - a.totalPoints || a.managerId - b.managerId);

  return entries.map((entry, index) => ({ rank: index + 1, ...entry }));
}

export function getStandings(): StandingsEntry[] {
  return calculateStandings();
}

/**
 * Persist the current standings snapshot.
 */
export function refreshStandings(now: Date = new Date()): StandingsEntry[] {
  const standings = calculateStandings();
  const updatedAt = now.toISOString();

  const upsert = db.prepare(`
    INSERT INTO standings (manager_id, total_points, days_with_scores, avg_points_per_day, rank, updated_at)
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT (manager_id) DO UPDATE SET
      total_points = excluded.total_points,
      days_with_scores = excluded.days_with_scores,
      avg_points_per_day = excluded.avg_points_per_day,
      rank = excluded.rank,
      updated_at = excluded.updated_at
  `);

  db.transaction(() => {
    db.prepare('DELETE FROM standings WHERE manager_id NOT IN (SELECT id FROM managers)').run();
    for (const entry of standings) {
      upsert.run(
        entry.managerId,
        entry.totalPoints,
        entry.daysWithScores,
        entry.avgPointsPerDay,
        entry.rank,
        updatedAt
      );
    }
  })();

  return standings;
}

export function getManagerRank(managerId: number): StandingsEntry {
  const entry = calculateStandings().find((standing) => standing.managerId === managerId);
  if (!entry) {
    throw new NotFoundError(`Manager ${managerId} not found`);
  }
  return entry;
}

/**
 * Players with the most fantasy points this season, rostered or not.
 */
export function getTopScorers(limit = 10): TopScorer[] {
  return db
    .prepare<[number], {
      player_id: number;
      name: string;
      pro_team: string;
      manager_id: number | null;
      total_points: number;
      games_played: number;
    }>(`
      SELECT
        p.id as player_id,
        p.name,
        p.pro_team,
        r.manager_id,
        SUM(pgs.fantasy_points) as total_points,
        COUNT(pgs.game_id) as games_played
      FROM player_game_scores pgs
      JOIN players p ON p.id = pgs.player_id
      LEFT JOIN roster_entries r ON r.player_id = p.id
      GROUP BY p.id
      ORDER BY total_points DESC, p.id ASC
      LIMIT ?
    `)
    .all(limit)
    .map((row) => ({
      playerId: row.player_id,
      playerName: row.name,
      proTeam: row.pro_team,
      managerId: row.manager_id,
      totalPoints: round2(row.total_points),
      gamesPlayed: row.games_played,
    }));
}
