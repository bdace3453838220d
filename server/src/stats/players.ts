import db from '../db';
import { getPlayer } from '../league/data';
import { round2 } from '../scoring/rules';

export type PlayerTrend = 'hot' | 'cold' | 'neutral';

export interface PlayerAverages {
  gamesPlayed: number;
  avgFantasyPoints: number;
  totalFantasyPoints: number;
}

export interface PlayerSeasonStats {
  playerId: number;
  playerName: string;
  proTeam: string;
  managerId: number | null;
  gamesPlayed: number;
  seasonAvg: number;
  lastGamePoints: number;
  last5Avg: number;
  totalPoints: number;
  trend: PlayerTrend;
}

// Trend thresholds
const RECENT_GAMES = 3;
const MIN_RECENT_GAMES = 2;
const MIN_SEASON_GAMES = 5;
const HOT_RATIO = 1.2;
const COLD_RATIO = 0.8;

/**
 * Most recent first.
 */
function getPlayerPoints(playerId: number): number[] {
  return db
    .prepare<[number], { fantasy_points: number }>(`
      SELECT fantasy_points
      FROM player_game_scores
      WHERE player_id = ?
      ORDER BY game_date DESC, game_id DESC
    `)
    .all(playerId)
    .map((row) => row.fantasy_points);
}

function averagesOf(points: number[]): PlayerAverages {
  if (points.length === 0) {
    return { gamesPlayed: 0, avgFantasyPoints: 0, totalFantasyPoints: 0 };
  }
  const total = points.reduce((sum, value) => sum + value, 0);
  return {
    gamesPlayed: points.length,
    avgFantasyPoints: round2(total / points.length),
    totalFantasyPoints: round2(total),
  };
}

function trendOf(points: number[]): PlayerTrend {
  const recent = averagesOf(points.slice(0, RECENT_GAMES));
  const season = averagesOf(points);

  if (recent.gamesPlayed < MIN_RECENT_GAMES || season.gamesPlayed < MIN_SEASON_GAMES) {
    return 'neutral';
  }
  if (recent.avgFantasyPoints > season.avgFantasyPoints * HOT_RATIO) return 'hot';
  if (recent.avgFantasyPoints < season.avgFantasyPoints * COLD_RATIO) return 'cold';
  return 'neutral';
}

/**
 * Season averages, or over the player's last N games when lastN is given.
 */
export function calculatePlayerAverages(playerId: number, lastN?: number): PlayerAverages {
  getPlayer(playerId);
  const points = getPlayerPoints(playerId);
  return averagesOf(lastN === undefined ? points : points.slice(0, lastN));
}

export function getPlayerTrend(playerId: number): PlayerTrend {
  getPlayer(playerId);
  return trendOf(getPlayerPoints(playerId));
}

/**
 * Every player with at least one scored game, best season average first.
 */
export function getAllPlayerStats(): PlayerSeasonStats[] {
  const players = db
    .prepare<[], { id: number; name: string; pro_team: string; manager_id: number | null }>(`
      SELECT p.id, p.name, p.pro_team, r.manager_id
      FROM players p
      LEFT JOIN roster_entries r ON r.player_id = p.id
      WHERE p.id IN (SELECT player_id FROM player_game_scores)
      ORDER BY p.id ASC
    `)
    .all();

  const stats = players.map((player): PlayerSeasonStats => {
    const points = getPlayerPoints(player.id);
    const season = averagesOf(points);
    return {
      playerId: player.id,
      playerName: player.name,
      proTeam: player.pro_team,
      managerId: player.manager_id,
      gamesPlayed: season.gamesPlayed,
      seasonAvg: season.avgFantasyPoints,
      lastGamePoints: round2(points[0] ?? 0),
      last5Avg: averagesOf(points.slice(0, 5)).avgFantasyPoints,
      totalPoints: season.totalFantasyPoints,
      trend: trendOf(points),
    };
  });

  return stats.sort((a, b) => b.seasonAvg - a.seasonAvg || a.playerId - b.playerId);
}
