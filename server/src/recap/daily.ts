import db from '../db';
import { getManagers } from '../league/data';
import { resolveLineup } from '../lineups/resolver';
import { round2 } from '../scoring/rules';

export interface DailyRecap {
  gameDate: string;
  gamesPlayed: number;
  topScorer: {
    playerId: number;
    playerName: string;
    proTeam: string;
    fantasyPoints: number;
  };
  managerOfDay: {
    managerId: number;
    managerName: string;
    teamName: string;
    totalPoints: number;
    activePlayersCount: number;
  } | null;
  biggestBenchMistake: {
    managerId: number;
    managerName: string;
    playerId: number;
    playerName: string;
    fantasyPoints: number;
  } | null;
}

interface DayScoreRow {
  player_id: number;
  name: string;
  pro_team: string;
  manager_id: number | null;
  fantasy_points: number;
}

/**
 * Highlights for one date; null when nobody scored on it.
 * Bench decisions come from the resolved lineup, so inherited and default
 * lineups count the same as explicit ones.
 */
export function generateDailyRecap(date: string): DailyRecap | null {
  const scores = db
    .prepare<[string], DayScoreRow>(`
      SELECT pgs.player_id, p.name, p.pro_team, r.manager_id, SUM(pgs.fantasy_points) as fantasy_points
      FROM player_game_scores pgs
      JOIN players p ON p.id = pgs.player_id
      LEFT JOIN roster_entries r ON r.player_id = pgs.player_id
      WHERE pgs.game_date = ?
      GROUP BY pgs.player_id
      ORDER BY fantasy_points DESC, pgs.player_id ASC
    `)
    .all(date);

  const top = scores[0];
  if (!top) return null;

  const games = db
    .prepare<[string], { count: number }>(`
      SELECT COUNT(DISTINCT game_id) as count FROM player_game_scores WHERE game_date = ?
    `)
    .get(date);

  const managerRow = db
    .prepare<[string], {
      manager_id: number;
      name: string;
      team_name: string;
      total_points: number;
      active_players_count: number;
    }>(`
      SELECT mds.manager_id, m.name, m.team_name, mds.total_points, mds.active_players_count
      FROM manager_daily_scores mds
      JOIN managers m ON m.id = mds.manager_id
      WHERE mds.game_date = ?
      ORDER BY mds.total_points DESC, mds.manager_id ASC
      LIMIT 1
    `)
    .get(date);

  return {
    gameDate: date,
    gamesPlayed: games?.count ?? 0,
    topScorer: {
      playerId: top.player_id,
      playerName: top.name,
      proTeam: top.pro_team,
      fantasyPoints: round2(top.fantasy_points),
    },
    managerOfDay: managerRow
      ? {
          managerId: managerRow.manager_id,
          managerName: managerRow.name,
          teamName: managerRow.team_name,
          totalPoints: managerRow.total_points,
          activePlayersCount: managerRow.active_players_count,
        }
      : null,
    biggestBenchMistake: findBiggestBenchMistake(date, scores),
  };
}

function findBiggestBenchMistake(date: string, scores: DayScoreRow[]): DailyRecap['biggestBenchMistake'] {
  const managers = new Map(getManagers().map((manager) => [manager.id, manager]));
  const activeByManager = new Map<number, Set<number>>();

  // scores are sorted best first, so the first benched scorer is the answer
  for (const score of scores) {
    if (score.manager_id === null) continue;
    const manager = managers.get(score.manager_id);
    if (!manager) continue;

    let active = activeByManager.get(manager.id);
    if (!active) {
      active = new Set(resolveLineup(manager.id, date).activePlayerIds);
      activeByManager.set(manager.id, active);
    }
    if (active.has(score.player_id)) continue;

    return {
      managerId: manager.id,
      managerName: manager.name,
      playerId: score.player_id,
      playerName: score.name,
      fantasyPoints: round2(score.fantasy_points),
    };
  }
  return null;
}

/**
 * Recaps for the most recent scored dates, newest first.
 */
export function getRecentRecaps(days = 3): DailyRecap[] {
  const dates = db
    .prepare<[number], { game_date: string }>(`
      SELECT DISTINCT game_date FROM player_game_scores ORDER BY game_date DESC LIMIT ?
    `)
    .all(days);

  const recaps: DailyRecap[] = [];
  for (const { game_date } of dates) {
    const recap = generateDailyRecap(game_date);
    if (recap) recaps.push(recap);
  }
  return recaps;
}
