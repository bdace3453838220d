import db from '../db';
import { getDraftState } from '../draft/engine';
import { getManagers } from '../league/data';
import { resolveLineup } from '../lineups/resolver';
import { round2 } from '../scoring/rules';
import { calculateStandings } from '../standings/aggregator';
import { Manager, StandingsEntry } from '../types';

// Fewest scored days before a manager counts for the consistency award
export const MIN_CONSISTENCY_DAYS = 10;

export interface ManagerAward {
  managerId: number;
  managerName: string;
  teamName: string;
}

export interface DraftAward extends ManagerAward {
  playerId: number;
  playerName: string;
  pickNumber: number;
  round: number;
  totalPoints: number;
}

export interface SeasonRecap {
  standings: StandingsEntry[];
  champion: ManagerAward & { totalPoints: number };
  lastPlace: ManagerAward & { totalPoints: number };
  bestSingleDay: ManagerAward & { gameDate: string; totalPoints: number };
  mostConsistent: (ManagerAward & { avgPoints: number; stdDev: number; days: number }) | null;
  bestDraftSteal: (DraftAward & { value: number }) | null;
  biggestBust: DraftAward | null;
  biggestBenchSitter: (ManagerAward & { benchPoints: number }) | null;
  bestLineupManager: (ManagerAward & { efficiency: number; activePoints: number; benchPoints: number }) | null;
  progression: Array<ManagerAward & {
    days: Array<{ gameDate: string; totalPoints: number; cumulativePoints: number }>;
  }>;
  carryMe: Array<ManagerAward & {
    playerId: number;
    playerName: string;
    playerPoints: number;
    rosterPoints: number;
    share: number;
  }>;
}

interface DailyRow {
  manager_id: number;
  game_date: string;
  total_points: number;
}

interface PlayerTotalRow {
  player_id: number;
  name: string;
  total_points: number;
}

function awardFor(manager: Manager): ManagerAward {
  return { managerId: manager.id, managerName: manager.name, teamName: manager.teamName };
}

function sampleStdDev(values: number[]): number {
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const squares = values.reduce((sum, value) => sum + (value - mean) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

/**
 * End-of-season summary: final table, awards, cumulative progression and how
 * much each team leaned on its best player. Null until anyone has scored.
 */
export function generateSeasonRecap(): SeasonRecap | null {
  const daily = db
    .prepare<[], DailyRow>(`
      SELECT manager_id, game_date, total_points
      FROM manager_daily_scores
      ORDER BY manager_id ASC, game_date ASC
    `)
    .all();
  if (daily.length === 0) return null;

  const managers = getManagers();
  const byId = new Map(managers.map((manager) => [manager.id, manager]));
  const managerAward = (managerId: number): ManagerAward => {
    const manager = byId.get(managerId);
    return manager ? awardFor(manager) : { managerId, managerName: `Manager ${managerId}`, teamName: '' };
  };

  const standings = calculateStandings();
  const first = standings[0];
  const last = standings[standings.length - 1];

  const best = [...daily].sort(
    (a, b) =>
      b.total_points - a.total_points ||
      a.game_date.localeCompare(b.game_date) ||
      a.manager_id - b.manager_id
  )[0];
  if (!first || !last || !best) return null;

  const playerTotals = new Map(
    db
      .prepare<[], PlayerTotalRow>(`
        SELECT p.id as player_id, p.name, COALESCE(SUM(pgs.fantasy_points), 0) as total_points
        FROM players p
        LEFT JOIN player_game_scores pgs ON pgs.player_id = p.id
        GROUP BY p.id
      `)
      .all()
      .map((row) => [row.player_id, { name: row.name, totalPoints: round2(row.total_points) }])
  );

  const lineupPoints = computeLineupPoints();

  return {
    standings,
    champion: { ...managerAward(first.managerId), totalPoints: first.totalPoints },
    lastPlace: { ...managerAward(last.managerId), totalPoints: last.totalPoints },
    bestSingleDay: { ...managerAward(best.manager_id), gameDate: best.game_date, totalPoints: best.total_points },
    mostConsistent: findMostConsistent(daily, managerAward),
    ...findDraftAwards(playerTotals, managerAward),
    ...findLineupAwards(lineupPoints, managerAward),
    progression: buildProgression(managers, daily),
    carryMe: buildCarryMe(managers, playerTotals),
  };
}

function findMostConsistent(
  daily: DailyRow[],
  managerAward: (managerId: number) => ManagerAward
): SeasonRecap['mostConsistent'] {
  const pointsByManager = new Map<number, number[]>();
  for (const row of daily) {
    const points = pointsByManager.get(row.manager_id) ?? [];
    points.push(row.total_points);
    pointsByManager.set(row.manager_id, points);
  }

  let winner: SeasonRecap['mostConsistent'] = null;
  let winnerStdDev = Infinity;
  for (const [managerId, points] of [...pointsByManager].sort((a, b) => a[0] - b[0])) {
    if (points.length < MIN_CONSISTENCY_DAYS) continue;
    const stdDev = sampleStdDev(points);
    if (stdDev >= winnerStdDev) continue;

    winnerStdDev = stdDev;
    winner = {
      ...managerAward(managerId),
      avgPoints: round2(points.reduce((sum, value) => sum + value, 0) / points.length),
      stdDev: round2(stdDev),
      days: points.length,
    };
  }
  return winner;
}

function findDraftAwards(
  playerTotals: Map<number, { name: string; totalPoints: number }>,
  managerAward: (managerId: number) => ManagerAward
): Pick<SeasonRecap, 'bestDraftSteal' | 'biggestBust'> {
  const picks = getDraftState()?.picks ?? [];
  if (picks.length === 0) return { bestDraftSteal: null, biggestBust: null };

  const maxPick = Math.max(...picks.map((pick) => pick.pickNumber));
  const drafted: DraftAward[] = picks.map((pick) => {
    const player = playerTotals.get(pick.playerId);
    return {
      ...managerAward(pick.managerId),
      playerId: pick.playerId,
      playerName: player?.name ?? `Player ${pick.playerId}`,
      pickNumber: pick.pickNumber,
      round: pick.round,
      totalPoints: player?.totalPoints ?? 0,
    };
  });

  // Later picks weigh more; ties go to the earlier pick
  let steal: (DraftAward & { value: number }) | null = null;
  for (const pick of drafted) {
    const value = (pick.totalPoints * pick.pickNumber) / maxPick;
    if (steal === null || value > steal.value) {
      steal = { ...pick, value };
    }
  }

  let bust: DraftAward | null = null;
  for (const pick of drafted) {
    if (pick.round !== 1) continue;
    if (bust === null || pick.totalPoints < bust.totalPoints) {
      bust = pick;
    }
  }

  return {
    bestDraftSteal: steal ? { ...steal, value: round2(steal.value) } : null,
    biggestBust: bust,
  };
}

/**
 * Points each manager's roster produced from the active slots and from the
 * bench, judged against the resolved lineup of every scored date.
 */
function computeLineupPoints(): Map<number, { active: number; bench: number }> {
  const rows = db
    .prepare<[], { manager_id: number; game_date: string; player_id: number; fantasy_points: number }>(`
      SELECT r.manager_id, pgs.game_date, pgs.player_id, SUM(pgs.fantasy_points) as fantasy_points
      FROM player_game_scores pgs
      JOIN roster_entries r ON r.player_id = pgs.player_id
      GROUP BY r.manager_id, pgs.game_date, pgs.player_id
      ORDER BY r.manager_id ASC, pgs.game_date ASC, pgs.player_id ASC
    `)
    .all();

  const totals = new Map<number, { active: number; bench: number }>();
  const lineups = new Map<string, Set<number>>();

  for (const row of rows) {
    const key = `${row.manager_id}:${row.game_date}`;
    let active = lineups.get(key);
    if (!active) {
      active = new Set(resolveLineup(row.manager_id, row.game_date).activePlayerIds);
      lineups.set(key, active);
    }

    const entry = totals.get(row.manager_id) ?? { active: 0, bench: 0 };
    if (active.has(row.player_id)) {
      entry.active += row.fantasy_points;
    } else {
      entry.bench += row.fantasy_points;
    }
    totals.set(row.manager_id, entry);
  }
  return totals;
}

function findLineupAwards(
  lineupPoints: Map<number, { active: number; bench: number }>,
  managerAward: (managerId: number) => ManagerAward
): Pick<SeasonRecap, 'biggestBenchSitter' | 'bestLineupManager'> {
  let benchSitter: SeasonRecap['biggestBenchSitter'] = null;
  let lineupManager: SeasonRecap['bestLineupManager'] = null;
  let bestEfficiency = -1;

  for (const [managerId, { active, bench }] of [...lineupPoints].sort((a, b) => a[0] - b[0])) {
    const benchPoints = round2(bench);
    if (benchPoints > 0 && (benchSitter === null || benchPoints > benchSitter.benchPoints)) {
      benchSitter = { ...managerAward(managerId), benchPoints };
    }

    const available = active + bench;
    if (available <= 0) continue;
    const efficiency = (active / available) * 100;
    if (efficiency > bestEfficiency) {
      bestEfficiency = efficiency;
      lineupManager = {
        ...managerAward(managerId),
        efficiency: round2(efficiency),
        activePoints: round2(active),
        benchPoints,
      };
    }
  }

  return { biggestBenchSitter: benchSitter, bestLineupManager: lineupManager };
}

function buildProgression(managers: Manager[], daily: DailyRow[]): SeasonRecap['progression'] {
  return managers.map((manager) => {
    let cumulative = 0;
    const days = daily
      .filter((row) => row.manager_id === manager.id)
      .map((row) => {
        cumulative += row.total_points;
        return { gameDate: row.game_date, totalPoints: row.total_points, cumulativePoints: round2(cumulative) };
      });
    return { ...awardFor(manager), days };
  });
}

function buildCarryMe(
  managers: Manager[],
  playerTotals: Map<number, { name: string; totalPoints: number }>
): SeasonRecap['carryMe'] {
  const rosters = db
    .prepare<[], { manager_id: number; player_id: number }>(
      'SELECT manager_id, player_id FROM roster_entries ORDER BY manager_id ASC, player_id ASC'
    )
    .all();

  const rows: SeasonRecap['carryMe'] = [];
  for (const manager of managers) {
    const roster = rosters
      .filter((entry) => entry.manager_id === manager.id)
      .map((entry) => ({
        playerId: entry.player_id,
        playerName: playerTotals.get(entry.player_id)?.name ?? `Player ${entry.player_id}`,
        points: playerTotals.get(entry.player_id)?.totalPoints ?? 0,
      }));
    if (roster.length === 0) continue;

    let top = roster[0];
    for (const player of roster) {
      if (player.points > top.points) top = player;
    }
    const rosterPoints = round2(roster.reduce((sum, player) => sum + player.points, 0));

    rows.push({
      ...awardFor(manager),
      playerId: top.playerId,
      playerName: top.playerName,
      playerPoints: top.points,
      rosterPoints,
      share: round2((top.points / (rosterPoints === 0 ? 1 : rosterPoints)) * 100),
    });
  }

  return rows.sort((a, b) => b.share - a.share || a.managerId - b.managerId);
}
