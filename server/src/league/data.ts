import { z } from 'zod';
import db from '../db';
import { NotFoundError, StateError } from '../errors';
import { isLineupLocked } from '../lineups/resolver';
import { normalizeScoringPayload, setScoringConfig } from '../scoring/rules';
import { GameScheduleEntry, Manager, Player, PlayerStatus, TournamentRound } from '../types';

// ========== ROW MAPPING ==========

export interface PlayerRow {
  id: number;
  name: string;
  pro_team: string;
  status: PlayerStatus;
}

export interface ManagerRow {
  id: number;
  name: string;
  team_name: string;
}

export interface GameRow {
  id: number;
  game_date: string;
  start_time: string;
  home_team: string | null;
  away_team: string | null;
}

export function toPlayer(row: PlayerRow): Player {
  return { id: row.id, name: row.name, proTeam: row.pro_team, status: row.status };
}

export function toManager(row: ManagerRow): Manager {
  return { id: row.id, name: row.name, teamName: row.team_name };
}

export function toGame(row: GameRow): GameScheduleEntry {
  return {
    id: row.id,
    gameDate: row.game_date,
    startTime: row.start_time,
    homeTeam: row.home_team,
    awayTeam: row.away_team,
  };
}

// ========== PAYLOAD ==========

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');
const entityId = z.number().int().positive();

export const LeagueDataSchema = z.object({
  managers: z
    .array(z.object({ id: entityId, name: z.string().min(1), teamName: z.string().min(1) }))
    .optional(),
  players: z
    .array(
      z.object({
        id: entityId,
        name: z.string().min(1),
        proTeam: z.string().min(1),
        status: z.enum(['active', 'injured']).default('active'),
      })
    )
    .optional(),
  scoringConfig: z.unknown().optional(),
  schedule: z
    .array(
      z.object({
        id: entityId,
        gameDate: isoDate,
        startTime: z.string().datetime({ offset: true }),
        homeTeam: z.string().nullish(),
        awayTeam: z.string().nullish(),
      })
    )
    .optional(),
  tournamentRounds: z
    .array(
      z.object({
        roundNumber: z.number().int().min(1).max(3),
        name: z.string().min(1),
        startDate: isoDate,
        endDate: isoDate,
      })
    )
    .optional(),
});

export type LeagueDataInput = z.input<typeof LeagueDataSchema>;

export interface LeagueDataResult {
  managersUpserted: number;
  playersUpserted: number;
  scoringConfigLoaded: boolean;
  gamesUpserted: number;
  tournamentRoundsUpserted: number;
}

function draftHasStarted(): boolean {
  const row = db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM draft_settings').get();
  return (row?.count ?? 0) > 0;
}

type LeagueDataSchedule = NonNullable<z.output<typeof LeagueDataSchema>['schedule']>;

/**
 * Games that already have stats, or whose date has locked, keep their date
 * and start time. Moving them would shift scores between dates.
 */
function findFrozenScheduleChanges(schedule: LeagueDataSchedule, now: Date): string[] {
  const existing = db.prepare<[number], GameRow>(
    'SELECT id, game_date, start_time, home_team, away_team FROM games WHERE id = ?'
  );
  const batches = db.prepare<[number], { count: number }>(
    'SELECT COUNT(*) as count FROM stat_batches WHERE game_id = ?'
  );

  const problems: string[] = [];
  for (const game of schedule) {
    const row = existing.get(game.id);
    if (!row) continue;
    if (row.game_date === game.gameDate && row.start_time === game.startTime) continue;

    if ((batches.get(game.id)?.count ?? 0) > 0) {
      problems.push(`Game ${game.id} already has stats`);
    } else if (isLineupLocked(row.game_date, now)) {
      problems.push(`Game ${game.id} is on locked date ${row.game_date}`);
    }
  }
  return problems;
}

/**
 * Upsert the supplied league inputs. Any section may be omitted.
 */
export function loadLeagueData(payload: unknown, now: Date = new Date()): LeagueDataResult {
  const data = LeagueDataSchema.parse(payload);

  if ((data.managers || data.players) && draftHasStarted()) {
    throw new StateError('Managers and players are fixed once the draft has started');
  }

  const frozen = findFrozenScheduleChanges(data.schedule ?? [], now);
  if (frozen.length > 0) {
    throw new StateError('Schedule changes would rewrite scored or locked games', frozen);
  }

  const scoringWeights =
    data.scoringConfig === undefined ? null : normalizeScoringPayload(data.scoringConfig);

  const upsertManager = db.prepare(`
    INSERT INTO managers (id, name, team_name)
    VALUES (?, ?, ?)
    ON CONFLICT (id) DO UPDATE SET name = excluded.name, team_name = excluded.team_name
  `);
  const upsertPlayer = db.prepare(`
    INSERT INTO players (id, name, pro_team, status)
    VALUES (?, ?, ?, ?)
    ON CONFLICT (id) DO UPDATE SET
      name = excluded.name,
      pro_team = excluded.pro_team,
      status = excluded.status
  `);
  const upsertGame = db.prepare(`
    INSERT INTO games (id, game_date, start_time, home_team, away_team)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT (id) DO UPDATE SET
      game_date = excluded.game_date,
      start_time = excluded.start_time,
      home_team = excluded.home_team,
      away_team = excluded.away_team
  `);
  const upsertRound = db.prepare(`
    INSERT INTO tournament_rounds (round_number, name, start_date, end_date)
    VALUES (?, ?, ?, ?)
    ON CONFLICT (round_number) DO UPDATE SET
      name = excluded.name,
      start_date = excluded.start_date,
      end_date = excluded.end_date
  `);

  db.transaction(() => {
    for (const manager of data.managers ?? []) {
      upsertManager.run(manager.id, manager.name, manager.teamName);
    }
    for (const player of data.players ?? []) {
      upsertPlayer.run(player.id, player.name, player.proTeam, player.status);
    }
    if (scoringWeights) {
      setScoringConfig(scoringWeights);
    }
    for (const game of data.schedule ?? []) {
      upsertGame.run(game.id, game.gameDate, game.startTime, game.homeTeam ?? null, game.awayTeam ?? null);
    }
    for (const round of data.tournamentRounds ?? []) {
      upsertRound.run(round.roundNumber, round.name, round.startDate, round.endDate);
    }
  })();

  return {
    managersUpserted: data.managers?.length ?? 0,
    playersUpserted: data.players?.length ?? 0,
    scoringConfigLoaded: scoringWeights !== null,
    gamesUpserted: data.schedule?.length ?? 0,
    tournamentRoundsUpserted: data.tournamentRounds?.length ?? 0,
  };
}

// ========== READS ==========

export function getManagers(): Manager[] {
  return db
    .prepare<[], ManagerRow>('SELECT id, name, team_name FROM managers ORDER BY id ASC')
    .all()
    .map(toManager);
}

export function getManager(managerId: number): Manager {
  const row = db
    .prepare<[number], ManagerRow>('SELECT id, name, team_name FROM managers WHERE id = ?')
    .get(managerId);
  if (!row) {
    throw new NotFoundError(`Manager ${managerId} not found`);
  }
  return toManager(row);
}

export function getPlayer(playerId: number): Player {
  const row = db
    .prepare<[number], PlayerRow>('SELECT id, name, pro_team, status FROM players WHERE id = ?')
    .get(playerId);
  if (!row) {
    throw new NotFoundError(`Player ${playerId} not found`);
  }
  return toPlayer(row);
}

export function getSchedule(): GameScheduleEntry[] {
  return db
    .prepare<[], GameRow>(`
      SELECT id, game_date, start_time, home_team, away_team
      FROM games
      ORDER BY game_date ASC, start_time ASC, id ASC
    `)
    .all()
    .map(toGame);
}

export function getTournamentRounds(): TournamentRound[] {
  return db
    .prepare<[], { round_number: number; name: string; start_date: string; end_date: string }>(
      'SELECT round_number, name, start_date, end_date FROM tournament_rounds ORDER BY round_number ASC'
    )
    .all()
    .map((row) => ({
      roundNumber: row.round_number,
      name: row.name,
      startDate: row.start_date,
      endDate: row.end_date,
    }));
}

/**
 * Injury status only gates future lineup submissions; stored lineups are left alone.
 */
export function setPlayerStatus(playerId: number, status: PlayerStatus): Player {
  getPlayer(playerId);
  db.prepare('UPDATE players SET status = ? WHERE id = ?').run(status, playerId);
  console.log(`Player ${playerId} marked ${status}`);
  return getPlayer(playerId);
}
