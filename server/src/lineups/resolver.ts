import db from '../db';
import { LEAGUE_RULES } from '../config';
import { DataIntegrityError, NotFoundError, ValidationError } from '../errors';
import { LineupEntry, LineupSlotStatus, LineupState, ResolvedLineup } from '../types';

// ========== CALENDAR ==========

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isCalendarDate(date: string): boolean {
  if (!DATE_PATTERN.test(date)) return false;
  const parsed = new Date(`${date}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === date;
}

export function isSeasonDate(date: string): boolean {
  return isCalendarDate(date) && date >= LEAGUE_RULES.seasonStart && date <= LEAGUE_RULES.seasonEnd;
}

export function assertSeasonDate(date: string): void {
  if (!isSeasonDate(date)) {
    throw new ValidationError(
      `${date} is not a season date (${LEAGUE_RULES.seasonStart} to ${LEAGUE_RULES.seasonEnd})`
    );
  }
}

// ========== LINEUP LOCKING LOGIC ==========

/**
 * Earliest scheduled start on the date. A date without games has no threshold
 * and never locks.
 */
export function getLockThreshold(date: string): Date | null {
  const starts = db
    .prepare<[string], { start_time: string }>('SELECT start_time FROM games WHERE game_date = ?')
    .all(date)
    .map((row) => new Date(row.start_time).getTime())
    .filter((time) => !Number.isNaN(time));

  if (starts.length === 0) return null;
  return new Date(Math.min(...starts));
}

export function isLineupLocked(date: string, now: Date = new Date()): boolean {
  const threshold = getLockThreshold(date);
  return threshold !== null && now.getTime() >= threshold.getTime();
}

/**
 * Milliseconds until the date locks: 0 once locked, null if it never locks.
 */
export function getTimeUntilLock(date: string, now: Date = new Date()): number | null {
  const threshold = getLockThreshold(date);
  if (!threshold) return null;
  return Math.max(0, threshold.getTime() - now.getTime());
}

/**
 * Earliest locked date after `date` that would take its lineup from `date`,
 * i.e. one with no explicit lineup of its own in between. Null when none.
 */
export function findLockedInheritingDate(managerId: number, date: string, now: Date = new Date()): string | null {
  const next = db
    .prepare<[number, string], { next_date: string | null }>(`
      SELECT MIN(game_date) as next_date FROM lineup_entries WHERE manager_id = ? AND game_date > ?
    `)
    .get(managerId, date);
  const until = next?.next_date ?? null;

  const games = db
    .prepare<[string, string], { game_date: string; start_time: string }>(`
      SELECT game_date, start_time FROM games
      WHERE game_date > ? AND game_date <= ?
      ORDER BY game_date ASC, start_time ASC
    `)
    .all(date, LEAGUE_RULES.seasonEnd);

  for (const game of games) {
    if (until !== null && game.game_date >= until) break;
    const start = new Date(game.start_time).getTime();
    if (!Number.isNaN(start) && now.getTime() >= start) return game.game_date;
  }
  return null;
}

// ========== EXPLICIT LINEUPS ==========

function assertManagerExists(managerId: number): void {
  const row = db.prepare<[number], { id: number }>('SELECT id FROM managers WHERE id = ?').get(managerId);
  if (!row) {
    throw new NotFoundError(`Manager ${managerId} not found`);
  }
}

export function getExplicitLineup(managerId: number, date: string): LineupEntry[] | null {
  const rows = db
    .prepare<[number, string], { player_id: number; status: LineupSlotStatus }>(`
      SELECT player_id, status
      FROM lineup_entries
      WHERE manager_id = ? AND game_date = ?
      ORDER BY player_id ASC
    `)
    .all(managerId, date);

  if (rows.length === 0) return null;
  return rows.map((row) => ({ playerId: row.player_id, status: row.status }));
}

function activeIdsOf(managerId: number, date: string, entries: LineupEntry[]): number[] {
  const active = entries.filter((entry) => entry.status === 'active').map((entry) => entry.playerId);
  if (active.length !== LEAGUE_RULES.activePlayersPerDay) {
    throw new DataIntegrityError(
      `Stored lineup for manager ${managerId} on ${date} has ${active.length} active players`
    );
  }
  return active;
}

export function getLineupState(managerId: number, date: string, now: Date = new Date()): LineupState {
  if (isLineupLocked(date, now)) return 'LOCKED';
  return getExplicitLineup(managerId, date) ? 'SET' : 'UNSET';
}

// ========== RESOLUTION ==========

function getDefaultActiveIds(managerId: number): number[] {
  return db
    .prepare<[number, number], { player_id: number }>(`
      SELECT player_id FROM roster_entries
      WHERE manager_id = ?
      ORDER BY player_id ASC
      LIMIT ?
    `)
    .all(managerId, LEAGUE_RULES.activePlayersPerDay)
    .map((row) => row.player_id);
}

/**
 * The lineup that counts for the manager on the date: the explicit one, else
 * the nearest earlier in-season explicit one, else the lowest-id roster players.
 * Read-only; nothing resolved here is written back.
 */
export function resolveLineup(managerId: number, date: string): ResolvedLineup {
  assertManagerExists(managerId);

  const explicit = getExplicitLineup(managerId, date);
  if (explicit) {
    return {
      managerId,
      date,
      activePlayerIds: activeIdsOf(managerId, date, explicit),
      provenance: 'Explicit',
      sourceDate: date,
    };
  }

  const previous = db
    .prepare<[number, string, string], { source_date: string | null }>(`
      SELECT MAX(game_date) as source_date
      FROM lineup_entries
      WHERE manager_id = ? AND game_date < ? AND game_date >= ?
    `)
    .get(managerId, date, LEAGUE_RULES.seasonStart);

  if (previous?.source_date) {
    const sourceDate = previous.source_date;
    const inherited = getExplicitLineup(managerId, sourceDate);
    if (!inherited) {
      throw new DataIntegrityError(`Lineup for manager ${managerId} on ${sourceDate} disappeared during resolution`);
    }
    return {
      managerId,
      date,
      activePlayerIds: activeIdsOf(managerId, sourceDate, inherited),
      provenance: 'Inherited',
      sourceDate,
    };
  }

  return {
    managerId,
    date,
    activePlayerIds: getDefaultActiveIds(managerId),
    provenance: 'Default',
    sourceDate: null,
  };
}
