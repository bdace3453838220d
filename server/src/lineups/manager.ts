import { v4 as uuidv4 } from 'uuid';
import db from '../db';
import { LEAGUE_RULES } from '../config';
import { StateError, ValidationError } from '../errors';
import { getManagerRoster, isDraftComplete } from '../draft/engine';
import { getManager } from '../league/data';
import { refreshManagerScoresFrom } from '../scoring/engine';
import { refreshStandings } from '../standings/aggregator';
import { LineupSlotStatus, LineupState, Player, ResolvedLineup } from '../types';
import {
  assertSeasonDate,
  findLockedInheritingDate,
  getLineupState,
  getLockThreshold,
  getTimeUntilLock,
  isLineupLocked,
  resolveLineup,
} from './resolver';

export interface LineupSubmissionResult {
  submissionId: string;
  lineup: ResolvedLineup;
  managerScoresUpdated: number;
}

export interface LineupView {
  lineup: ResolvedLineup;
  state: LineupState;
  locked: boolean;
  lockThreshold: string | null;
  msUntilLock: number | null;
  roster: Array<Player & { slot: LineupSlotStatus }>;
}

/**
 * Set the manager's active players for a date. Replaces any earlier explicit
 * lineup for the same date until the date locks, or until a later date that
 * would inherit it locks.
 */
export function submitLineup(
  managerId: number,
  date: string,
  playerIds: number[],
  now: Date = new Date()
): LineupSubmissionResult {
  getManager(managerId);
  assertSeasonDate(date);

  if (isLineupLocked(date, now)) {
    throw new StateError(`Lineup for ${date} is locked`);
  }
  const lockedLater = findLockedInheritingDate(managerId, date, now);
  if (lockedLater) {
    throw new StateError(`Lineup for ${date} would change the locked lineup for ${lockedLater}`);
  }
  if (!isDraftComplete()) {
    throw new StateError('Lineups open once the draft is complete');
  }

  const roster = getManagerRoster(managerId);
  const rosterById = new Map(roster.map((player) => [player.id, player]));
  const problems: string[] = [];

  if (playerIds.length !== LEAGUE_RULES.activePlayersPerDay) {
    problems.push(`Select exactly ${LEAGUE_RULES.activePlayersPerDay} players (got ${playerIds.length})`);
  }
  if (new Set(playerIds).size !== playerIds.length) {
    problems.push('Each player can only be selected once');
  }
  for (const playerId of playerIds) {
    const player = rosterById.get(playerId);
    if (!player) {
      problems.push(`Player ${playerId} is not on this roster`);
    } else if (player.status === 'injured') {
      problems.push(`Player ${playerId} (${player.name}) is injured`);
    }
  }

  if (problems.length > 0) {
    throw new ValidationError('Invalid lineup', problems);
  }

  const submittedAt = now.toISOString();
  const submissionId = uuidv4();
  const active = new Set(playerIds);

  const insertEntry = db.prepare(`
    INSERT INTO lineup_entries (manager_id, game_date, player_id, status, submitted_at)
    VALUES (?, ?, ?, ?, ?)
  `);

  const managerScoresUpdated = db.transaction(() => {
    db.prepare('DELETE FROM lineup_entries WHERE manager_id = ? AND game_date = ?').run(managerId, date);
    for (const player of roster) {
      insertEntry.run(managerId, date, player.id, active.has(player.id) ? 'active' : 'bench', submittedAt);
    }

    db.prepare(`
      INSERT INTO lineup_submissions (id, manager_id, game_date, active_player_ids, submitted_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(submissionId, managerId, date, JSON.stringify([...playerIds].sort((a, b) => a - b)), submittedAt);

    const updated = refreshManagerScoresFrom(managerId, date);
    refreshStandings(now);
    return updated;
  })();

  return {
    submissionId,
    lineup: resolveLineup(managerId, date),
    managerScoresUpdated,
  };
}

export function getLineupView(managerId: number, date: string, now: Date = new Date()): LineupView {
  getManager(managerId);
  assertSeasonDate(date);

  const lineup = resolveLineup(managerId, date);
  const active = new Set(lineup.activePlayerIds);
  const threshold = getLockThreshold(date);

  return {
    lineup,
    state: getLineupState(managerId, date, now),
    locked: isLineupLocked(date, now),
    lockThreshold: threshold ? threshold.toISOString() : null,
    msUntilLock: getTimeUntilLock(date, now),
    roster: getManagerRoster(managerId).map((player): Player & { slot: LineupSlotStatus } => ({
      ...player,
      slot: active.has(player.id) ? 'active' : 'bench',
    })),
  };
}

export function getLineupHistory(managerId: number): Array<{
  id: string;
  date: string;
  activePlayerIds: number[];
  submittedAt: string;
}> {
  getManager(managerId);
  return db
    .prepare<[number], { id: string; game_date: string; active_player_ids: string; submitted_at: string }>(`
      SELECT id, game_date, active_player_ids, submitted_at
      FROM lineup_submissions
      WHERE manager_id = ?
      ORDER BY seq ASC
    `)
    .all(managerId)
    .map((row) => ({
      id: row.id,
      date: row.game_date,
      activePlayerIds: parseIdList(row.active_player_ids),
      submittedAt: row.submitted_at,
    }));
}

function parseIdList(json: string): number[] {
  const value: unknown = JSON.parse(json);
  if (!Array.isArray(value)) return [];
  return value.filter((id): id is number => typeof id === 'number');
}
