import db from '../db';
import { LEAGUE_RULES } from '../config';
import { DataIntegrityError, NotFoundError, StateError, ValidationError } from '../errors';
import { Player } from '../types';
import { PlayerRow, toPlayer } from '../league/data';

/**
 * Snake draft engine.
 * Pick order reverses every other round:
 *   Round 1: Team1, Team2, Team3, Team4
 *   Round 2: Team4, Team3, Team2, Team1
 *   Round 3: Team1, Team2, Team3, Team4
 *
 * The pick log in draft_picks is the only stored state; everything else
 * (who is on the clock, completeness) is replayed from it.
 */

export interface DraftSlot {
  pickNumber: number;
  round: number;
  managerId: number;
}

export interface DraftPick extends DraftSlot {
  playerId: number;
  pickedAt: string;
}

export interface DraftState {
  managerIds: number[];
  rounds: number;
  totalPicks: number;
  picks: DraftPick[];
  /** Slot on the clock; null once the draft is complete */
  currentPick: DraftSlot | null;
  isComplete: boolean;
  draftedPlayerIds: number[];
}

export interface RecordedPick {
  playerId: number;
  pickedAt: string;
}

function assertManagerList(managerIds: number[], rounds: number): void {
  if (managerIds.length === 0) {
    throw new ValidationError('Draft needs at least one manager');
  }
  if (new Set(managerIds).size !== managerIds.length) {
    throw new ValidationError('Draft order repeats a manager');
  }
  if (!Number.isInteger(rounds) || rounds < 1) {
    throw new ValidationError('Draft rounds must be a positive integer');
  }
}

export function createSnakeOrder(managerIds: number[], rounds: number): DraftSlot[] {
  assertManagerList(managerIds, rounds);

  const slots: DraftSlot[] = [];
  for (let round = 1; round <= rounds; round++) {
    const order = round % 2 === 1 ? managerIds : [...managerIds].reverse();
    for (const managerId of order) {
      slots.push({ pickNumber: slots.length + 1, round, managerId });
    }
  }
  return slots;
}

/**
 * Rebuild the draft from the picks made so far, in pick order.
 */
export function replayDraft(managerIds: number[], rounds: number, picks: RecordedPick[]): DraftState {
  const slots = createSnakeOrder(managerIds, rounds);

  if (picks.length > slots.length) {
    throw new DataIntegrityError(`Draft log has ${picks.length} picks for ${slots.length} slots`);
  }

  const seen = new Set<number>();
  const replayed: DraftPick[] = picks.map((pick, index) => {
    if (seen.has(pick.playerId)) {
      throw new DataIntegrityError(`Player ${pick.playerId} was drafted twice`);
    }
    seen.add(pick.playerId);
    return { ...slots[index], playerId: pick.playerId, pickedAt: pick.pickedAt };
  });

  const isComplete = replayed.length === slots.length;

  return {
    managerIds: [...managerIds],
    rounds,
    totalPicks: slots.length,
    picks: replayed,
    currentPick: isComplete ? null : slots[replayed.length],
    isComplete,
    draftedPlayerIds: replayed.map((pick) => pick.playerId),
  };
}

// ========== PERSISTED DRAFT ==========

function loadDraftState(): DraftState | null {
  const settings = db
    .prepare<[string], { rounds: number }>('SELECT rounds FROM draft_settings WHERE id = ?')
    .get('default');
  if (!settings) return null;

  const managerIds = db
    .prepare<[], { manager_id: number }>('SELECT manager_id FROM draft_order ORDER BY position ASC')
    .all()
    .map((row) => row.manager_id);

  const picks = db
    .prepare<[], { player_id: number; picked_at: string }>(
      'SELECT player_id, picked_at FROM draft_picks ORDER BY pick_number ASC'
    )
    .all()
    .map((row) => ({ playerId: row.player_id, pickedAt: row.picked_at }));

  return replayDraft(managerIds, settings.rounds, picks);
}

export function getDraftState(): DraftState | null {
  return loadDraftState();
}

export function isDraftComplete(): boolean {
  return loadDraftState()?.isComplete ?? false;
}

function countPlayers(): number {
  return db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM players').get()?.count ?? 0;
}

export function startDraft(
  managerIds: number[],
  rounds: number = LEAGUE_RULES.draftRounds,
  now: Date = new Date()
): DraftState {
  assertManagerList(managerIds, rounds);

  const findManager = db.prepare<[number], { id: number }>('SELECT id FROM managers WHERE id = ?');
  for (const managerId of managerIds) {
    if (!findManager.get(managerId)) {
      throw new NotFoundError(`Manager ${managerId} not found`);
    }
  }

  const poolSize = countPlayers();
  const slotCount = managerIds.length * rounds;
  if (poolSize !== slotCount) {
    throw new ValidationError(
      `Player pool has ${poolSize} players; ${managerIds.length} managers x ${rounds} rounds needs exactly ${slotCount}`
    );
  }

  const pickCount = db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM draft_picks').get()?.count ?? 0;
  if (pickCount > 0) {
    throw new StateError('Draft already has picks and cannot be restarted');
  }

  const insertOrder = db.prepare('INSERT INTO draft_order (position, manager_id) VALUES (?, ?)');

  db.transaction(() => {
    db.prepare('DELETE FROM draft_order').run();
    db.prepare(`
      INSERT INTO draft_settings (id, rounds, started_at)
      VALUES ('default', ?, ?)
      ON CONFLICT (id) DO UPDATE SET rounds = excluded.rounds, started_at = excluded.started_at
    `).run(rounds, now.toISOString());

    managerIds.forEach((managerId, index) => {
      insertOrder.run(index + 1, managerId);
    });
  })();

  console.log(`Draft started: ${managerIds.length} managers, ${rounds} rounds`);

  return replayDraft(managerIds, rounds, []);
}

function createRosterEntries(acquiredAt: string): void {
  db.prepare(`
    INSERT INTO roster_entries (player_id, manager_id, acquired_at)
    SELECT player_id, manager_id, ? FROM draft_picks
  `).run(acquiredAt);

  assertRosterPartition();
}

export function makeDraftPick(playerId: number, now: Date = new Date()): DraftPick {
  const state = loadDraftState();
  if (!state) {
    throw new StateError('Draft has not been started');
  }
  if (state.isComplete || !state.currentPick) {
    throw new StateError('Draft is already complete');
  }

  const player = db.prepare<[number], { id: number }>('SELECT id FROM players WHERE id = ?').get(playerId);
  if (!player) {
    throw new NotFoundError(`Player ${playerId} not found`);
  }
  if (state.draftedPlayerIds.includes(playerId)) {
    throw new ValidationError(`Player ${playerId} has already been drafted`);
  }

  const slot = state.currentPick;
  const pickedAt = now.toISOString();

  db.transaction(() => {
    db.prepare(`
      INSERT INTO draft_picks (pick_number, round, manager_id, player_id, picked_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(slot.pickNumber, slot.round, slot.managerId, playerId, pickedAt);

    if (slot.pickNumber === state.totalPicks) {
      createRosterEntries(pickedAt);
    }
  })();

  if (slot.pickNumber === state.totalPicks) {
    console.log('Draft complete: rosters created');
  }

  return { ...slot, playerId, pickedAt };
}

/**
 * Start the draft and make every pick in one transaction.
 * playerIds are taken in pick order.
 */
export function executeDraft(
  managerIds: number[],
  rounds: number,
  playerIds: number[],
  now: Date = new Date()
): DraftState {
  const slotCount = managerIds.length * rounds;
  if (playerIds.length !== slotCount) {
    throw new ValidationError(`Expected ${slotCount} player ids in pick order, got ${playerIds.length}`);
  }

  db.transaction(() => {
    startDraft(managerIds, rounds, now);
    for (const playerId of playerIds) {
      makeDraftPick(playerId, now);
    }
  })();

  const state = loadDraftState();
  if (!state) {
    throw new DataIntegrityError('Draft settings missing after execution');
  }
  return state;
}

export function getAvailablePlayers(): Player[] {
  return db
    .prepare<[], PlayerRow>(`
      SELECT p.id, p.name, p.pro_team, p.status
      FROM players p
      WHERE p.id NOT IN (SELECT player_id FROM draft_picks)
      ORDER BY p.id ASC
    `)
    .all()
    .map(toPlayer);
}

export function getManagerRoster(managerId: number): Player[] {
  const manager = db.prepare<[number], { id: number }>('SELECT id FROM managers WHERE id = ?').get(managerId);
  if (!manager) {
    throw new NotFoundError(`Manager ${managerId} not found`);
  }

  return db
    .prepare<[number], PlayerRow>(`
      SELECT p.id, p.name, p.pro_team, p.status
      FROM roster_entries r
      JOIN players p ON p.id = r.player_id
      WHERE r.manager_id = ?
      ORDER BY p.id ASC
    `)
    .all(managerId)
    .map(toPlayer);
}

/**
 * Every player belongs to exactly one roster once the draft is done.
 */
export function assertRosterPartition(): void {
  const unassigned = db
    .prepare<[], { id: number }>(`
      SELECT id FROM players WHERE id NOT IN (SELECT player_id FROM roster_entries) ORDER BY id
    `)
    .all();

  if (unassigned.length > 0) {
    throw new DataIntegrityError(
      'Rosters do not cover the player pool',
      unassigned.map((row) => `Player ${row.id} is on no roster`)
    );
  }
}
