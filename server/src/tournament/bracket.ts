import db from '../db';
import { LEAGUE_RULES } from '../config';
import { DataIntegrityError, StateError, ValidationError } from '../errors';
import { getManagerRoster } from '../draft/engine';
import { getManager, getPlayer, getTournamentRounds } from '../league/data';
import { round2 } from '../scoring/rules';
import { calculateStandings } from '../standings/aggregator';
import { TournamentNomination, TournamentRound } from '../types';

/**
 * One-on-one tournament
 * Each manager nominates one player; seeds follow the standings and each
 * round is won by the nominee with more fantasy points inside the round's
 * date window.
 */

// Seed pairs for the opening round; later rounds pair adjacent winners
const FIRST_ROUND_PAIRS: ReadonlyArray<readonly [number, number]> = [
  [1, 8],
  [4, 5],
  [2, 7],
  [3, 6],
];

const ROUND_NAMES = ['Quarterfinals', 'Semifinals', 'Final'] as const;

export interface BracketEntrant {
  seed: number;
  managerId: number;
  managerName: string;
  teamName: string;
  playerId: number;
  playerName: string;
}

export interface Matchup {
  matchupId: string;
  roundNumber: number;
  high: BracketEntrant | null;
  low: BracketEntrant | null;
  highPoints: number;
  lowPoints: number;
  winner: BracketEntrant | null;
}

export interface BracketRound {
  roundNumber: number;
  name: string;
  startDate: string | null;
  endDate: string | null;
  decided: boolean;
  matchups: Matchup[];
}

type Pairing = [BracketEntrant | null, BracketEntrant | null];

export type BracketStatus = 'pending' | 'in_progress' | 'complete';

export interface Bracket {
  status: BracketStatus;
  missingNominations: number;
  rounds: BracketRound[];
  champion: BracketEntrant | null;
}

interface NominationRow {
  manager_id: number;
  player_id: number;
  seed: number | null;
  nominated_at: string;
}

function toNomination(row: NominationRow): TournamentNomination {
  return {
    managerId: row.manager_id,
    playerId: row.player_id,
    seed: row.seed,
    nominatedAt: row.nominated_at,
  };
}

// ========== NOMINATIONS ==========

export function getNominations(): TournamentNomination[] {
  return db
    .prepare<[], NominationRow>(`
      SELECT manager_id, player_id, seed, nominated_at
      FROM tournament_nominations
      ORDER BY COALESCE(seed, 99) ASC, manager_id ASC
    `)
    .all()
    .map(toNomination);
}

export function nominateTournamentPlayer(
  managerId: number,
  playerId: number,
  now: Date = new Date()
): TournamentNomination {
  getManager(managerId);
  getPlayer(playerId);

  const existing = db
    .prepare<[number], { player_id: number }>('SELECT player_id FROM tournament_nominations WHERE manager_id = ?')
    .get(managerId);
  if (existing) {
    throw new StateError(`Manager ${managerId} has already nominated player ${existing.player_id}`);
  }

  if (!getManagerRoster(managerId).some((player) => player.id === playerId)) {
    throw new ValidationError(`Player ${playerId} is not on manager ${managerId}'s roster`);
  }

  const nominatedAt = now.toISOString();
  db.prepare(`
    INSERT INTO tournament_nominations (manager_id, player_id, seed, nominated_at)
    VALUES (?, ?, NULL, ?)
  `).run(managerId, playerId, nominatedAt);

  return { managerId, playerId, seed: null, nominatedAt };
}

function countManagers(): number {
  return db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM managers').get()?.count ?? 0;
}

// ========== BRACKET ==========

/**
 * Seed the nominees by current standings. Reports how many nominations are
 * still missing instead of failing; a bracket that is already seeded is
 * returned unchanged.
 */
export function generateBracket(): Bracket {
  const bracketSize = LEAGUE_RULES.tournamentBracketSize;
  if (countManagers() !== bracketSize) {
    throw new StateError(`Tournament needs exactly ${bracketSize} managers`);
  }

  const nominations = getNominations();
  if (nominations.length < bracketSize) {
    return pendingBracket(bracketSize - nominations.length);
  }
  if (nominations.every((nomination) => nomination.seed !== null)) {
    return getBracket();
  }

  const assignSeed = db.prepare('UPDATE tournament_nominations SET seed = ? WHERE manager_id = ?');
  const standings = calculateStandings();

  db.transaction(() => {
    db.prepare('UPDATE tournament_nominations SET seed = NULL').run();
    for (const entry of standings) {
      assignSeed.run(entry.rank, entry.managerId);
    }
  })();

  console.log('Tournament bracket seeded from standings');

  return getBracket();
}

function pendingBracket(missingNominations: number): Bracket {
  return { status: 'pending', missingNominations, rounds: [], champion: null };
}

function loadEntrants(): Map<number, BracketEntrant> {
  const rows = db
    .prepare<[], {
      seed: number;
      manager_id: number;
      manager_name: string;
      team_name: string;
      player_id: number;
      player_name: string;
    }>(`
      SELECT n.seed, n.manager_id, m.name as manager_name, m.team_name, n.player_id, p.name as player_name
      FROM tournament_nominations n
      JOIN managers m ON m.id = n.manager_id
      JOIN players p ON p.id = n.player_id
      WHERE n.seed IS NOT NULL
      ORDER BY n.seed ASC
    `)
    .all();

  const entrants = new Map<number, BracketEntrant>();
  for (const row of rows) {
    entrants.set(row.seed, {
      seed: row.seed,
      managerId: row.manager_id,
      managerName: row.manager_name,
      teamName: row.team_name,
      playerId: row.player_id,
      playerName: row.player_name,
    });
  }
  return entrants;
}

function pointsInWindow(playerId: number, window: TournamentRound | undefined): number {
  if (!window) return 0;
  const row = db
    .prepare<[number, string, string], { total: number | null }>(`
      SELECT SUM(fantasy_points) as total
      FROM player_game_scores
      WHERE player_id = ? AND game_date BETWEEN ? AND ?
    `)
    .get(playerId, window.startDate, window.endDate);
  return round2(row?.total ?? 0);
}

/**
 * A round is decided once it has games and every one of them has stats.
 */
function isWindowDecided(window: TournamentRound | undefined): boolean {
  if (!window) return false;
  const row = db
    .prepare<[string, string], { scheduled: number; scored: number }>(`
      SELECT
        COUNT(*) as scheduled,
        SUM(CASE WHEN EXISTS (SELECT 1 FROM game_stats gs WHERE gs.game_id = g.id) THEN 1 ELSE 0 END) as scored
      FROM games g
      WHERE g.game_date BETWEEN ? AND ?
    `)
    .get(window.startDate, window.endDate);
  if (!row || row.scheduled === 0) return false;
  return row.scored === row.scheduled;
}

function playMatchup(
  matchupId: string,
  roundNumber: number,
  first: BracketEntrant | null,
  second: BracketEntrant | null,
  window: TournamentRound | undefined,
  decided: boolean
): Matchup {
  // Better (lower-numbered) seed is always listed as high
  const [high, low] =
    first && second && second.seed < first.seed ? [second, first] : [first, second];

  const highPoints = high ? pointsInWindow(high.playerId, window) : 0;
  const lowPoints = low ? pointsInWindow(low.playerId, window) : 0;

  let winner: BracketEntrant | null = null;
  if (decided && high && low) {
    winner = lowPoints > highPoints ? low : high;
  }

  return { matchupId, roundNumber, high, low, highPoints, lowPoints, winner };
}

export function getBracket(): Bracket {
  const entrants = loadEntrants();
  const bracketSize = LEAGUE_RULES.tournamentBracketSize;

  if (entrants.size === 0) {
    return pendingBracket(bracketSize - getNominations().length);
  }
  if (entrants.size !== bracketSize) {
    throw new DataIntegrityError(`Bracket has ${entrants.size} seeded entrants, expected ${bracketSize}`);
  }

  const windows = new Map(getTournamentRounds().map((round) => [round.roundNumber, round]));
  const rounds: BracketRound[] = [];

  let previousWinners: Array<BracketEntrant | null> = [];

  ROUND_NAMES.forEach((name, index) => {
    const roundNumber = index + 1;
    const window = windows.get(roundNumber);
    const decided = isWindowDecided(window);

    const pairs: Pairing[] =
      roundNumber === 1
        ? FIRST_ROUND_PAIRS.map(([a, b]): Pairing => [entrants.get(a) ?? null, entrants.get(b) ?? null])
        : pairAdjacent(previousWinners);

    const prefix = roundNumber === 1 ? 'QF' : roundNumber === 2 ? 'SF' : 'F';
    const matchups = pairs.map(([first, second], matchIndex) =>
      playMatchup(`${prefix}${matchIndex + 1}`, roundNumber, first, second, window, decided)
    );

    rounds.push({
      roundNumber,
      name: window?.name ?? name,
      startDate: window?.startDate ?? null,
      endDate: window?.endDate ?? null,
      decided: decided && matchups.every((matchup) => matchup.winner !== null),
      matchups,
    });

    previousWinners = matchups.map((matchup) => matchup.winner);
  });

  const champion = previousWinners[0] ?? null;

  return {
    status: champion ? 'complete' : 'in_progress',
    missingNominations: 0,
    rounds,
    champion,
  };
}

function pairAdjacent(winners: Array<BracketEntrant | null>): Pairing[] {
  const pairs: Pairing[] = [];
  for (let i = 0; i < winners.length; i += 2) {
    pairs.push([winners[i] ?? null, winners[i + 1] ?? null]);
  }
  return pairs;
}
