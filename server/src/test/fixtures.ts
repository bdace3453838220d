import { initializeDatabase } from '../db';
import { LeagueError } from '../errors';
import { executeDraft } from '../draft/engine';
import { LeagueDataInput, loadLeagueData } from '../league/data';
import { wipeLeagueData } from '../seed/runSeed';

export const MANAGER_IDS = [1, 2, 3, 4, 5, 6, 7, 8];
export const PLAYER_IDS = Array.from({ length: 48 }, (_, index) => index + 1);

export const TEST_WEIGHTS = {
  '1PT_MADE': 1,
  '2PT_MADE': 2.5,
  'FT_MADE': 1,
  'REB': 1.2,
  'AST': 1,
  'STL': 2,
  'BLK': 2,
  'TOV': -1,
  'PF': -0.5,
  'GAME_WINNER': 1.5,
  'DUNK': 0.5,
};

// Game ids by date. 2026-01-07 has no games.
export const GAMES = {
  jan5Late: 1,
  jan5Early: 2,
  jan6: 3,
  jan8: 4,
  quarterfinal: 5,
  semifinal: 6,
  final: 7,
};

export const DRAFT_TIME = new Date('2026-01-01T12:00:00Z');

export function testLeague(): LeagueDataInput {
  return {
    managers: MANAGER_IDS.map((id) => ({ id, name: `Manager ${id}`, teamName: `Team ${id}` })),
    players: PLAYER_IDS.map((id) => ({ id, name: `Player ${id}`, proTeam: `Club ${(id % 4) + 1}` })),
    scoringConfig: TEST_WEIGHTS,
    schedule: [
      { id: 1, gameDate: '2026-01-05', startTime: '2026-01-05T21:00:00Z' },
      { id: 2, gameDate: '2026-01-05', startTime: '2026-01-05T19:00:00Z' },
      { id: 3, gameDate: '2026-01-06', startTime: '2026-01-06T19:00:00Z' },
      { id: 4, gameDate: '2026-01-08', startTime: '2026-01-08T19:00:00Z' },
      { id: 5, gameDate: '2026-02-16', startTime: '2026-02-16T19:00:00Z' },
      { id: 6, gameDate: '2026-02-20', startTime: '2026-02-20T19:00:00Z' },
      { id: 7, gameDate: '2026-02-24', startTime: '2026-02-24T19:00:00Z' },
    ],
    tournamentRounds: [
      { roundNumber: 1, name: 'Quarterfinals', startDate: '2026-02-16', endDate: '2026-02-17' },
      { roundNumber: 2, name: 'Semifinals', startDate: '2026-02-20', endDate: '2026-02-21' },
      { roundNumber: 3, name: 'Final', startDate: '2026-02-24', endDate: '2026-02-25' },
    ],
  };
}

/**
 * Fresh league with 8 managers, 48 players, weights and schedule; no draft yet.
 */
export function resetLeague(): void {
  initializeDatabase();
  wipeLeagueData();
  loadLeagueData(testLeague());
}

/**
 * Snake draft taking players 1..48 in order. Resulting rosters:
 *   manager 1: 1, 16, 17, 32, 33, 48
 *   manager 2: 2, 15, 18, 31, 34, 47
 *   manager 8: 8, 9, 24, 25, 40, 41
 */
export function draftLeague(): void {
  executeDraft(MANAGER_IDS, 6, PLAYER_IDS, DRAFT_TIME);
}

export function catchLeagueError(fn: () => unknown): LeagueError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LeagueError) return err;
    throw err;
  }
  throw new Error('Expected a LeagueError to be thrown');
}
