import { beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError, StateError, ValidationError } from '../errors';
import { ingestGameStats } from '../ingest/stats';
import { loadLeagueData } from '../league/data';
import { GAMES, MANAGER_IDS, draftLeague, resetLeague } from '../test/fixtures';
import { Bracket, generateBracket, getBracket, getNominations, nominateTournamentPlayer } from './bracket';

const NOMINATION_TIME = new Date('2026-02-10T12:00:00Z');

function nominateAll(): void {
  // Each manager's first-round pick
  for (const managerId of MANAGER_IDS) {
    nominateTournamentPlayer(managerId, managerId, NOMINATION_TIME);
  }
}

function assists(entries: Array<[number, number]>) {
  return entries.map(([playerId, AST]) => ({ playerId, AST }));
}

function summarize(bracket: Bracket) {
  return bracket.rounds.map((round) =>
    round.matchups.map((matchup) => ({
      id: matchup.matchupId,
      high: matchup.high?.seed ?? null,
      low: matchup.low?.seed ?? null,
      points: [matchup.highPoints, matchup.lowPoints],
      winner: matchup.winner?.seed ?? null,
    }))
  );
}

describe('tournament nominations', () => {
  beforeEach(() => {
    resetLeague();
    draftLeague();
  });

  it('records one nomination per manager', () => {
    const nomination = nominateTournamentPlayer(1, 16, NOMINATION_TIME);

    expect(nomination).toEqual({ managerId: 1, playerId: 16, seed: null, nominatedAt: NOMINATION_TIME.toISOString() });
    expect(() => nominateTournamentPlayer(1, 17, NOMINATION_TIME)).toThrow(StateError);
    expect(getNominations()).toHaveLength(1);
  });

  it('only accepts players from the manager roster', () => {
    expect(() => nominateTournamentPlayer(1, 2, NOMINATION_TIME)).toThrow(ValidationError);
    expect(() => nominateTournamentPlayer(99, 1, NOMINATION_TIME)).toThrow(NotFoundError);
    expect(() => nominateTournamentPlayer(1, 999, NOMINATION_TIME)).toThrow(NotFoundError);
  });
});

describe('generateBracket', () => {
  beforeEach(() => {
    resetLeague();
    draftLeague();
  });

  it('waits for every manager to nominate', () => {
    nominateTournamentPlayer(1, 1, NOMINATION_TIME);
    nominateTournamentPlayer(2, 2, NOMINATION_TIME);
    nominateTournamentPlayer(3, 3, NOMINATION_TIME);

    expect(generateBracket()).toEqual({ status: 'pending', missingNominations: 5, rounds: [], champion: null });
  });

  it('seeds by standings and pairs 1-8, 4-5, 2-7, 3-6', () => {
    ingestGameStats(GAMES.jan5Late, assists([[3, 5]]));
    nominateAll();

    const bracket = generateBracket();

    expect(bracket.status).toBe('in_progress');
    expect(getNominations().map((nomination) => [nomination.seed, nomination.managerId])).toEqual([
      [1, 3],
      [2, 1],
      [3, 2],
      [4, 4],
      [5, 5],
      [6, 6],
      [7, 7],
      [8, 8],
    ]);
    expect(bracket.rounds[0].matchups.map((matchup) => [matchup.high?.managerId, matchup.low?.managerId])).toEqual([
      [3, 8],
      [4, 5],
      [1, 7],
      [2, 6],
    ]);
  });

  it('plays each round inside its window and gives ties to the better seed', () => {
    nominateAll();
    generateBracket();

    ingestGameStats(GAMES.quarterfinal, assists([[1, 1], [8, 3], [4, 2], [5, 2], [2, 4], [7, 1], [3, 0], [6, 1]]));

    const afterQuarterfinals = getBracket();
    expect(afterQuarterfinals.status).toBe('in_progress');
    expect(afterQuarterfinals.rounds.map((round) => round.decided)).toEqual([true, false, false]);
    expect(summarize(afterQuarterfinals)[0]).toEqual([
      { id: 'QF1', high: 1, low: 8, points: [1, 3], winner: 8 },
      { id: 'QF2', high: 4, low: 5, points: [2, 2], winner: 4 },
      { id: 'QF3', high: 2, low: 7, points: [4, 1], winner: 2 },
      { id: 'QF4', high: 3, low: 6, points: [0, 1], winner: 6 },
    ]);

    ingestGameStats(GAMES.semifinal, assists([[4, 1], [8, 5], [2, 3], [6, 2]]));
    ingestGameStats(GAMES.final, assists([[2, 4], [8, 4]]));

    const finished = generateBracket();
    const rounds = summarize(finished);
    expect(rounds[1]).toEqual([
      { id: 'SF1', high: 4, low: 8, points: [1, 5], winner: 8 },
      { id: 'SF2', high: 2, low: 6, points: [3, 2], winner: 2 },
    ]);
    expect(rounds[2]).toEqual([{ id: 'F1', high: 2, low: 8, points: [4, 4], winner: 2 }]);
    expect(finished.status).toBe('complete');
    expect(finished.champion?.managerId).toBe(2);
    expect(finished.champion?.playerName).toBe('Player 2');
  });

  it('needs exactly eight managers', () => {
    resetLeague();
    loadLeagueData({ managers: [{ id: 9, name: 'Manager 9', teamName: 'Team 9' }] });

    expect(() => generateBracket()).toThrow(StateError);
  });
});
