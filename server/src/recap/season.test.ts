import { beforeEach, describe, expect, it } from 'vitest';
import { ingestGameStats } from '../ingest/stats';
import { loadLeagueData } from '../league/data';
import { GAMES, MANAGER_IDS, draftLeague, resetLeague } from '../test/fixtures';
import { generateSeasonRecap } from './season';

const INGEST_TIME = new Date('2026-01-22T08:00:00Z');

function manager(id: number) {
  return { managerId: id, managerName: `Manager ${id}`, teamName: `Team ${id}` };
}

function scoreOpeningDays(): void {
  ingestGameStats(
    GAMES.jan5Late,
    [
      { playerId: 1, AST: 5 },
      { playerId: 32, AST: 8 },
      { playerId: 2, AST: 3 },
    ],
    INGEST_TIME
  );
  ingestGameStats(
    GAMES.jan6,
    [
      { playerId: 2, AST: 10 },
      { playerId: 16, AST: 2 },
    ],
    INGEST_TIME
  );
}

describe('generateSeasonRecap', () => {
  beforeEach(() => {
    resetLeague();
    draftLeague();
  });

  it('is null before anyone scores', () => {
    expect(generateSeasonRecap()).toBeNull();
  });

  it('hands out the season awards', () => {
    scoreOpeningDays();

    const recap = generateSeasonRecap();

    expect(recap?.champion).toEqual({ ...manager(2), totalPoints: 13 });
    expect(recap?.lastPlace).toEqual({ ...manager(8), totalPoints: 0 });
    expect(recap?.bestSingleDay).toEqual({ ...manager(2), gameDate: '2026-01-06', totalPoints: 10 });
    expect(recap?.mostConsistent).toBeNull();
    expect(recap?.bestDraftSteal).toEqual({
      ...manager(1),
      playerId: 32,
      playerName: 'Player 32',
      pickNumber: 32,
      round: 4,
      totalPoints: 8,
      value: 5.33,
    });
    expect(recap?.biggestBust).toEqual({
      ...manager(3),
      playerId: 3,
      playerName: 'Player 3',
      pickNumber: 3,
      round: 1,
      totalPoints: 0,
    });
  });

  it('judges lineup decisions against the resolved lineups', () => {
    scoreOpeningDays();

    const recap = generateSeasonRecap();

    // Manager 1 started 1, 16 and 17 by default while 32 scored 8 on the bench
    expect(recap?.biggestBenchSitter).toEqual({ ...manager(1), benchPoints: 8 });
    expect(recap?.bestLineupManager).toEqual({
      ...manager(2),
      efficiency: 100,
      activePoints: 13,
      benchPoints: 0,
    });
  });

  it('tracks cumulative points per manager', () => {
    scoreOpeningDays();

    const progression = generateSeasonRecap()?.progression ?? [];

    expect(progression.map((entry) => entry.managerId)).toEqual(MANAGER_IDS);
    expect(progression[0].days).toEqual([
      { gameDate: '2026-01-05', totalPoints: 5, cumulativePoints: 5 },
      { gameDate: '2026-01-06', totalPoints: 2, cumulativePoints: 7 },
    ]);
    expect(progression[2].days).toEqual([]);
  });

  it('shows how much each team leans on its top player', () => {
    scoreOpeningDays();

    const carryMe = generateSeasonRecap()?.carryMe ?? [];

    expect(carryMe.map((row) => [row.managerId, row.share])).toEqual([
      [2, 100],
      [1, 53.33],
      [3, 0],
      [4, 0],
      [5, 0],
      [6, 0],
      [7, 0],
      [8, 0],
    ]);
    expect(carryMe[1]).toMatchObject({ playerId: 32, playerPoints: 8, rosterPoints: 15 });
  });

  it('names the steadiest manager once ten days are scored', () => {
    const gameIds = Array.from({ length: 10 }, (_, index) => 101 + index);
    loadLeagueData(
      {
        schedule: gameIds.map((id, index) => {
          const gameDate = `2026-01-${String(12 + index).padStart(2, '0')}`;
          return { id, gameDate, startTime: `${gameDate}T19:00:00Z` };
        }),
      },
      new Date('2026-01-01T00:00:00Z')
    );

    gameIds.forEach((id, index) => {
      ingestGameStats(
        id,
        [
          { playerId: 1, AST: 4 },
          { playerId: 2, AST: index % 2 === 0 ? 2 : 6 },
        ],
        INGEST_TIME
      );
    });

    expect(generateSeasonRecap()?.mostConsistent).toEqual({ ...manager(1), avgPoints: 4, stdDev: 0, days: 10 });
  });
});
