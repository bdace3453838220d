import { beforeEach, describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { NotFoundError, StateError, ValidationError } from '../errors';
import { ingestGameStats } from '../ingest/stats';
import { getManagerDailyScores } from '../scoring/engine';
import { getScoringWeights } from '../scoring/rules';
import { GAMES, TEST_WEIGHTS, catchLeagueError, draftLeague, resetLeague } from '../test/fixtures';
import { getPlayer, getSchedule, loadLeagueData, setPlayerStatus } from './data';

describe('loadLeagueData', () => {
  beforeEach(() => {
    resetLeague();
  });

  it('upserts by id', () => {
    const result = loadLeagueData({
      players: [{ id: 5, name: 'Renamed Player', proTeam: 'Club 9' }],
    });

    expect(result).toEqual({
      managersUpserted: 0,
      playersUpserted: 1,
      scoringConfigLoaded: false,
      gamesUpserted: 0,
      tournamentRoundsUpserted: 0,
    });
    expect(getPlayer(5)).toEqual({ id: 5, name: 'Renamed Player', proTeam: 'Club 9', status: 'active' });
  });

  it('orders the schedule by date and start time', () => {
    expect(getSchedule().slice(0, 2).map((game) => game.id)).toEqual([2, 1]);
  });

  it('rejects start times without a zone', () => {
    expect(() =>
      loadLeagueData({ schedule: [{ id: 99, gameDate: '2026-01-05', startTime: '2026-01-05 19:00' }] })
    ).toThrow(ZodError);
  });

  it('keeps the previous weights when the new table is incomplete', () => {
    expect(() => loadLeagueData({ scoringConfig: { AST: 2 } })).toThrow(ValidationError);
    expect(getScoringWeights()).toEqual(TEST_WEIGHTS);
  });

  it('fixes managers and players once the draft starts', () => {
    draftLeague();

    expect(() => loadLeagueData({ managers: [{ id: 9, name: 'Manager 9', teamName: 'Team 9' }] })).toThrow(
      StateError
    );
  });
});

describe('loadLeagueData schedule changes', () => {
  beforeEach(() => {
    resetLeague();
    draftLeague();
  });

  it('keeps a scored game on its date', () => {
    ingestGameStats(GAMES.jan8, [{ playerId: 1, AST: 3 }], new Date('2026-01-09T08:00:00Z'));

    const err = catchLeagueError(() =>
      loadLeagueData(
        { schedule: [{ id: GAMES.jan8, gameDate: '2026-01-10', startTime: '2026-01-10T19:00:00Z' }] },
        new Date('2026-01-09T12:00:00Z')
      )
    );

    expect(err).toBeInstanceOf(StateError);
    expect(err.details).toEqual(['Game 4 already has stats']);
    expect(getSchedule().find((game) => game.id === GAMES.jan8)?.gameDate).toBe('2026-01-08');
    expect(getManagerDailyScores('2026-01-08')[0]).toMatchObject({ managerId: 1, totalPoints: 3 });
  });

  it('keeps a game on a locked date even before stats arrive', () => {
    const err = catchLeagueError(() =>
      loadLeagueData(
        { schedule: [{ id: GAMES.jan6, gameDate: '2026-01-06', startTime: '2026-01-06T23:00:00Z' }] },
        new Date('2026-01-06T20:00:00Z')
      )
    );

    expect(err.details).toEqual(['Game 3 is on locked date 2026-01-06']);
  });

  it('reschedules a game that has not started', () => {
    const result = loadLeagueData(
      { schedule: [{ id: GAMES.final, gameDate: '2026-02-25', startTime: '2026-02-25T19:00:00Z' }] },
      new Date('2026-01-01T00:00:00Z')
    );

    expect(result.gamesUpserted).toBe(1);
    expect(getSchedule().find((game) => game.id === GAMES.final)?.gameDate).toBe('2026-02-25');
  });

  it('accepts an unchanged scored game', () => {
    ingestGameStats(GAMES.jan8, [{ playerId: 1, AST: 3 }], new Date('2026-01-09T08:00:00Z'));

    expect(
      loadLeagueData({
        schedule: [{ id: GAMES.jan8, gameDate: '2026-01-08', startTime: '2026-01-08T19:00:00Z', homeTeam: 'Club 1' }],
      }).gamesUpserted
    ).toBe(1);
  });
});

describe('setPlayerStatus', () => {
  beforeEach(() => {
    resetLeague();
  });

  it('marks a player injured', () => {
    expect(setPlayerStatus(5, 'injured').status).toBe('injured');
    expect(getPlayer(5).status).toBe('injured');
  });

  it('reports an unknown player', () => {
    expect(() => setPlayerStatus(999, 'injured')).toThrow(NotFoundError);
  });
});
