import { beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError, StateError, ValidationError } from '../errors';
import { ingestGameStats } from '../ingest/stats';
import { setPlayerStatus } from '../league/data';
import { getManagerDailyScores } from '../scoring/engine';
import { GAMES, catchLeagueError, draftLeague, resetLeague } from '../test/fixtures';
import { getLineupHistory, getLineupView, submitLineup } from './manager';
import { resolveLineup } from './resolver';

const MORNING = new Date('2026-01-05T10:00:00Z');
const AT_TIPOFF = new Date('2026-01-05T19:00:00Z');
const AFTER_JAN8 = new Date('2026-01-09T12:00:00Z');

describe('submitLineup before the draft', () => {
  beforeEach(() => {
    resetLeague();
  });

  it('waits for rosters', () => {
    expect(() => submitLineup(1, '2026-01-07', [1, 16, 17], MORNING)).toThrow(StateError);
  });
});

describe('submitLineup', () => {
  beforeEach(() => {
    resetLeague();
    draftLeague();
  });

  it('stores an explicit lineup and returns it resolved', () => {
    const result = submitLineup(1, '2026-01-05', [48, 32, 33], MORNING);

    expect(result.lineup.provenance).toBe('Explicit');
    expect(result.lineup.activePlayerIds).toEqual([32, 33, 48]);
    expect(result.managerScoresUpdated).toBe(0);
    expect(getLineupHistory(1)).toEqual([
      { id: result.submissionId, date: '2026-01-05', activePlayerIds: [32, 33, 48], submittedAt: MORNING.toISOString() },
    ]);
  });

  it('replaces the lineup until the date locks', () => {
    submitLineup(1, '2026-01-05', [32, 33, 48], MORNING);
    submitLineup(1, '2026-01-05', [1, 16, 17], new Date('2026-01-05T18:59:59Z'));

    const err = catchLeagueError(() => submitLineup(1, '2026-01-05', [32, 33, 48], AT_TIPOFF));

    expect(err).toBeInstanceOf(StateError);
    expect(err.message).toBe('Lineup for 2026-01-05 is locked');
    expect(resolveLineup(1, '2026-01-05').activePlayerIds).toEqual([1, 16, 17]);
    expect(getLineupHistory(1)).toHaveLength(2);
  });

  it('accepts a date without games after that day has passed', () => {
    const result = submitLineup(1, '2026-01-07', [32, 33, 48], new Date('2026-01-08T12:00:00Z'));

    expect(result.lineup.provenance).toBe('Explicit');
  });

  it('refuses a lineup that a locked later date would inherit', () => {
    ingestGameStats(GAMES.jan8, [
      { playerId: 32, AST: 10 },
      { playerId: 1, AST: 1 },
    ]);

    const err = catchLeagueError(() => submitLineup(1, '2026-01-07', [32, 33, 48], AFTER_JAN8));

    expect(err).toBeInstanceOf(StateError);
    expect(err.message).toBe('Lineup for 2026-01-07 would change the locked lineup for 2026-01-08');
    expect(resolveLineup(1, '2026-01-08').provenance).toBe('Default');
    expect(getManagerDailyScores('2026-01-08')[0]).toMatchObject({ managerId: 1, totalPoints: 1 });
    expect(getLineupHistory(1)).toEqual([]);
  });

  it('allows the earlier date once the locked date has its own lineup', () => {
    submitLineup(1, '2026-01-08', [1, 16, 17], MORNING);

    const result = submitLineup(1, '2026-01-07', [32, 33, 48], AFTER_JAN8);

    expect(result.lineup.provenance).toBe('Explicit');
    expect(resolveLineup(1, '2026-01-08')).toMatchObject({ provenance: 'Explicit', activePlayerIds: [1, 16, 17] });
  });

  it('requires exactly three players', () => {
    const err = catchLeagueError(() => submitLineup(1, '2026-01-07', [1, 16], MORNING));

    expect(err).toBeInstanceOf(ValidationError);
    expect(err.details).toEqual(['Select exactly 3 players (got 2)']);
  });

  it('lists repeated and foreign players together', () => {
    const err = catchLeagueError(() => submitLineup(1, '2026-01-07', [1, 1, 2], MORNING));

    expect(err).toBeInstanceOf(ValidationError);
    expect(err.details).toEqual(['Each player can only be selected once', 'Player 2 is not on this roster']);
  });

  it('keeps injured players out of the lineup', () => {
    setPlayerStatus(16, 'injured');

    const err = catchLeagueError(() => submitLineup(1, '2026-01-07', [1, 16, 17], MORNING));

    expect(err.details).toEqual(['Player 16 (Player 16) is injured']);
  });

  it('rejects unknown managers and dates outside the season', () => {
    expect(() => submitLineup(99, '2026-01-07', [1, 16, 17], MORNING)).toThrow(NotFoundError);
    expect(() => submitLineup(1, '2026-03-15', [1, 16, 17], MORNING)).toThrow(ValidationError);
    expect(() => submitLineup(1, '2026-02-30', [1, 16, 17], MORNING)).toThrow(ValidationError);
  });

  it('re-projects scores on later dates that inherit the new lineup', () => {
    ingestGameStats(GAMES.jan6, [
      { playerId: 1, AST: 1 },
      { playerId: 32, AST: 4 },
    ]);
    expect(getManagerDailyScores('2026-01-06')[0]).toMatchObject({ managerId: 1, totalPoints: 1 });

    const result = submitLineup(1, '2026-01-05', [32, 33, 48], MORNING);

    expect(result.managerScoresUpdated).toBe(1);
    expect(getManagerDailyScores('2026-01-06')[0]).toMatchObject({
      managerId: 1,
      totalPoints: 4,
      activePlayersCount: 1,
    });
  });
});

describe('getLineupView', () => {
  beforeEach(() => {
    resetLeague();
    draftLeague();
  });

  it('shows the resolved lineup with the lock countdown', () => {
    const view = getLineupView(1, '2026-01-05', new Date('2026-01-05T18:00:00Z'));

    expect(view.state).toBe('UNSET');
    expect(view.locked).toBe(false);
    expect(view.lockThreshold).toBe('2026-01-05T19:00:00.000Z');
    expect(view.msUntilLock).toBe(3600000);
    expect(view.roster.map((player) => [player.id, player.slot])).toEqual([
      [1, 'active'],
      [16, 'active'],
      [17, 'active'],
      [32, 'bench'],
      [33, 'bench'],
      [48, 'bench'],
    ]);
  });
});
