import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { createApp } from './app';
import { draftLeague, resetLeague } from './test/fixtures';

const app = createApp();

describe('league API', () => {
  beforeEach(() => {
    resetLeague();
    draftLeague();
  });

  it('serves standings for every manager', async () => {
    const res = await request(app).get('/api/scores/standings');

    expect(res.status).toBe(200);
    expect(res.body.standings).toHaveLength(8);
    expect(res.body.standings[0].managerId).toBe(1);
  });

  it('filters the schedule by date', async () => {
    const res = await request(app).get('/api/games').query({ date: '2026-01-05' });

    expect(res.status).toBe(200);
    expect(res.body.games.map((game: { id: number }) => game.id)).toEqual([2, 1]);
  });

  it('sets a lineup', async () => {
    const res = await request(app)
      .put('/api/team/1/lineup/2026-02-26')
      .send({ playerIds: [32, 33, 48] });

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.lineup).toEqual({
      managerId: 1,
      date: '2026-02-26',
      activePlayerIds: [32, 33, 48],
      provenance: 'Explicit',
      sourceDate: '2026-02-26',
    });
  });

  it('returns every lineup problem as a 400', async () => {
    const res = await request(app)
      .put('/api/team/1/lineup/2026-02-26')
      .send({ playerIds: [1, 2, 3] });

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({
      message: 'Invalid lineup',
      code: 'VALIDATION_ERROR',
      details: ['Player 2 is not on this roster', 'Player 3 is not on this roster'],
    });
  });

  it('rejects a malformed manager id', async () => {
    const res = await request(app).get('/api/team/abc/roster');

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
  });

  it('reports unknown managers and routes as 404', async () => {
    const manager = await request(app).get('/api/team/99/roster');
    expect(manager.status).toBe(404);
    expect(manager.body.error).toEqual({ message: 'Manager 99 not found', code: 'NOT_FOUND', details: [] });

    const route = await request(app).get('/api/nowhere');
    expect(route.status).toBe(404);
    expect(route.body.error.code).toBe('NOT_FOUND');
  });

  it('answers 409 for a pick after the draft', async () => {
    const res = await request(app).post('/api/admin/draft/picks').send({ playerId: 1 });

    expect(res.status).toBe(409);
    expect(res.body.error.code).toBe('STATE_ERROR');
  });

  it('ingests a stat batch', async () => {
    const res = await request(app)
      .post('/api/admin/games/1/stats')
      .send({ rows: [{ playerId: 1, AST: 4 }] });

    expect(res.status).toBe(200);
    expect(res.body.rows).toEqual([{ playerId: 1, status: 'accepted', fantasyPoints: 4 }]);
    expect(res.body.managerScoresUpdated).toBe(1);

    const daily = await request(app).get('/api/scores/daily/2026-01-05');
    expect(daily.body.scores[0]).toMatchObject({ managerId: 1, totalPoints: 4 });
  });

  it('serves the season recap once games are scored', async () => {
    const empty = await request(app).get('/api/scores/season-recap');
    expect(empty.status).toBe(200);
    expect(empty.body).toEqual({ recap: null });

    await request(app).post('/api/admin/games/1/stats').send({ rows: [{ playerId: 1, AST: 4 }] });

    const res = await request(app).get('/api/scores/season-recap');
    expect(res.body.recap.champion).toEqual({ managerId: 1, managerName: 'Manager 1', teamName: 'Team 1', totalPoints: 4 });
  });

  it('reports a pending bracket with 202', async () => {
    const res = await request(app).post('/api/admin/tournament/bracket');

    expect(res.status).toBe(202);
    expect(res.body).toEqual({ status: 'pending', missingNominations: 8, rounds: [], champion: null });
  });

  it('rejects malformed JSON', async () => {
    const res = await request(app)
      .post('/api/admin/draft/picks')
      .set('Content-Type', 'application/json')
      .send('{"playerId":');

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
  });
});
