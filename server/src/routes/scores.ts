import { Router, Request, Response } from 'express';
import { getPlayer } from '../league/data';
import { generateDailyRecap, getRecentRecaps } from '../recap/daily';
import { generateSeasonRecap } from '../recap/season';
import { getManagerDailyScores } from '../scoring/engine';
import { getManagerRank, getStandings, getTopScorers } from '../standings/aggregator';
import { calculatePlayerAverages, getAllPlayerStats, getPlayerTrend } from '../stats/players';
import { getBracket } from '../tournament/bracket';
import { dateParam, idParam, limitQuery } from './params';

const router = Router();

// Season standings (every manager, ranked)
router.get('/standings', (_req: Request, res: Response) => {
  res.json({ standings: getStandings() });
});

router.get('/standings/:managerId', (req: Request, res: Response) => {
  const managerId = idParam.parse(req.params.managerId);
  res.json({ standing: getManagerRank(managerId) });
});

// Manager totals for one date
router.get('/daily/:date', (req: Request, res: Response) => {
  const date = dateParam.parse(req.params.date);
  res.json({ date, scores: getManagerDailyScores(date) });
});

router.get('/recap/:date', (req: Request, res: Response) => {
  const date = dateParam.parse(req.params.date);
  res.json({ recap: generateDailyRecap(date) });
});

router.get('/recaps', (req: Request, res: Response) => {
  const days = limitQuery(3).parse(req.query.days);
  res.json({ recaps: getRecentRecaps(days) });
});

// Awards and trends across the whole season so far
router.get('/season-recap', (_req: Request, res: Response) => {
  res.json({ recap: generateSeasonRecap() });
});

router.get('/top-scorers', (req: Request, res: Response) => {
  const limit = limitQuery(10).parse(req.query.limit);
  res.json({ players: getTopScorers(limit) });
});

router.get('/players', (_req: Request, res: Response) => {
  res.json({ players: getAllPlayerStats() });
});

router.get('/players/:playerId', (req: Request, res: Response) => {
  const playerId = idParam.parse(req.params.playerId);
  res.json({
    player: getPlayer(playerId),
    season: calculatePlayerAverages(playerId),
    lastFive: calculatePlayerAverages(playerId, 5),
    trend: getPlayerTrend(playerId),
  });
});

router.get('/tournament', (_req: Request, res: Response) => {
  res.json(getBracket());
});

export default router;
