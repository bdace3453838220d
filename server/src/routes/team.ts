import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { getManagerRoster } from '../draft/engine';
import { getManager } from '../league/data';
import { getLineupHistory, getLineupView, submitLineup } from '../lineups/manager';
import { nominateTournamentPlayer } from '../tournament/bracket';
import { dateParam, idParam } from './params';

const router = Router();

// ========== ROSTER ==========

router.get('/:managerId/roster', (req: Request, res: Response) => {
  const managerId = idParam.parse(req.params.managerId);
  res.json({
    manager: getManager(managerId),
    players: getManagerRoster(managerId),
  });
});

// ========== LINEUPS ==========

router.get('/:managerId/lineup/:date', (req: Request, res: Response) => {
  const managerId = idParam.parse(req.params.managerId);
  const date = dateParam.parse(req.params.date);
  res.json(getLineupView(managerId, date));
});

const lineupSchema = z.object({ playerIds: z.array(idParam) });

router.put('/:managerId/lineup/:date', (req: Request, res: Response) => {
  const managerId = idParam.parse(req.params.managerId);
  const date = dateParam.parse(req.params.date);
  const { playerIds } = lineupSchema.parse(req.body);

  const result = submitLineup(managerId, date, playerIds);
  res.json({ success: true, ...result });
});

router.get('/:managerId/lineups', (req: Request, res: Response) => {
  const managerId = idParam.parse(req.params.managerId);
  res.json({ submissions: getLineupHistory(managerId) });
});

// ========== TOURNAMENT ==========

router.post('/:managerId/tournament', (req: Request, res: Response) => {
  const managerId = idParam.parse(req.params.managerId);
  const { playerId } = z.object({ playerId: idParam }).parse(req.body);
  res.status(201).json({ nomination: nominateTournamentPlayer(managerId, playerId) });
});

export default router;
