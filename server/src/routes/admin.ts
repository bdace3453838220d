import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { LEAGUE_RULES } from '../config';
import {
  executeDraft,
  getAvailablePlayers,
  getDraftState,
  makeDraftPick,
  startDraft,
} from '../draft/engine';
import { ingestGameStats } from '../ingest/stats';
import { getManagers, loadLeagueData, setPlayerStatus } from '../league/data';
import { recomputeAll } from '../scoring/engine';
import { getScoringWeights, normalizeScoringPayload, setScoringConfig } from '../scoring/rules';
import { runLeagueSeed } from '../seed/runSeed';
import { generateBracket } from '../tournament/bracket';
import { idParam } from './params';

const router = Router();

// ========== SEED ENDPOINTS ==========

/**
 * Load league inputs - any of managers, players, scoringConfig, schedule, tournamentRounds
 */
router.post('/seed', (req: Request, res: Response) => {
  const result = loadLeagueData(req.body);
  res.json({ success: true, ...result });
});

// Load the bundled league; force wipes everything first
router.post('/seed/bundled', (req: Request, res: Response) => {
  const { force } = z.object({ force: z.boolean().default(false) }).parse(req.body ?? {});
  const result = runLeagueSeed(force);
  res.json(result);
});

// ========== SCORING CONFIG ==========

router.get('/scoring', (_req: Request, res: Response) => {
  res.json({ weights: getScoringWeights() });
});

router.put('/scoring', (req: Request, res: Response) => {
  const weights = setScoringConfig(normalizeScoringPayload(req.body));
  res.json({ success: true, weights });
});

// ========== DRAFT ==========

const startDraftSchema = z.object({
  managerIds: z.array(idParam).optional(),
  rounds: z.number().int().positive().default(LEAGUE_RULES.draftRounds),
  // Full pick list in order; runs the whole draft in one go
  playerIds: z.array(idParam).optional(),
});

router.post('/draft', (req: Request, res: Response) => {
  const body = startDraftSchema.parse(req.body ?? {});
  const managerIds = body.managerIds ?? getManagers().map((manager) => manager.id);

  const draft = body.playerIds
    ? executeDraft(managerIds, body.rounds, body.playerIds)
    : startDraft(managerIds, body.rounds);

  res.status(201).json({ draft });
});

router.post('/draft/picks', (req: Request, res: Response) => {
  const { playerId } = z.object({ playerId: idParam }).parse(req.body);
  const pick = makeDraftPick(playerId);
  res.status(201).json({ pick, draft: getDraftState() });
});

router.get('/draft', (_req: Request, res: Response) => {
  res.json({
    draft: getDraftState(),
    availablePlayers: getAvailablePlayers(),
  });
});

// ========== STATS INGEST ==========

const statBatchSchema = z.union([
  z.array(z.unknown()),
  z.object({ rows: z.array(z.unknown()) }).transform((body) => body.rows),
]);

router.post('/games/:gameId/stats', (req: Request, res: Response) => {
  const gameId = idParam.parse(req.params.gameId);
  const rows = statBatchSchema.parse(req.body);
  const result = ingestGameStats(gameId, rows);
  res.json(result);
});

router.post('/recompute', (_req: Request, res: Response) => {
  const result = recomputeAll();
  res.json({ success: true, ...result });
});

// ========== PLAYERS ==========

router.put('/players/:playerId/status', (req: Request, res: Response) => {
  const playerId = idParam.parse(req.params.playerId);
  const { status } = z.object({ status: z.enum(['active', 'injured']) }).parse(req.body);
  res.json({ player: setPlayerStatus(playerId, status) });
});

// ========== TOURNAMENT ==========

router.post('/tournament/bracket', (_req: Request, res: Response) => {
  const bracket = generateBracket();
  res.status(bracket.status === 'pending' ? 202 : 200).json(bracket);
});

export default router;
