import { v4 as uuidv4 } from 'uuid';
import db from '../db';
import { StateError, ValidationError } from '../errors';
import { isDraftComplete } from '../draft/engine';
import { applyGameScores, getPlayerGameScores, writeGameStats } from '../scoring/engine';
import { getScoringWeights } from '../scoring/rules';
import { refreshStandings } from '../standings/aggregator';
import { IngestResult, StatRowResult, parseStatRows } from './types';

/**
 * Stat ingestion
 * Validates a game's box-score rows as a whole, appends them to the batch log
 * and rescores. A single bad row rejects the entire batch.
 */
export function ingestGameStats(gameId: number, input: unknown[], now: Date = new Date()): IngestResult {
  const game = db
    .prepare<[number], { id: number; game_date: string }>('SELECT id, game_date FROM games WHERE id = ?')
    .get(gameId);
  if (!game) {
    throw new ValidationError(`Game ${gameId} is not on the schedule`);
  }

  if (!isDraftComplete()) {
    throw new StateError('Stats can only be ingested once the draft is complete');
  }

  if (input.length === 0) {
    throw new ValidationError('Stat batch is empty');
  }

  const { rows, problems } = parseStatRows(input);

  const findPlayer = db.prepare<[number], { id: number }>('SELECT id FROM players WHERE id = ?');
  const seen = new Set<number>();
  rows.forEach((row) => {
    if (seen.has(row.playerId)) {
      problems.push(`Player ${row.playerId} appears more than once`);
    }
    seen.add(row.playerId);
    if (!findPlayer.get(row.playerId)) {
      problems.push(`Player ${row.playerId} not found`);
    }
  });

  if (problems.length > 0) {
    throw new ValidationError(`Stat batch for game ${gameId} rejected`, problems);
  }

  const weights = getScoringWeights();
  const batchId = uuidv4();

  const managerScoresUpdated = db.transaction(() => {
    db.prepare(`
      INSERT INTO stat_batches (id, game_id, rows_json, ingested_at)
      VALUES (?, ?, ?, ?)
    `).run(batchId, gameId, JSON.stringify(rows), now.toISOString());

    writeGameStats(gameId, rows);
    const updated = applyGameScores(gameId, weights);
    refreshStandings(now);
    return updated;
  })();

  const points = new Map(getPlayerGameScores(gameId).map((score) => [score.playerId, score.fantasyPoints]));

  console.log(`Ingested ${rows.length} stat rows for game ${gameId} (${game.game_date})`);

  return {
    gameId,
    gameDate: game.game_date,
    batchId,
    rows: rows.map((row): StatRowResult => ({
      playerId: row.playerId,
      status: 'accepted',
      fantasyPoints: points.get(row.playerId) ?? 0,
    })),
    managerScoresUpdated,
  };
}

export function getStatBatchCount(gameId?: number): number {
  if (gameId === undefined) {
    return db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM stat_batches').get()?.count ?? 0;
  }
  return (
    db.prepare<[number], { count: number }>('SELECT COUNT(*) as count FROM stat_batches WHERE game_id = ?').get(gameId)
      ?.count ?? 0
  );
}
