import { z } from 'zod';
import { StatCounts } from '../scoring/rules';

/**
 * Normalized stat row format.
 * Box-score rows arrive keyed by stat category (the headers of the league's
 * stat files); the player column may be spelled playerId, player_id or PLAYER_ID.
 */

const count = z.coerce
  .number({ invalid_type_error: 'must be a number' })
  .int('must be a whole number')
  .min(0, 'cannot be negative')
  .default(0);

const GameStatRowShape = z.object({
  playerId: z.coerce.number({ invalid_type_error: 'must be a number' }).int().positive(),
  '1PT_MADE': count,
  '2PT_MADE': count,
  'FT_MADE': count,
  'REB': count,
  'AST': count,
  'STL': count,
  'BLK': count,
  'TOV': count,
  'PF': count,
  'GAME_WINNER': z.coerce.number().int().min(0).max(1, 'must be 0 or 1').default(0),
  'DUNK': count,
});

function withPlayerIdAlias(raw: unknown): unknown {
  if (!raw || typeof raw !== 'object' || 'playerId' in raw) return raw;
  if ('player_id' in raw) return { ...raw, playerId: raw.player_id };
  if ('PLAYER_ID' in raw) return { ...raw, playerId: raw.PLAYER_ID };
  return raw;
}

export const GameStatRowSchema = z.preprocess(withPlayerIdAlias, GameStatRowShape);

export type GameStatRow = { playerId: number } & StatCounts;

export interface ParsedStatRows {
  rows: GameStatRow[];
  problems: string[];
}

/**
 * Validate every row and collect all problems rather than stopping at the first.
 */
export function parseStatRows(input: unknown[]): ParsedStatRows {
  const rows: GameStatRow[] = [];
  const problems: string[] = [];

  input.forEach((raw, index) => {
    const result = GameStatRowSchema.safeParse(raw);
    if (result.success) {
      rows.push(result.data);
      return;
    }
    for (const issue of result.error.issues) {
      const field = issue.path.join('.') || 'row';
      problems.push(`Row ${index + 1}: ${field} ${issue.message}`);
    }
  });

  return { rows, problems };
}

export interface StatRowResult {
  playerId: number;
  status: 'accepted';
  fantasyPoints: number;
}

export interface IngestResult {
  gameId: number;
  gameDate: string;
  batchId: string;
  rows: StatRowResult[];
  managerScoresUpdated: number;
}
