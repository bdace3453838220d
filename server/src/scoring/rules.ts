import { z } from 'zod';
import db from '../db';
import { StateError, ValidationError } from '../errors';

/**
 * Box-score categories, in the order stat files list them.
 */
export const STAT_CATEGORIES = [
  '1PT_MADE',
  '2PT_MADE',
  'FT_MADE',
  'REB',
  'AST',
  'STL',
  'BLK',
  'TOV',
  'PF',
  'GAME_WINNER',
  'DUNK',
] as const;

export type StatCategory = typeof STAT_CATEGORIES[number];

export type StatCounts = Record<StatCategory, number>;
export type ScoringWeights = Record<StatCategory, number>;

// game_stats column for each category
export const STAT_COLUMNS: Record<StatCategory, string> = {
  '1PT_MADE': 'one_pt_made',
  '2PT_MADE': 'two_pt_made',
  'FT_MADE': 'ft_made',
  'REB': 'rebounds',
  'AST': 'assists',
  'STL': 'steals',
  'BLK': 'blocks',
  'TOV': 'turnovers',
  'PF': 'personal_fouls',
  'GAME_WINNER': 'game_winner',
  'DUNK': 'dunks',
};

// Categories that cost points
const PENALTY_CATEGORIES: readonly StatCategory[] = ['TOV', 'PF'];

// Points are stored to the hundredth
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function isStatCategory(value: string): value is StatCategory {
  return STAT_CATEGORIES.some((category) => category === value);
}

export function emptyStatCounts(): StatCounts {
  return {
    '1PT_MADE': 0,
    '2PT_MADE': 0,
    'FT_MADE': 0,
    'REB': 0,
    'AST': 0,
    'STL': 0,
    'BLK': 0,
    'TOV': 0,
    'PF': 0,
    'GAME_WINNER': 0,
    'DUNK': 0,
  };
}

/**
 * Returns the list of problems with a weights table; empty when it is usable.
 */
export function validateScoringConfig(weights: Partial<Record<string, number>>): string[] {
  const problems: string[] = [];

  for (const category of STAT_CATEGORIES) {
    const weight = weights[category];
    if (weight === undefined) {
      problems.push(`Missing weight for ${category}`);
      continue;
    }
    if (!Number.isFinite(weight)) {
      problems.push(`Weight for ${category} must be a finite number`);
      continue;
    }
    if (PENALTY_CATEGORIES.includes(category) && weight >= 0) {
      problems.push(`Weight for ${category} must be negative`);
    }
  }

  for (const key of Object.keys(weights)) {
    if (!isStatCategory(key)) {
      problems.push(`Unknown stat category ${key}`);
    }
  }

  return problems;
}

const weightRowsSchema = z.array(
  z.object({
    statCategory: z.string(),
    pointsPerUnit: z.number(),
  })
);

const weightMapSchema = z.record(z.string(), z.number());

/**
 * Normalize incoming scoring payload to a category -> weight map.
 * Handles two shapes:
 * A) { "1PT_MADE": 1, "2PT_MADE": 2.5, ... }
 * B) [{ "statCategory": "1PT_MADE", "pointsPerUnit": 1 }, ...]
 */
export function normalizeScoringPayload(body: unknown): Record<string, number> {
  const rows = weightRowsSchema.safeParse(body);
  if (rows.success) {
    const weights: Record<string, number> = {};
    for (const row of rows.data) {
      weights[row.statCategory] = row.pointsPerUnit;
    }
    return weights;
  }

  const map = weightMapSchema.safeParse(body);
  if (map.success) {
    return map.data;
  }

  throw new ValidationError('Scoring config must be a category map or a list of { statCategory, pointsPerUnit }');
}

export function getScoringWeights(): ScoringWeights {
  const rows = db
    .prepare<[], { stat_category: string; points_per_unit: number }>(
      'SELECT stat_category, points_per_unit FROM scoring_config'
    )
    .all();

  const loaded: Record<string, number> = {};
  for (const row of rows) {
    loaded[row.stat_category] = row.points_per_unit;
  }

  const problems = validateScoringConfig(loaded);
  if (problems.length > 0) {
    throw new StateError('Scoring config is not loaded', problems);
  }

  const weights = emptyStatCounts();
  for (const category of STAT_CATEGORIES) {
    weights[category] = loaded[category] ?? 0;
  }
  return weights;
}

export function hasScoringConfig(): boolean {
  const row = db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM scoring_config').get();
  return (row?.count ?? 0) > 0;
}

/**
 * Replace the season's weights. Frozen once any stats have been ingested.
 */
export function setScoringConfig(weights: Record<string, number>): ScoringWeights {
  const problems = validateScoringConfig(weights);
  if (problems.length > 0) {
    throw new ValidationError('Invalid scoring config', problems);
  }

  const statsRow = db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM stat_batches').get();
  if ((statsRow?.count ?? 0) > 0) {
    throw new StateError('Scoring config cannot change once stats have been ingested');
  }

  const upsert = db.prepare(`
    INSERT INTO scoring_config (stat_category, points_per_unit)
    VALUES (?, ?)
    ON CONFLICT (stat_category) DO UPDATE SET points_per_unit = excluded.points_per_unit
  `);

  db.transaction(() => {
    for (const category of STAT_CATEGORIES) {
      upsert.run(category, weights[category]);
    }
  })();

  return getScoringWeights();
}
