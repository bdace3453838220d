import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

const configSchema = z.object({
  port: z.number().int().positive().default(3001),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  databasePath: z.string().min(1).default(path.join(__dirname, '../../data/league.db')),
  clientUrl: z.string().url().optional(),
  seasonStart: isoDate.default('2026-01-05'),
  seasonEnd: isoDate.default('2026-02-27'),
  autoSeed: z.boolean().default(true),
});

export type AppConfig = z.infer<typeof configSchema>;

function loadConfig(): AppConfig {
  const env = {
    port: process.env.PORT ? parseInt(process.env.PORT, 10) : undefined,
    nodeEnv: process.env.NODE_ENV || undefined,
    databasePath: process.env.DATABASE_PATH || undefined,
    clientUrl: process.env.CLIENT_URL || undefined,
    seasonStart: process.env.SEASON_START || undefined,
    seasonEnd: process.env.SEASON_END || undefined,
    autoSeed: process.env.AUTO_SEED ? process.env.AUTO_SEED !== 'false' : undefined,
  };

  return configSchema.parse(env);
}

export const config = loadConfig();

/**
 * League-wide constants. The season window comes from the environment,
 * everything else is fixed for the league format.
 */
export const LEAGUE_RULES = {
  draftRounds: 6,
  activePlayersPerDay: 3,
  tournamentBracketSize: 8,
  seasonStart: config.seasonStart,
  seasonEnd: config.seasonEnd,
} as const;
