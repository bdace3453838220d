import db from '../db';
import { LeagueDataResult, loadLeagueData } from '../league/data';
import seedData from './leagueSeed.json';

/**
 * Check if the DB already has league data (managers)
 */
export function isDatabaseSeeded(): boolean {
  const managerCount = db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM managers').get();
  return (managerCount?.count ?? 0) > 0;
}

/**
 * Wipe all league data tables (for force-reseed)
 */
export function wipeLeagueData(): void {
  console.log('Wiping existing league data...');

  // Children before parents so foreign keys stay on
  db.exec(`
    DELETE FROM tournament_nominations;
    DELETE FROM tournament_rounds;
    DELETE FROM standings;
    DELETE FROM manager_daily_scores;
    DELETE FROM player_game_scores;
    DELETE FROM game_stats;
    DELETE FROM stat_batches;
    DELETE FROM lineup_submissions;
    DELETE FROM lineup_entries;
    DELETE FROM roster_entries;
    DELETE FROM draft_picks;
    DELETE FROM draft_order;
    DELETE FROM draft_settings;
    DELETE FROM games;
    DELETE FROM scoring_config;
    DELETE FROM players;
    DELETE FROM managers;
  `);

  console.log('League data wiped.');
}

/**
 * Load the bundled league: managers, player pool, scoring weights, schedule
 * and tournament windows. The draft is left for the league to run.
 */
export function runLeagueSeed(
  force: boolean = false,
  data: unknown = seedData
): { success: boolean } & LeagueDataResult {
  if (!force && isDatabaseSeeded()) {
    return {
      success: false,
      managersUpserted: 0,
      playersUpserted: 0,
      scoringConfigLoaded: false,
      gamesUpserted: 0,
      tournamentRoundsUpserted: 0,
    };
  }

  // A failed load rolls the wipe back
  const result = db.transaction(() => {
    if (force) {
      wipeLeagueData();
    }
    return loadLeagueData(data);
  })();

  return { success: true, ...result };
}

/**
 * Auto-seed function for server startup
 * Only seeds if DB is empty
 */
export function autoSeedIfEmpty(): void {
  if (isDatabaseSeeded()) {
    console.log('Database already has league data, skipping auto-seed.');
    return;
  }

  console.log('Database is empty, running auto-seed...');
  const result = runLeagueSeed(false);

  if (result.success) {
    console.log(
      `✅ Auto-seeded: ${result.managersUpserted} managers, ${result.playersUpserted} players, ${result.gamesUpserted} games`
    );
  }
}

/**
 * Force seed function (for npm run seed script)
 * Wipes existing data and reseeds
 */
export function forceSeed(): void {
  console.log('Force-seeding database...');
  const result = runLeagueSeed(true);

  if (result.success) {
    console.log(
      `✅ Force-seeded: ${result.managersUpserted} managers, ${result.playersUpserted} players, ${result.gamesUpserted} games, ${result.tournamentRoundsUpserted} tournament rounds`
    );
  } else {
    console.log('❌ Seed failed');
  }
}
