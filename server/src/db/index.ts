import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { config } from '../config';

const dbPath = config.databasePath;

// Ensure data directory exists
if (dbPath !== ':memory:') {
  const dataDir = path.dirname(dbPath);
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }
}

const db: Database.Database = new Database(dbPath);

// Enable foreign keys
db.pragma('foreign_keys = ON');

export default db;

// Initialize database schema
export function initializeDatabase(): void {
  db.exec(`
    -- Fantasy managers (one team each)
    CREATE TABLE IF NOT EXISTS managers (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      team_name TEXT NOT NULL,
      created_at TEXT DEFAULT (datetime('now'))
    );

    -- Real-life players (the draft pool)
    CREATE TABLE IF NOT EXISTS players (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      pro_team TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'injured')),
      created_at TEXT DEFAULT (datetime('now'))
    );

    -- Stat category weights, fixed for the season
    CREATE TABLE IF NOT EXISTS scoring_config (
      stat_category TEXT PRIMARY KEY,
      points_per_unit REAL NOT NULL
    );

    -- Game schedule; earliest start_time on a date locks that date's lineups
    CREATE TABLE IF NOT EXISTS games (
      id INTEGER PRIMARY KEY,
      game_date TEXT NOT NULL,
      start_time TEXT NOT NULL,
      home_team TEXT,
      away_team TEXT,
      created_at TEXT DEFAULT (datetime('now'))
    );

    -- Draft configuration (singleton)
    CREATE TABLE IF NOT EXISTS draft_settings (
      id TEXT PRIMARY KEY DEFAULT 'default',
      rounds INTEGER NOT NULL,
      started_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS draft_order (
      position INTEGER PRIMARY KEY,
      manager_id INTEGER NOT NULL UNIQUE,
      FOREIGN KEY (manager_id) REFERENCES managers(id)
    );

    -- Append-only pick log; the draft state is replayed from it
    CREATE TABLE IF NOT EXISTS draft_picks (
      pick_number INTEGER PRIMARY KEY,
      round INTEGER NOT NULL,
      manager_id INTEGER NOT NULL,
      player_id INTEGER NOT NULL UNIQUE,
      picked_at TEXT NOT NULL,
      FOREIGN KEY (manager_id) REFERENCES managers(id),
      FOREIGN KEY (player_id) REFERENCES players(id)
    );

    -- Roster membership, written once when the draft completes
    CREATE TABLE IF NOT EXISTS roster_entries (
      player_id INTEGER PRIMARY KEY,
      manager_id INTEGER NOT NULL,
      acquired_at TEXT NOT NULL,
      FOREIGN KEY (manager_id) REFERENCES managers(id),
      FOREIGN KEY (player_id) REFERENCES players(id)
    );

    -- Current explicit lineup per (manager, date): every roster player, active or bench
    CREATE TABLE IF NOT EXISTS lineup_entries (
      manager_id INTEGER NOT NULL,
      game_date TEXT NOT NULL,
      player_id INTEGER NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('active', 'bench')),
      submitted_at TEXT NOT NULL,
      PRIMARY KEY (manager_id, game_date, player_id),
      FOREIGN KEY (manager_id) REFERENCES managers(id),
      FOREIGN KEY (player_id) REFERENCES players(id)
    );

    -- Every accepted lineup submission, in order
    CREATE TABLE IF NOT EXISTS lineup_submissions (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      id TEXT UNIQUE NOT NULL,
      manager_id INTEGER NOT NULL,
      game_date TEXT NOT NULL,
      active_player_ids TEXT NOT NULL,
      submitted_at TEXT NOT NULL,
      FOREIGN KEY (manager_id) REFERENCES managers(id)
    );

    -- Every accepted stat batch, in order; recompute replays this log
    CREATE TABLE IF NOT EXISTS stat_batches (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      id TEXT UNIQUE NOT NULL,
      game_id INTEGER NOT NULL,
      rows_json TEXT NOT NULL,
      ingested_at TEXT NOT NULL,
      FOREIGN KEY (game_id) REFERENCES games(id)
    );

    -- Player game stats (box scores), latest batch per game
    CREATE TABLE IF NOT EXISTS game_stats (
      game_id INTEGER NOT NULL,
      player_id INTEGER NOT NULL,
      one_pt_made INTEGER NOT NULL DEFAULT 0,
      two_pt_made INTEGER NOT NULL DEFAULT 0,
      ft_made INTEGER NOT NULL DEFAULT 0,
      rebounds INTEGER NOT NULL DEFAULT 0,
      assists INTEGER NOT NULL DEFAULT 0,
      steals INTEGER NOT NULL DEFAULT 0,
      blocks INTEGER NOT NULL DEFAULT 0,
      turnovers INTEGER NOT NULL DEFAULT 0,
      personal_fouls INTEGER NOT NULL DEFAULT 0,
      game_winner INTEGER NOT NULL DEFAULT 0 CHECK (game_winner IN (0, 1)),
      dunks INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (game_id, player_id),
      FOREIGN KEY (game_id) REFERENCES games(id),
      FOREIGN KEY (player_id) REFERENCES players(id)
    );

    -- Derived: fantasy points per player per game
    CREATE TABLE IF NOT EXISTS player_game_scores (
      game_id INTEGER NOT NULL,
      player_id INTEGER NOT NULL,
      game_date TEXT NOT NULL,
      fantasy_points REAL NOT NULL,
      breakdown_json TEXT,
      PRIMARY KEY (game_id, player_id),
      FOREIGN KEY (game_id) REFERENCES games(id),
      FOREIGN KEY (player_id) REFERENCES players(id)
    );

    -- Derived: active-lineup total per manager per date
    CREATE TABLE IF NOT EXISTS manager_daily_scores (
      manager_id INTEGER NOT NULL,
      game_date TEXT NOT NULL,
      total_points REAL NOT NULL,
      active_players_count INTEGER NOT NULL,
      PRIMARY KEY (manager_id, game_date),
      FOREIGN KEY (manager_id) REFERENCES managers(id)
    );

    -- Derived: persisted standings snapshot
    CREATE TABLE IF NOT EXISTS standings (
      manager_id INTEGER PRIMARY KEY,
      total_points REAL NOT NULL,
      days_with_scores INTEGER NOT NULL,
      avg_points_per_day REAL NOT NULL,
      rank INTEGER NOT NULL,
      updated_at TEXT NOT NULL,
      FOREIGN KEY (manager_id) REFERENCES managers(id)
    );

    -- Tournament round windows
    CREATE TABLE IF NOT EXISTS tournament_rounds (
      round_number INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      start_date TEXT NOT NULL,
      end_date TEXT NOT NULL
    );

    -- One nominated player per manager; seed is filled in when the bracket is generated
    CREATE TABLE IF NOT EXISTS tournament_nominations (
      manager_id INTEGER PRIMARY KEY,
      player_id INTEGER NOT NULL UNIQUE,
      seed INTEGER UNIQUE,
      nominated_at TEXT NOT NULL,
      FOREIGN KEY (manager_id) REFERENCES managers(id),
      FOREIGN KEY (player_id) REFERENCES players(id)
    );

    -- Create indexes
    CREATE INDEX IF NOT EXISTS idx_games_date ON games(game_date);
    CREATE INDEX IF NOT EXISTS idx_roster_entries_manager ON roster_entries(manager_id);
    CREATE INDEX IF NOT EXISTS idx_lineup_entries_manager_date ON lineup_entries(manager_id, game_date);
    CREATE INDEX IF NOT EXISTS idx_stat_batches_game ON stat_batches(game_id);
    CREATE INDEX IF NOT EXISTS idx_player_game_scores_date ON player_game_scores(game_date);
    CREATE INDEX IF NOT EXISTS idx_manager_daily_scores_date ON manager_daily_scores(game_date);
  `);

  if (config.nodeEnv !== 'test') {
    console.log('Database initialized successfully');
  }
}
