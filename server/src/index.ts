import { config } from './config';
import { initializeDatabase } from './db';
import { autoSeedIfEmpty } from './seed/runSeed';
import { createApp } from './app';

// Initialize database
initializeDatabase();

// Auto-seed if database is empty
if (config.autoSeed) {
  autoSeedIfEmpty();
}

const app = createApp();

// Start server
app.listen(config.port, () => {
  console.log(`Server listening at http://localhost:${config.port}`);
  console.log(`Database path: ${config.databasePath}`);
  console.log(`Season: ${config.seasonStart} to ${config.seasonEnd}`);
});

export default app;
