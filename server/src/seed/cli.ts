import { initializeDatabase } from '../db';
import { forceSeed } from './runSeed';

// npm run seed: wipe and reload the bundled league
initializeDatabase();
forceSeed();
