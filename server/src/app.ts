import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { config } from './config';
import { getSchedule } from './league/data';
import { errorHandler, notFoundHandler } from './middleware/errors';
import { dateParam } from './routes/params';
import adminRoutes from './routes/admin';
import teamRoutes from './routes/team';
import scoresRoutes from './routes/scores';

export function createApp(): Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '10mb' })); // Large stat batches

  // CORS configuration
  const allowedOrigins = ['http://localhost:5173', 'http://localhost:3000'];
  if (config.clientUrl) {
    allowedOrigins.push(config.clientUrl);
  }

  app.use(
    cors({
      origin: allowedOrigins,
      credentials: true,
    })
  );

  // API Routes
  app.use('/api/admin', adminRoutes);
  app.use('/api/team', teamRoutes);
  app.use('/api/scores', scoresRoutes);

  // Public schedule, optionally for a single date
  app.get('/api/games', (req: Request, res: Response) => {
    const date = z.union([dateParam, z.undefined()]).parse(req.query.date);
    const games = getSchedule().filter((game) => date === undefined || game.gameDate === date);
    res.json({ date: date ?? null, games });
  });

  app.use('/api', notFoundHandler);

  // Health check
  app.get('/', (_req: Request, res: Response) => {
    res.send('Fantasy league API running');
  });

  // Error handling middleware
  app.use(errorHandler);

  return app;
}
