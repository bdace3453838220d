import { z } from 'zod';
import { isCalendarDate } from '../lineups/resolver';

// Shared route parameter schemas
export const idParam = z.coerce.number().int().positive();

export const dateParam = z.string().refine(isCalendarDate, 'Expected a YYYY-MM-DD date');

export const limitQuery = (fallback: number) => z.coerce.number().int().min(1).max(100).default(fallback);
