export type LeagueErrorCode =
  | 'VALIDATION_ERROR'
  | 'STATE_ERROR'
  | 'NOT_FOUND'
  | 'DATA_INTEGRITY_ERROR';

/**
 * Base class for every failure the league core reports on purpose.
 * Routes map these to HTTP responses in middleware/errors.ts.
 */
export abstract class LeagueError extends Error {
  abstract readonly code: LeagueErrorCode;
  abstract readonly statusCode: number;
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

// Malformed or out-of-range input
export class ValidationError extends LeagueError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;
}

// Operation not allowed in the current state (locked lineup, finished draft, ...)
export class StateError extends LeagueError {
  readonly code = 'STATE_ERROR';
  readonly statusCode = 409;
}

export class NotFoundError extends LeagueError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;
}

// Stored history disagrees with current roster/schedule state
export class DataIntegrityError extends LeagueError {
  readonly code = 'DATA_INTEGRITY_ERROR';
  readonly statusCode = 500;
}
