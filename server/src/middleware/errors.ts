import { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { LeagueError } from '../errors';

interface ErrorBody {
  error: {
    message: string;
    code: string;
    details: string[];
  };
}

function describe(err: unknown): { statusCode: number; body: ErrorBody } {
  if (err instanceof LeagueError) {
    return {
      statusCode: err.statusCode,
      body: { error: { message: err.message, code: err.code, details: err.details } },
    };
  }

  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      body: {
        error: {
          message: 'Validation Error',
          code: 'VALIDATION_ERROR',
          details: err.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
        },
      },
    };
  }

  // body-parser marks malformed JSON with a 400 status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return {
      statusCode: 400,
      body: { error: { message: 'Malformed JSON body', code: 'VALIDATION_ERROR', details: [] } },
    };
  }

  return {
    statusCode: 500,
    body: { error: { message: 'Internal Server Error', code: 'INTERNAL_ERROR', details: [] } },
  };
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    return next(err);
  }

  const { statusCode, body } = describe(err);

  if (statusCode >= 500) {
    console.error('API Error:', {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
      url: req.url,
      method: req.method,
      statusCode,
    });
  }

  res.status(statusCode).json(body);
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      message: `Route ${req.method} ${req.url} not found`,
      code: 'NOT_FOUND',
      details: [],
    },
  });
}
