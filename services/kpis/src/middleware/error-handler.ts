import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { createLogger } from '@metrica/config';

const log = createLogger('kpis:errors');

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Rejected input. Always names the offending field. */
export class ValidationError extends AppError {
  constructor(
    public field: string,
    message: string,
    code = 'VALIDATION_FAILED'
  ) {
    super(400, message, code, { field });
    this.name = 'ValidationError';
  }
}

export class PermissionDeniedError extends AppError {
  constructor(message = 'You do not have permission to perform this action') {
    super(403, message, 'PERMISSION_DENIED');
    this.name = 'PermissionDeniedError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, `${resource} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/** Illegal lifecycle move: wrong report status, wrong KPI source type, inactive assignment. */
export class StateTransitionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(409, message, 'INVALID_STATE', details);
    this.name = 'StateTransitionError';
  }
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      ...(err.details && { details: err.details }),
    });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Validation failed',
      code: 'VALIDATION_FAILED',
      details: { issues: err.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) },
    });
    return;
  }

  log.error({ err, method: req.method, path: req.path }, 'Unhandled error');
  res.status(500).json({ error: 'Internal server error' });
}
