import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';

import { AppError } from './app-error.js';

interface ErrorBody {
  code: string;
  message: string;
  traceId: string;
  details?: unknown;
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

export function errorHandler(error: unknown, request: Request, response: Response, next: NextFunction): void {
  if (response.headersSent) {
    next(error);
    return;
  }

  const traceId = typeof response.locals.traceId === 'string' ? response.locals.traceId : 'unknown-trace';

  if (error instanceof AppError) {
    const payload: ErrorBody = {
      code: error.code,
      message: error.message,
      traceId
    };

    if (error.details !== undefined) {
      payload.details = error.details;
    }

    response.status(error.statusCode).json(payload);
    return;
  }

  if (error instanceof ZodError) {
    // Report the first failing field the way a caller reads it: "name is required".
    const [firstIssue] = error.issues;

    response.status(400).json({
      code: 'VALIDATION_ERROR',
      message: firstIssue?.message ?? 'Request validation failed.',
      traceId,
      details: error.flatten()
    } satisfies ErrorBody);
    return;
  }

  if (isBodyParseError(error)) {
    response.status(400).json({
      code: 'VALIDATION_ERROR',
      message: 'Request body must be valid JSON.',
      traceId
    } satisfies ErrorBody);
    return;
  }

  console.error('unhandled_error', {
    traceId,
    method: request.method,
    path: request.path,
    error
  });

  response.status(500).json({
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred.',
    traceId
  } satisfies ErrorBody);
}
