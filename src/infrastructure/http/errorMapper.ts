import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { AppError, logger } from '@officehours/shared';

interface ErrorResponseBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

const UNEXPECTED_ERROR_MESSAGE = 'Unexpected error while processing request';

function mapStatusCode(error: unknown): number {
  if (error instanceof ZodError) return 400;
  if (error instanceof AppError) return error.status;
  return 500;
}

export function errorMapper(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = mapStatusCode(err);
  const requestLogger = res.locals.logger ?? logger;
  const fields = { err, status, path: req.path, method: req.method };

  if (status >= 500) {
    requestLogger.error(fields, 'Request failed');
  } else {
    requestLogger.warn(fields, 'Request rejected');
  }

  if (res.headersSent) {
    return;
  }

  let body: ErrorResponseBody;
  if (err instanceof AppError) {
    body = { error: err.name, message: err.message };
    if (err.details) {
      body.details = err.details;
    }
  } else if (err instanceof ZodError) {
    body = {
      error: 'BadRequestError',
      message: 'Request validation failed',
      details: { issues: err.issues }
    };
  } else {
    body = { error: 'InternalServerError', message: UNEXPECTED_ERROR_MESSAGE };
  }

  res.status(status).json(body);
}
