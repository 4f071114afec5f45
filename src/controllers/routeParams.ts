import type { Response } from 'express';
import type { ZodTypeAny, z } from 'zod';

import { NotFoundError, UnauthorizedError } from '@officehours/shared';

import type { Caller } from '../application/services/bookingCoordinator';

/** A path that does not parse names no resource, so it answers 404 rather than 400. */
export function parseRouteParams<S extends ZodTypeAny>(
  schema: S,
  params: Record<string, string>
): z.output<S> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw new NotFoundError('Not found', {
      params,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    });
  }
  return parsed.data;
}

export function requireCaller(res: Response): Caller {
  const caller = res.locals.caller;
  if (!caller) {
    throw new UnauthorizedError('Missing auth context');
  }
  return caller;
}
