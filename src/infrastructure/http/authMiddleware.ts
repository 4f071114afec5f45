import type { RequestHandler, Response } from 'express';

import { UnauthorizedError, logger } from '@officehours/shared';

import type { QueueAdminReader } from '../../repository/IAppointmentRepository';
import { verifyJwt } from '../security/jwt';

export interface AuthMiddleware {
  authenticate: RequestHandler;
  /** Runs after `authenticate` on routes carrying `:queueId`. */
  resolveQueueAdmin: RequestHandler;
}

export interface AuthMiddlewareDependencies {
  secret: string;
  admins: QueueAdminReader;
  clock?: () => Date;
}

export function createAuthMiddleware({
  secret,
  admins,
  clock = () => new Date()
}: AuthMiddlewareDependencies): AuthMiddleware {
  const authenticate: RequestHandler = (req, res, next) => {
    const authHeader = req.header('authorization');
    if (!authHeader?.startsWith('Bearer ')) {
      next(new UnauthorizedError('Missing bearer token'));
      return;
    }

    const token = authHeader.replace('Bearer ', '').trim();

    let email: string;
    try {
      email = verifyJwt(token, secret, clock()).email.toLowerCase();
    } catch (error) {
      (res.locals.logger ?? logger).warn({ err: error }, 'Rejected bearer token');
      next(new UnauthorizedError('Invalid token'));
      return;
    }

    res.locals.caller = { email, isAdmin: false };
    updateLoggerContext(res, { email });
    next();
  };

  const resolveQueueAdmin: RequestHandler = async (req, res, next) => {
    const caller = res.locals.caller;
    if (!caller) {
      next(new UnauthorizedError('Missing auth context'));
      return;
    }

    const queueId = req.params.queueId;
    if (!queueId) {
      next();
      return;
    }

    try {
      const isAdmin = await admins.isQueueAdmin(queueId, caller.email);
      res.locals.caller = { ...caller, isAdmin };
      updateLoggerContext(res, { queueId });
      next();
    } catch (error) {
      next(error);
    }
  };

  return { authenticate, resolveQueueAdmin };
}

function updateLoggerContext(res: Response, extra: Record<string, string>): void {
  const merged = {
    ...(res.locals.logContext ?? {}),
    ...extra
  };
  res.locals.logContext = merged;
  res.locals.logger = logger.withContext(merged);
}
