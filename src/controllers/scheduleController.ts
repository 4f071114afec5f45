import { Router } from 'express';

import { runWithSpan } from '@officehours/shared';

import { dayParamsSchema, queueParamsSchema, updateScheduleBodySchema } from '../dtos';
import type { BookingCoordinator } from '../application/services/bookingCoordinator';
import type { AuthMiddleware } from '../infrastructure/http/authMiddleware';
import { parseRouteParams, requireCaller } from './routeParams';

export interface ScheduleControllerDependencies {
  coordinator: BookingCoordinator;
  auth: AuthMiddleware;
}

export function createScheduleController({ coordinator, auth }: ScheduleControllerDependencies): Router {
  const router = Router();

  router.get('/queues/:queueId/schedule', auth.authenticate, async (req, res, next) => {
    try {
      const params = parseRouteParams(queueParamsSchema, req.params);
      const schedules = await runWithSpan('Controller:GET /queues/:queueId/schedule', () =>
        coordinator.getSchedule(params.queueId)
      );
      res.status(200).json(schedules);
    } catch (error) {
      next(error);
    }
  });

  router.get('/queues/:queueId/schedule/:day', auth.authenticate, async (req, res, next) => {
    try {
      const params = parseRouteParams(dayParamsSchema, req.params);
      const schedule = await runWithSpan('Controller:GET /queues/:queueId/schedule/:day', () =>
        coordinator.getScheduleForDay(params.queueId, params.day)
      );
      res.status(200).json(schedule);
    } catch (error) {
      next(error);
    }
  });

  router.put(
    '/queues/:queueId/schedule/:day',
    auth.authenticate,
    auth.resolveQueueAdmin,
    async (req, res, next) => {
      try {
        const params = parseRouteParams(dayParamsSchema, req.params);
        const body = updateScheduleBodySchema.parse(req.body);
        const caller = requireCaller(res);

        await runWithSpan('Controller:PUT /queues/:queueId/schedule/:day', () =>
          coordinator.updateAppointmentSchedule(params.queueId, params.day, body, caller)
        );
        res.status(204).end();
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
