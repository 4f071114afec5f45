import { Router } from 'express';

import { logger, runWithSpan } from '@officehours/shared';

import {
  appointmentParamsSchema,
  appointmentPayloadSchema,
  dayParamsSchema,
  queueAppointmentParamsSchema,
  timeslotParamsSchema
} from '../dtos';
import type { BookingCoordinator } from '../application/services/bookingCoordinator';
import type { AuthMiddleware } from '../infrastructure/http/authMiddleware';
import { parseRouteParams, requireCaller } from './routeParams';

export interface AppointmentControllerDependencies {
  coordinator: BookingCoordinator;
  auth: AuthMiddleware;
}

export function createAppointmentController({
  coordinator,
  auth
}: AppointmentControllerDependencies): Router {
  const router = Router();

  router.get(
    '/queues/:queueId/appointments/:day',
    auth.authenticate,
    auth.resolveQueueAdmin,
    async (req, res, next) => {
      try {
        await runWithSpan('Controller:GET /queues/:queueId/appointments/:day', async () => {
          const params = parseRouteParams(dayParamsSchema, req.params);
          const caller = requireCaller(res);

          const appointments = await coordinator.getAppointments(params.queueId, params.day, caller);
          res.status(200).json(appointments);
        });
      } catch (error) {
        next(error);
      }
    }
  );

  router.get('/queues/:queueId/appointments/:day/@me', auth.authenticate, async (req, res, next) => {
    try {
      await runWithSpan('Controller:GET /queues/:queueId/appointments/:day/@me', async () => {
        const params = parseRouteParams(dayParamsSchema, req.params);
        const caller = requireCaller(res);

        const appointments = await coordinator.getMyAppointments(params.queueId, params.day, caller.email);
        res.status(200).json(appointments);
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete(
    '/queues/:queueId/appointments/:appointmentId/claim',
    auth.authenticate,
    auth.resolveQueueAdmin,
    async (req, res, next) => {
      try {
        await runWithSpan('Controller:DELETE /queues/:queueId/appointments/:appointmentId/claim', async () => {
          const params = parseRouteParams(queueAppointmentParamsSchema, req.params);
          const caller = requireCaller(res);

          await coordinator.unclaimAppointment(params.queueId, params.appointmentId, caller);
          res.status(204).end();
        });
      } catch (error) {
        next(error);
      }
    }
  );

  router.post(
    '/queues/:queueId/appointments/:day/:timeslot',
    auth.authenticate,
    async (req, res, next) => {
      try {
        await runWithSpan('Controller:POST /queues/:queueId/appointments/:day/:timeslot', async () => {
          const params = parseRouteParams(timeslotParamsSchema, req.params);
          const payload = appointmentPayloadSchema.parse(req.body);
          const caller = requireCaller(res);

          const requestLogger = res.locals.logger ?? logger.withContext({ email: caller.email });
          requestLogger.info({ params }, 'Signing up for appointment');

          const appointment = await coordinator.signupForAppointment(
            params.queueId,
            params.day,
            params.timeslot,
            payload,
            caller.email
          );
          res.status(201).json(appointment);
        });
      } catch (error) {
        next(error);
      }
    }
  );

  router.post(
    '/queues/:queueId/appointments/:day/:timeslot/claim',
    auth.authenticate,
    async (req, res, next) => {
      try {
        await runWithSpan('Controller:POST /queues/:queueId/appointments/:day/:timeslot/claim', async () => {
          const params = parseRouteParams(timeslotParamsSchema, req.params);
          const caller = requireCaller(res);

          const appointment = await coordinator.claimTimeslot(
            params.queueId,
            params.day,
            params.timeslot,
            caller.email
          );
          res.status(201).json(appointment);
        });
      } catch (error) {
        next(error);
      }
    }
  );

  router.put('/appointments/:appointmentId', auth.authenticate, async (req, res, next) => {
    try {
      await runWithSpan('Controller:PUT /appointments/:appointmentId', async () => {
        const params = parseRouteParams(appointmentParamsSchema, req.params);
        const payload = appointmentPayloadSchema.parse(req.body);
        const caller = requireCaller(res);

        const outcome = await coordinator.updateAppointment(params.appointmentId, payload, caller.email);
        if (outcome.kind === 'moved') {
          res.status(201).json(outcome.appointment);
          return;
        }
        res.status(204).end();
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/appointments/:appointmentId', auth.authenticate, async (req, res, next) => {
    try {
      await runWithSpan('Controller:DELETE /appointments/:appointmentId', async () => {
        const params = parseRouteParams(appointmentParamsSchema, req.params);
        const caller = requireCaller(res);

        const outcome = await coordinator.removeAppointmentSignup(params.appointmentId, caller.email);
        if (outcome === 'already-removed') {
          res.status(200).end();
          return;
        }
        res.status(204).end();
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
