import path from 'node:path';
import type { IncomingMessage } from 'http';
import type { Level } from 'pino';
import type { Express, Request, Response } from 'express';
import express from 'express';
import pinoHttp from 'pino-http';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';

import {
  config,
  logger,
  metricsRouter,
  metricsMiddleware,
  traceMiddleware,
  getCurrentTraceId,
  type IEventBus
} from '@officehours/shared';

import { BookingCoordinator } from './application/services/bookingCoordinator';
import { createAppointmentController } from './controllers/appointmentController';
import { createScheduleController } from './controllers/scheduleController';
import { createAuthMiddleware } from './infrastructure/http/authMiddleware';
import { errorMapper } from './infrastructure/http/errorMapper';
import type { BookingStore } from './repository/IAppointmentRepository';
import { InMemoryAppointmentRepository } from './repository/InMemoryAppointmentRepository';
import { PostgresAppointmentRepository } from './repository/PostgresAppointmentRepository';

const openApiPath = path.resolve(process.cwd(), 'docs/openapi.yaml');
let openApiDocument: Record<string, unknown> | undefined;

try {
  openApiDocument = YAML.load(openApiPath);
} catch (error) {
  logger.warn({ err: error, openApiPath }, 'Failed to load OpenAPI document');
}

export interface AppDependencies {
  store?: BookingStore;
  eventBus?: IEventBus;
  clock?: () => Date;
}

export function createBookingStore(): BookingStore {
  return config.PERSISTENCE_DRIVER === 'postgres'
    ? new PostgresAppointmentRepository()
    : new InMemoryAppointmentRepository();
}

export function createApp(dependencies: AppDependencies = {}): Express {
  const app = express();
  const store = dependencies.store ?? createBookingStore();
  const coordinator = new BookingCoordinator(store, {
    eventBus: dependencies.eventBus,
    clock: dependencies.clock,
    timeZone: config.SCHEDULE_TIME_ZONE
  });
  const auth = createAuthMiddleware({
    secret: config.JWT_SECRET,
    admins: store,
    clock: dependencies.clock
  });

  app.use(traceMiddleware);
  app.disable('x-powered-by');
  app.use(express.json());

  app.use(
    pinoHttp({
      logger,
      customLogLevel: (
        _req: IncomingMessage,
        res: Response,
        err: Error | undefined
      ): Level => {
        if (err || res.statusCode >= 500) return 'error';
        if (res.statusCode >= 400) return 'warn';
        return 'info';
      }
    })
  );

  app.use((req, res, next) => {
    const contextFields = { traceId: getCurrentTraceId() };
    res.locals.logContext = contextFields;
    res.locals.logger = logger.withContext(contextFields);
    res.locals.logger.debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  if (config.METRICS_ENABLED) {
    app.use(metricsMiddleware);
    app.use(metricsRouter);
  }

  if (openApiDocument) {
    app.use('/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  }

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      service: config.SERVICE_NAME,
      persistence: config.PERSISTENCE_DRIVER
    });
  });

  app.use(createScheduleController({ coordinator, auth }));
  app.use(createAppointmentController({ coordinator, auth }));

  app.use(errorMapper);

  return app;
}
