import type { Request, Response, NextFunction } from 'express';
import { Router } from 'express';
import client, { Counter, Histogram } from 'prom-client';

const register = new client.Registry();
client.collectDefaultMetrics({ register });

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status'],
  registers: [register]
});

const signupDuration = new Histogram({
  name: 'appointment_signup_duration_seconds',
  help: 'End-to-end latency of appointment signups, lock wait included',
  buckets: [0.01, 0.025, 0.05, 0.1, 0.2, 0.5, 1, 3],
  registers: [register]
});

const signups = new Counter({
  name: 'appointment_signups_total',
  help: 'Appointments created through signup',
  registers: [register]
});

const claims = new Counter({
  name: 'appointment_claims_total',
  help: 'Templated timeslots claimed',
  registers: [register]
});

const moves = new Counter({
  name: 'appointment_moves_total',
  help: 'Appointments moved to another timeslot',
  registers: [register]
});

const cancellations = new Counter({
  name: 'appointment_cancellations_total',
  help: 'Appointment claims removed',
  registers: [register]
});

const conflicts = new Counter({
  name: 'appointment_conflicts_total',
  help: 'Booking attempts rejected with a conflict',
  labelNames: ['reason'],
  registers: [register]
});

const scheduleUpdates = new Counter({
  name: 'appointment_schedule_updates_total',
  help: 'Weekday schedules replaced by queue admins',
  registers: [register]
});

const moveCleanupFailures = new Counter({
  name: 'appointment_move_cleanup_failures_total',
  help: 'Moves whose new appointment was created but whose old claim could not be removed',
  registers: [register]
});

export const bookingMetrics = {
  signups,
  claims,
  moves,
  cancellations,
  conflicts,
  scheduleUpdates,
  moveCleanupFailures,
  signupDuration
};

export const metricsRouter = Router();

metricsRouter.get('/metrics', async (_req: Request, res: Response) => {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
});

export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationSeconds = Number(process.hrtime.bigint() - start) / 1_000_000_000;
    const route: unknown = req.route?.path;

    httpRequestDuration
      .labels(req.method, typeof route === 'string' ? route : req.path, String(res.statusCode))
      .observe(durationSeconds);
  });

  next();
}

export const metrics = {
  register,
  httpRequestDuration
};

export function resetAllMetrics(): void {
  register.resetMetrics();
}
