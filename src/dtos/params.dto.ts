import { z } from 'zod';

export const queueParamsSchema = z.object({
  queueId: z.string().trim().min(1).max(64)
});

export const dayParamsSchema = queueParamsSchema.extend({
  day: z.coerce.number().int().min(0).max(6)
});

export const timeslotParamsSchema = dayParamsSchema.extend({
  timeslot: z.coerce.number().int().nonnegative()
});

export const appointmentParamsSchema = z.object({
  appointmentId: z.string().uuid()
});

export const queueAppointmentParamsSchema = queueParamsSchema.extend({
  appointmentId: z.string().uuid()
});

export type QueueParams = z.infer<typeof queueParamsSchema>;
export type DayParams = z.infer<typeof dayParamsSchema>;
export type TimeslotParams = z.infer<typeof timeslotParamsSchema>;
export type AppointmentParams = z.infer<typeof appointmentParamsSchema>;
export type QueueAppointmentParams = z.infer<typeof queueAppointmentParamsSchema>;
