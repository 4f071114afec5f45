import { z } from 'zod';

export const appointmentScheduleResourceSchema = z.object({
  queueId: z.string().min(1),
  day: z.number().int().min(0).max(6),
  duration: z.number().int().positive(),
  schedule: z.string().regex(/^[0-9]*$/)
});

export const updateScheduleBodySchema = z.object({
  duration: z.number().int().positive(),
  schedule: z.string().regex(/^[0-9]*$/, 'Use one digit (0-9) per timeslot')
});

export type AppointmentScheduleResource = z.infer<typeof appointmentScheduleResourceSchema>;
export type UpdateScheduleBody = z.infer<typeof updateScheduleBodySchema>;
