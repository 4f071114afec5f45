import { z } from 'zod';

const isoDateTimeSchema = z.string().datetime();

export const appointmentResourceSchema = z.object({
  id: z.string().uuid(),
  queueId: z.string().min(1),
  timeslot: z.number().int().nonnegative(),
  scheduledTime: isoDateTimeSchema,
  duration: z.number().int().positive(),
  studentEmail: z.string().nullable(),
  name: z.string().nullable(),
  description: z.string().nullable(),
  location: z.string().nullable(),
  mapX: z.number(),
  mapY: z.number(),
  createdAt: isoDateTimeSchema,
  updatedAt: isoDateTimeSchema
});

/**
 * Body of a signup or update. The text fields are nullable here on purpose:
 * completeness is checked by the booking coordinator so that a missing field
 * gets the same answer whichever route it arrives through.
 */
export const appointmentPayloadSchema = z.object({
  name: z.string().nullish(),
  description: z.string().nullish(),
  location: z.string().nullish(),
  timeslot: z.number().int().nonnegative().optional(),
  mapX: z.number().finite().nullish(),
  mapY: z.number().finite().nullish()
});

export type AppointmentResource = z.infer<typeof appointmentResourceSchema>;
export type AppointmentPayload = z.infer<typeof appointmentPayloadSchema>;
