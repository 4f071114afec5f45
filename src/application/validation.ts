import { BadRequestError, ForbiddenError } from '@officehours/shared';

import type { AppointmentDetails, AppointmentSlot } from '../domain/appointmentSlot';
import type { AppointmentPayload } from '../dtos';

export interface CompleteAppointmentPayload extends AppointmentDetails {
  name: string;
  description: string;
  location: string;
  timeslot?: number;
}

const REQUIRED_FIELDS = ['name', 'description', 'location'] as const;

export function requireCompletePayload(payload: AppointmentPayload): CompleteAppointmentPayload {
  const { name, description, location } = payload;

  if (!name?.trim() || !description?.trim() || !location?.trim()) {
    const missing = REQUIRED_FIELDS.filter((field) => !payload[field]?.trim());
    throw new BadRequestError('It looks like you left out some fields in the appointment.', {
      missing
    });
  }

  return {
    name,
    description,
    location,
    timeslot: payload.timeslot,
    mapX: payload.mapX ?? 0,
    mapY: payload.mapY ?? 0
  };
}

export function assertOwnedBy(
  appointment: AppointmentSlot,
  email: string,
  action: 'update' | 'delete'
): void {
  if (!appointment.isOwnedBy(email)) {
    throw new ForbiddenError(`You can't ${action} someone else's appointment!`, {
      appointmentId: appointment.id
    });
  }
}

export function assertNotInPast(time: Date, now: Date, message: string): void {
  if (now.getTime() > time.getTime()) {
    throw new BadRequestError(message, {
      scheduledTime: time.toISOString(),
      now: now.toISOString()
    });
  }
}
