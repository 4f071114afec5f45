export const APPOINTMENT_SIGNED_UP_EVENT = 'appointment.signed_up';
export const APPOINTMENT_CLAIMED_EVENT = 'appointment.claimed';
export const APPOINTMENT_MOVED_EVENT = 'appointment.moved';
export const APPOINTMENT_CANCELLED_EVENT = 'appointment.cancelled';
export const SCHEDULE_UPDATED_EVENT = 'schedule.updated';

export interface AppointmentSignedUpEvent {
  appointmentId: string;
  queueId: string;
  timeslot: number;
  scheduledTime: string;
  studentEmail: string;
}

export interface AppointmentMovedEvent extends AppointmentSignedUpEvent {
  previousAppointmentId: string;
  previousTimeslot: number;
}

export interface AppointmentCancelledEvent {
  appointmentId: string;
  queueId: string;
  timeslot: number;
  scheduledTime: string;
  cancelledAt: string;
  /** The student for a cancel, the admin for an unclaim. */
  cancelledBy: string;
}

export interface ScheduleUpdatedEvent {
  queueId: string;
  day: number;
  duration: number;
  timeslots: number;
  updatedBy: string;
}
