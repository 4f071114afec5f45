import type { AppointmentDetails, AppointmentSlot } from '../domain/appointmentSlot';
import type { AppointmentSchedule } from '../domain/schedule';

// One capability per question the booking coordinator asks, so each operation
// (and each test fake) depends on exactly what it uses.

export interface AppointmentFinder {
  getAppointment(id: string): Promise<AppointmentSlot | null>;
}

/** Every row, claimed or open, scheduled in `[from, to)`. */
export interface AppointmentsInWindowReader {
  getAppointments(queueId: string, from: Date, to: Date): Promise<AppointmentSlot[]>;
}

export interface StudentAppointmentsReader {
  getAppointmentsForUser(
    queueId: string,
    from: Date,
    to: Date,
    email: string
  ): Promise<AppointmentSlot[]>;
}

export interface TimeslotAppointmentsReader {
  getAppointmentsByTimeslot(
    queueId: string,
    from: Date,
    to: Date,
    timeslot: number
  ): Promise<AppointmentSlot[]>;
}

export interface AppointmentInserter {
  insertAppointment(appointment: AppointmentSlot): Promise<AppointmentSlot>;
}

export interface AppointmentDetailsWriter {
  updateAppointmentDetails(id: string, details: AppointmentDetails): Promise<void>;
}

export interface AppointmentSignupRemover {
  /** Clears the student on the row; the row itself stays behind as an open slot. */
  removeAppointmentSignup(id: string): Promise<void>;
}

export interface OpenSlotClaimer {
  /**
   * Assigns `email` to one open row at `timeslot` in `[from, to)`, only if that
   * row is still unclaimed when written. Resolves null when none was left.
   */
  claimOpenSlot(
    queueId: string,
    from: Date,
    to: Date,
    timeslot: number,
    email: string
  ): Promise<AppointmentSlot | null>;
}

export interface ScheduleReader {
  getScheduleForDay(queueId: string, day: number): Promise<AppointmentSchedule | null>;
  getSchedules(queueId: string): Promise<AppointmentSchedule[]>;
}

export interface ScheduleWriter {
  replaceSchedule(schedule: AppointmentSchedule): Promise<void>;
}

export interface QueueAdminReader {
  isQueueAdmin(queueId: string, email: string): Promise<boolean>;
}

export type AppointmentRepository = AppointmentFinder &
  AppointmentsInWindowReader &
  StudentAppointmentsReader &
  TimeslotAppointmentsReader &
  AppointmentInserter &
  AppointmentDetailsWriter &
  AppointmentSignupRemover &
  OpenSlotClaimer &
  ScheduleReader &
  ScheduleWriter &
  QueueAdminReader;

export type BookingLockMode = 'exclusive' | 'shared';

export interface BookingLockKey {
  key: string;
  mode: BookingLockMode;
}

/** A bare key is held exclusively. */
export type BookingLockRequest = string | BookingLockKey;

/**
 * Mutual exclusion for a check-then-write. `work` runs while the caller holds
 * every key, against a repository whose reads see all writes made by earlier
 * holders of those keys. Shared holders of a key run alongside each other but
 * never alongside an exclusive holder.
 */
export interface BookingLocks {
  withBookingLock<T>(
    keys: readonly BookingLockRequest[],
    work: (repository: AppointmentRepository) => Promise<T>
  ): Promise<T>;
}

export type BookingStore = AppointmentRepository & BookingLocks;
