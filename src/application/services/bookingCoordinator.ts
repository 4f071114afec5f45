import {
  AppError,
  ConflictError,
  ForbiddenError,
  InternalError,
  NotFoundError,
  bookingMetrics,
  config,
  getEventBus,
  logger,
  runWithSpan,
  setSpanAttributes,
  APPOINTMENT_CANCELLED_EVENT,
  APPOINTMENT_CLAIMED_EVENT,
  APPOINTMENT_MOVED_EVENT,
  APPOINTMENT_SIGNED_UP_EVENT,
  SCHEDULE_UPDATED_EVENT,
  type AppointmentCancelledEvent,
  type AppointmentMovedEvent,
  type AppointmentSignedUpEvent,
  type IEventBus,
  type ScheduleUpdatedEvent,
  type SharedLogger
} from '@officehours/shared';

import { AppointmentSlot, type AppointmentDetails } from '../../domain/appointmentSlot';
import { openSlots } from '../../domain/capacity';
import { AppointmentSchedule } from '../../domain/schedule';
import { FAR_FUTURE, currentWeekday, weekdayBounds, type TimeWindow } from '../../domain/timeWindow';
import type {
  AppointmentPayload,
  AppointmentResource,
  AppointmentScheduleResource,
  UpdateScheduleBody
} from '../../dtos';
import type {
  BookingLockKey,
  BookingStore,
  ScheduleReader,
  StudentAppointmentsReader,
  TimeslotAppointmentsReader
} from '../../repository/IAppointmentRepository';
import { assertNotInPast, assertOwnedBy, requireCompletePayload } from '../validation';

export interface Caller {
  email: string;
  isAdmin: boolean;
}

export interface BookingCoordinatorOptions {
  eventBus?: IEventBus;
  clock?: () => Date;
  /** Reference zone for weekday windows; defaults to SCHEDULE_TIME_ZONE. */
  timeZone?: string;
}

export type UpdateAppointmentOutcome =
  | { kind: 'updated' }
  | { kind: 'moved'; appointment: AppointmentResource };

export type RemoveSignupOutcome = 'removed' | 'already-removed';

function timeslotLockKey(queueId: string, window: TimeWindow, timeslot: number): string {
  return `timeslot:${queueId}:${window.start.toISOString()}:${timeslot}`;
}

function studentLockKey(queueId: string, email: string): string {
  return `student:${queueId}:${email}`;
}

function scheduleLockKey(queueId: string, window: TimeWindow): string {
  return `schedule:${queueId}:${window.start.toISOString()}`;
}

// Bookings share the day's schedule key; a schedule edit takes it exclusively.
function bookingScheduleLock(queueId: string, window: TimeWindow): BookingLockKey {
  return { key: scheduleLockKey(queueId, window), mode: 'shared' };
}

function warnOnRejection(log: SharedLogger, error: unknown, message: string): void {
  if (error instanceof AppError && error.status < 500) {
    log.warn({ reason: error.message, details: error.details }, message);
  }
}

/**
 * Creates, moves and cancels appointment claims against a queue's weekly
 * schedule. The schedule read, the capacity check and the write that depends
 * on them run in one booking-lock scope, so a timeslot never holds more claims
 * than its current capacity.
 */
export class BookingCoordinator {
  private readonly eventBus: IEventBus;
  private readonly clock: () => Date;
  private readonly timeZone: string;

  constructor(
    private readonly store: BookingStore,
    options: BookingCoordinatorOptions = {}
  ) {
    this.eventBus = options.eventBus ?? getEventBus();
    this.clock = options.clock ?? (() => new Date());
    this.timeZone = options.timeZone ?? config.SCHEDULE_TIME_ZONE;
  }

  async getAppointments(queueId: string, day: number, caller: Caller): Promise<AppointmentResource[]> {
    const { start, end } = weekdayBounds(day, this.clock(), this.timeZone);
    const appointments = await this.persistence(
      'getAppointments',
      () =>
        caller.isAdmin
          ? this.store.getAppointments(queueId, start, end)
          : this.store.getAppointmentsForUser(queueId, start, end, caller.email),
      { queueId, day }
    );

    return appointments.map((appointment) => appointment.toDTO());
  }

  /** The caller's own rows for the day, whether or not they administer the queue. */
  async getMyAppointments(queueId: string, day: number, email: string): Promise<AppointmentResource[]> {
    const { start, end } = weekdayBounds(day, this.clock(), this.timeZone);
    const appointments = await this.persistence(
      'getAppointmentsForUser',
      () => this.store.getAppointmentsForUser(queueId, start, end, email),
      { queueId, day }
    );

    return appointments.map((appointment) => appointment.toDTO());
  }

  async getSchedule(queueId: string): Promise<AppointmentScheduleResource[]> {
    const schedules = await this.persistence('getSchedules', () => this.store.getSchedules(queueId), {
      queueId
    });
    return schedules.map((schedule) => schedule.toDTO());
  }

  async getScheduleForDay(queueId: string, day: number): Promise<AppointmentScheduleResource> {
    const schedule = await this.persistence(
      'getScheduleForDay',
      () => this.store.getScheduleForDay(queueId, day),
      { queueId, day }
    );

    if (!schedule) {
      throw new NotFoundError('There is no appointment schedule for that day.', { queueId, day });
    }

    return schedule.toDTO();
  }

  async claimTimeslot(
    queueId: string,
    day: number,
    timeslot: number,
    email: string
  ): Promise<AppointmentResource> {
    const log = logger.withContext({ queueId, day, timeslot, email });

    return runWithSpan(
      'BookingCoordinator.claimTimeslot',
      async () => {
        try {
          const now = this.clock();
          const window = weekdayBounds(day, now, this.timeZone);

          const claimed = await this.persistence(
            'claimTimeslot',
            () =>
              this.store.withBookingLock(
                [bookingScheduleLock(queueId, window), timeslotLockKey(queueId, window, timeslot)],
                async (repository) => {
                  const { schedule, capacity } = await this.loadTimeslot(repository, queueId, day, timeslot);
                  assertNotInPast(
                    schedule.timeslotStart(window.start, timeslot),
                    now,
                    "You can't claim a timeslot that has already started!"
                  );
                  await this.ensureOpenCapacity(repository, queueId, window, timeslot, capacity);

                  const slot = await repository.claimOpenSlot(
                    queueId,
                    window.start,
                    window.end,
                    timeslot,
                    email
                  );
                  if (!slot) {
                    bookingMetrics.conflicts.inc({ reason: 'already_claimed' });
                    throw new ConflictError(
                      'Failed to claim timeslot. Perhaps it has already been claimed?',
                      { timeslot }
                    );
                  }
                  return slot;
                }
              ),
            { queueId, day, timeslot }
          );

          bookingMetrics.claims.inc();
          setSpanAttributes({ 'booking.appointment_id': claimed.id });
          log.info({ appointmentId: claimed.id }, 'Appointment claimed');
          await this.publish(APPOINTMENT_CLAIMED_EVENT, this.signedUpEvent(claimed, email));

          return claimed.toDTO();
        } catch (error) {
          warnOnRejection(log, error, 'Timeslot claim rejected');
          throw error;
        }
      },
      { queueId, day, timeslot }
    );
  }

  async signupForAppointment(
    queueId: string,
    day: number,
    timeslot: number,
    payload: AppointmentPayload,
    email: string
  ): Promise<AppointmentResource> {
    const log = logger.withContext({ queueId, day, timeslot, email });

    return runWithSpan(
      'BookingCoordinator.signupForAppointment',
      async () => {
        const operationStart = process.hrtime.bigint();

        try {
          const details = requireCompletePayload(payload);
          const now = this.clock();
          const window = weekdayBounds(day, now, this.timeZone);

          const created = await this.persistence(
            'signupForAppointment',
            () =>
              this.store.withBookingLock(
                [
                  bookingScheduleLock(queueId, window),
                  timeslotLockKey(queueId, window, timeslot),
                  studentLockKey(queueId, email)
                ],
                async (repository) => {
                  const { schedule, capacity } = await this.loadTimeslot(
                    repository,
                    queueId,
                    day,
                    timeslot
                  );
                  const scheduledTime = schedule.timeslotStart(window.start, timeslot);
                  assertNotInPast(scheduledTime, now, "You can't sign up for an appointment in the past!");

                  await this.ensureOpenCapacity(repository, queueId, window, timeslot, capacity);
                  await this.ensureNoActiveBooking(repository, queueId, email, now, schedule.duration);

                  return repository.insertAppointment(
                    AppointmentSlot.claim({
                      queueId,
                      timeslot,
                      scheduledTime,
                      duration: schedule.duration,
                      studentEmail: email,
                      ...this.detailsOf(details),
                      now
                    })
                  );
                }
              ),
            { queueId, day, timeslot }
          );

          bookingMetrics.signups.inc();
          setSpanAttributes({ 'booking.appointment_id': created.id });
          log.info({ appointmentId: created.id }, 'New appointment sign up');
          await this.publish(APPOINTMENT_SIGNED_UP_EVENT, this.signedUpEvent(created, email));

          return created.toDTO();
        } catch (error) {
          warnOnRejection(log, error, 'Appointment sign up rejected');
          throw error;
        } finally {
          const durationSeconds = Number(process.hrtime.bigint() - operationStart) / 1_000_000_000;
          bookingMetrics.signupDuration.observe(durationSeconds);
        }
      },
      { queueId, day, timeslot }
    );
  }

  /**
   * Rewrites an appointment's details, or moves it when the payload names a
   * different timeslot. A move always lands on the current weekday and is
   * insert-then-remove: the new row is written first, so a failure part-way
   * leaves the student with two bookings rather than none.
   */
  async updateAppointment(
    appointmentId: string,
    payload: AppointmentPayload,
    email: string
  ): Promise<UpdateAppointmentOutcome> {
    const log = logger.withContext({ appointmentId, email });

    return runWithSpan(
      'BookingCoordinator.updateAppointment',
      async () => {
        try {
          const existing = await this.findAppointment(appointmentId);
          if (!existing.isClaimed) {
            throw new NotFoundError(
              "This appointment doesn't exist. Perhaps it was already deleted?",
              { appointmentId }
            );
          }
          assertOwnedBy(existing, email, 'update');

          const details = requireCompletePayload(payload);
          const timeslot = details.timeslot ?? existing.timeslot;

          if (timeslot === existing.timeslot) {
            await this.persistence(
              'updateAppointmentDetails',
              () => this.store.updateAppointmentDetails(existing.id, this.detailsOf(details)),
              { appointmentId }
            );
            log.info('Updated appointment');
            return { kind: 'updated' };
          }

          const now = this.clock();
          const day = currentWeekday(now, this.timeZone);
          const window = weekdayBounds(day, now, this.timeZone);
          const scheduledTime = new Date(
            window.start.getTime() + existing.duration * timeslot * 60_000
          );
          assertNotInPast(
            scheduledTime,
            now,
            "You can't change your appointment to the past! Let us know if you have a time machine."
          );

          const created = await this.persistence(
            'moveAppointment',
            () =>
              this.store.withBookingLock(
                [
                  bookingScheduleLock(existing.queueId, window),
                  timeslotLockKey(existing.queueId, window, timeslot),
                  studentLockKey(existing.queueId, email)
                ],
                async (repository) => {
                  // A concurrent move or cancel may have released it since it was read.
                  const current = await repository.getAppointment(existing.id);
                  if (!current?.isOwnedBy(email)) {
                    throw new NotFoundError(
                      "This appointment doesn't exist. Perhaps it was already deleted?",
                      { appointmentId }
                    );
                  }

                  const { schedule, capacity } = await this.loadTimeslot(
                    repository,
                    existing.queueId,
                    day,
                    timeslot
                  );
                  await this.ensureOpenCapacity(
                    repository,
                    existing.queueId,
                    window,
                    timeslot,
                    capacity
                  );
                  await this.ensureNoActiveBooking(
                    repository,
                    existing.queueId,
                    email,
                    now,
                    schedule.duration,
                    existing.id
                  );

                  return repository.insertAppointment(
                    AppointmentSlot.claim({
                      queueId: existing.queueId,
                      timeslot,
                      scheduledTime,
                      duration: existing.duration,
                      studentEmail: email,
                      ...this.detailsOf(details),
                      now
                    })
                  );
                }
              ),
            { appointmentId, timeslot }
          );
          log.info({ newAppointmentId: created.id }, 'Created appointment for move');

          try {
            await this.store.removeAppointmentSignup(existing.id);
          } catch (error) {
            bookingMetrics.moveCleanupFailures.inc();
            log.error(
              { err: error, newAppointmentId: created.id },
              'Failed to remove old appointment after move'
            );
            throw new InternalError(
              'Your new appointment is booked, but we could not release your old one. Please cancel it again.',
              {
                appointmentId: existing.id,
                createdAppointmentId: created.id,
                retryable: true
              }
            );
          }

          bookingMetrics.moves.inc();
          setSpanAttributes({ 'booking.appointment_id': created.id });
          log.info({ newAppointmentId: created.id }, 'Removed old appointment after move');

          const moved: AppointmentMovedEvent = {
            ...this.signedUpEvent(created, email),
            previousAppointmentId: existing.id,
            previousTimeslot: existing.timeslot
          };
          await this.publish(APPOINTMENT_MOVED_EVENT, moved);

          return { kind: 'moved', appointment: created.toDTO() };
        } catch (error) {
          warnOnRejection(log, error, 'Appointment update rejected');
          throw error;
        }
      },
      { appointmentId }
    );
  }

  /** Repeating a cancel is a no-op, not an error. */
  async removeAppointmentSignup(appointmentId: string, email: string): Promise<RemoveSignupOutcome> {
    const log = logger.withContext({ appointmentId, email });

    return runWithSpan(
      'BookingCoordinator.removeAppointmentSignup',
      async () => {
        try {
          const existing = await this.findAppointment(appointmentId);
          if (!existing.isClaimed) {
            log.warn('Attempted to remove signup for already removed appointment');
            return 'already-removed';
          }

          assertOwnedBy(existing, email, 'delete');

          const now = this.clock();
          assertNotInPast(
            existing.scheduledTime,
            now,
            "You can't delete an appointment that already happened!"
          );

          const removed = await this.persistence(
            'removeAppointmentSignup',
            () =>
              this.store.withBookingLock(
                [studentLockKey(existing.queueId, email)],
                async (repository) => {
                  const current = await repository.getAppointment(existing.id);
                  if (!current?.isOwnedBy(email)) {
                    return false;
                  }
                  await repository.removeAppointmentSignup(existing.id);
                  return true;
                }
              ),
            { appointmentId }
          );
          if (!removed) {
            log.warn('Appointment was released while the cancel was waiting');
            return 'already-removed';
          }

          bookingMetrics.cancellations.inc();
          log.info('Removed signup for appointment');

          const cancelled: AppointmentCancelledEvent = {
            appointmentId: existing.id,
            queueId: existing.queueId,
            timeslot: existing.timeslot,
            scheduledTime: existing.scheduledTime.toISOString(),
            cancelledAt: now.toISOString(),
            cancelledBy: email
          };
          await this.publish(APPOINTMENT_CANCELLED_EVENT, cancelled);

          return 'removed';
        } catch (error) {
          warnOnRejection(log, error, 'Appointment removal rejected');
          throw error;
        }
      },
      { appointmentId }
    );
  }

  /**
   * Admin removal of a student's claim. The row stays behind as an open slot,
   * and unclaiming an already open row changes nothing.
   */
  async unclaimAppointment(queueId: string, appointmentId: string, caller: Caller): Promise<void> {
    const log = logger.withContext({ queueId, appointmentId, email: caller.email });

    return runWithSpan(
      'BookingCoordinator.unclaimAppointment',
      async () => {
        try {
          if (!caller.isAdmin) {
            throw new ForbiddenError("Only queue admins can remove someone else's claim.", {
              queueId
            });
          }

          const existing = await this.findAppointment(appointmentId);
          if (existing.queueId !== queueId) {
            throw new NotFoundError("I called for help, but I couldn't find that appointment anywhere.", {
              appointmentId
            });
          }

          const student = existing.studentEmail;
          if (student === null) {
            log.info('Appointment claim was already removed');
            return;
          }

          const removed = await this.persistence(
            'unclaimAppointment',
            () =>
              this.store.withBookingLock([studentLockKey(queueId, student)], async (repository) => {
                const current = await repository.getAppointment(existing.id);
                if (!current?.isOwnedBy(student)) {
                  return false;
                }
                await repository.removeAppointmentSignup(existing.id);
                return true;
              }),
            { appointmentId }
          );
          if (!removed) {
            log.info('Appointment claim was already removed');
            return;
          }

          bookingMetrics.cancellations.inc();
          log.info({ student }, 'Removed appointment claim');

          const cancelled: AppointmentCancelledEvent = {
            appointmentId: existing.id,
            queueId: existing.queueId,
            timeslot: existing.timeslot,
            scheduledTime: existing.scheduledTime.toISOString(),
            cancelledAt: this.clock().toISOString(),
            cancelledBy: caller.email
          };
          await this.publish(APPOINTMENT_CANCELLED_EVENT, cancelled);
        } catch (error) {
          warnOnRejection(log, error, 'Appointment unclaim rejected');
          throw error;
        }
      },
      { queueId, appointmentId }
    );
  }

  async updateAppointmentSchedule(
    queueId: string,
    day: number,
    input: UpdateScheduleBody,
    caller: Caller
  ): Promise<AppointmentScheduleResource> {
    const log = logger.withContext({ queueId, day, email: caller.email });

    return runWithSpan(
      'BookingCoordinator.updateAppointmentSchedule',
      async () => {
        try {
          if (!caller.isAdmin) {
            throw new ForbiddenError('Only queue admins can change the appointment schedule.', {
              queueId
            });
          }

          const schedule = AppointmentSchedule.define({
            queueId,
            day,
            duration: input.duration,
            schedule: input.schedule
          });
          const window = weekdayBounds(day, this.clock(), this.timeZone);

          await this.persistence(
            'updateAppointmentSchedule',
            () =>
              this.store.withBookingLock([scheduleLockKey(queueId, window)], async (repository) => {
                const appointments = await repository.getAppointments(
                  queueId,
                  window.start,
                  window.end
                );
                if (appointments.length > 0) {
                  bookingMetrics.conflicts.inc({ reason: 'schedule_locked' });
                  throw new ConflictError(
                    "The schedule can't be changed while there are appointments on that day.",
                    { appointments: appointments.length }
                  );
                }

                await repository.replaceSchedule(schedule);
              }),
            { queueId, day }
          );

          bookingMetrics.scheduleUpdates.inc();
          log.info({ timeslots: schedule.timeslots, duration: schedule.duration }, 'Updated appointment schedule');

          const updated: ScheduleUpdatedEvent = {
            queueId,
            day,
            duration: schedule.duration,
            timeslots: schedule.timeslots,
            updatedBy: caller.email
          };
          await this.publish(SCHEDULE_UPDATED_EVENT, updated);

          return schedule.toDTO();
        } catch (error) {
          warnOnRejection(log, error, 'Appointment schedule update rejected');
          throw error;
        }
      },
      { queueId, day }
    );
  }

  private async findAppointment(appointmentId: string): Promise<AppointmentSlot> {
    const appointment = await this.persistence(
      'getAppointment',
      () => this.store.getAppointment(appointmentId),
      { appointmentId }
    );

    if (!appointment) {
      throw new NotFoundError("I called for help, but I couldn't find that appointment anywhere.", {
        appointmentId
      });
    }

    return appointment;
  }

  private async loadTimeslot(
    reader: ScheduleReader,
    queueId: string,
    day: number,
    timeslot: number
  ): Promise<{ schedule: AppointmentSchedule; capacity: number }> {
    const schedule = await this.persistence(
      'getScheduleForDay',
      () => reader.getScheduleForDay(queueId, day),
      { queueId, day }
    );

    if (!schedule) {
      throw new NotFoundError('There is no appointment schedule for that day.', { queueId, day });
    }

    const capacity = schedule.capacityAt(timeslot);
    if (capacity === null) {
      throw new NotFoundError("That timeslot doesn't exist!", {
        timeslot,
        timeslots: schedule.timeslots
      });
    }

    return { schedule, capacity };
  }

  private async ensureOpenCapacity(
    reader: TimeslotAppointmentsReader,
    queueId: string,
    window: TimeWindow,
    timeslot: number,
    capacity: number
  ): Promise<void> {
    const appointments = await reader.getAppointmentsByTimeslot(
      queueId,
      window.start,
      window.end,
      timeslot
    );
    const open = openSlots(capacity, appointments);
    setSpanAttributes({ 'booking.capacity': capacity, 'booking.open_slots': open });

    if (open < 1) {
      bookingMetrics.conflicts.inc({ reason: 'capacity' });
      throw new ConflictError('There are no slots open at that time!', {
        timeslot,
        capacity,
        claimed: capacity - open
      });
    }
  }

  /**
   * At most one running or upcoming booking per student and queue. Anything
   * that started within the last slot length is still running.
   */
  private async ensureNoActiveBooking(
    reader: StudentAppointmentsReader,
    queueId: string,
    email: string,
    now: Date,
    duration: number,
    exceptAppointmentId?: string
  ): Promise<void> {
    const ongoingFrom = new Date(now.getTime() - duration * 60_000);
    const upcoming = (
      await reader.getAppointmentsForUser(queueId, ongoingFrom, FAR_FUTURE, email)
    ).filter((appointment) => appointment.id !== exceptAppointmentId);

    if (upcoming.length > 0) {
      bookingMetrics.conflicts.inc({ reason: 'active_booking' });
      throw new ConflictError('You already have an appointment in the future!', {
        appointmentId: upcoming[0]?.id
      });
    }
  }

  private detailsOf(payload: AppointmentDetails): AppointmentDetails {
    return {
      name: payload.name,
      description: payload.description,
      location: payload.location,
      mapX: payload.mapX,
      mapY: payload.mapY
    };
  }

  private signedUpEvent(appointment: AppointmentSlot, email: string): AppointmentSignedUpEvent {
    return {
      appointmentId: appointment.id,
      queueId: appointment.queueId,
      timeslot: appointment.timeslot,
      scheduledTime: appointment.scheduledTime.toISOString(),
      studentEmail: email
    };
  }

  private async publish<T>(eventName: string, payload: T): Promise<void> {
    try {
      await this.eventBus.publish(eventName, payload);
    } catch (error) {
      logger.warn({ err: error, event: eventName }, `Failed to publish ${eventName} event`);
    }
  }

  /**
   * Business-rule failures pass through untouched; anything else coming out of
   * the store is logged here and surfaces as a generic InternalError.
   */
  private async persistence<T>(
    operation: string,
    call: () => Promise<T>,
    context: Record<string, unknown>
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }

      logger.error({ err: error, operation, ...context }, 'Appointment store call failed');
      throw new InternalError('Something went wrong on our end. Please try again.', {
        retryable: true
      });
    }
  }
}
