import { BadRequestError } from '@officehours/shared';

import type { AppointmentScheduleResource } from '../dtos';

const MINUTES_PER_DAY = 24 * 60;

/**
 * Highest capacity a single timeslot can hold. The schedule is stored and
 * exchanged as one decimal digit per timeslot, so nine is a hard ceiling of
 * the format rather than a tunable limit.
 */
export const MAX_TIMESLOT_CAPACITY = 9;

export interface AppointmentScheduleProps {
  queueId: string;
  day: number;
  duration: number;
  schedule: string;
}

export interface AppointmentScheduleDatabaseRow {
  queue_id: string;
  day: number;
  duration: number;
  schedule: string;
}

/**
 * Capacity profile of one weekday in a queue: a slot duration in minutes and
 * one capacity digit per timeslot, starting at local midnight.
 */
export class AppointmentSchedule {
  private readonly capacities: readonly number[];

  private constructor(private readonly props: AppointmentScheduleProps) {
    this.capacities = Array.from(props.schedule, (digit) => digit.charCodeAt(0) - 48);
  }

  static define(props: AppointmentScheduleProps): AppointmentSchedule {
    if (!Number.isInteger(props.day) || props.day < 0 || props.day > 6) {
      throw new BadRequestError('Day must be between 0 (Sunday) and 6 (Saturday)', {
        day: props.day
      });
    }

    if (!Number.isInteger(props.duration) || props.duration <= 0) {
      throw new BadRequestError('Appointment duration must be a positive number of minutes', {
        duration: props.duration
      });
    }

    if (!/^[0-9]*$/.test(props.schedule)) {
      throw new BadRequestError(
        `Schedules are written as one digit (0-${MAX_TIMESLOT_CAPACITY}) per timeslot`,
        { schedule: props.schedule }
      );
    }

    if (props.schedule.length * props.duration > MINUTES_PER_DAY) {
      throw new BadRequestError('The schedule runs past the end of the day', {
        timeslots: props.schedule.length,
        duration: props.duration
      });
    }

    return new AppointmentSchedule({ ...props });
  }

  static fromPersistence(row: AppointmentScheduleDatabaseRow): AppointmentSchedule {
    return new AppointmentSchedule({
      queueId: row.queue_id,
      day: row.day,
      duration: row.duration,
      schedule: row.schedule
    });
  }

  get queueId(): string {
    return this.props.queueId;
  }

  get day(): number {
    return this.props.day;
  }

  get duration(): number {
    return this.props.duration;
  }

  get timeslots(): number {
    return this.capacities.length;
  }

  /** Capacity at `timeslot`, or null when the day has no such timeslot. */
  capacityAt(timeslot: number): number | null {
    if (!Number.isInteger(timeslot) || timeslot < 0 || timeslot >= this.capacities.length) {
      return null;
    }
    return this.capacities[timeslot] ?? null;
  }

  timeslotStart(windowStart: Date, timeslot: number): Date {
    return new Date(windowStart.getTime() + timeslot * this.props.duration * 60_000);
  }

  toPersistence(): AppointmentScheduleDatabaseRow {
    return {
      queue_id: this.props.queueId,
      day: this.props.day,
      duration: this.props.duration,
      schedule: this.props.schedule
    };
  }

  toDTO(): AppointmentScheduleResource {
    return {
      queueId: this.props.queueId,
      day: this.props.day,
      duration: this.props.duration,
      schedule: this.props.schedule
    };
  }
}
