import { v7 as uuidv7 } from 'uuid';

import type { AppointmentResource } from '../dtos';

export interface AppointmentDetails {
  name: string | null;
  description: string | null;
  location: string | null;
  mapX: number;
  mapY: number;
}

export interface AppointmentSlotProps extends AppointmentDetails {
  id: string;
  queueId: string;
  timeslot: number;
  scheduledTime: Date;
  duration: number;
  studentEmail: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type ClaimAppointmentProperties = Omit<
  AppointmentSlotProps,
  'id' | 'createdAt' | 'updatedAt' | 'studentEmail' | 'mapX' | 'mapY'
> & {
  studentEmail: string;
  mapX?: number | null;
  mapY?: number | null;
  now?: Date;
};

export interface AppointmentSlotDatabaseRow {
  id: string;
  queue_id: string;
  timeslot: number;
  scheduled_time: Date | string;
  duration: number;
  student_email: string | null;
  name: string | null;
  description: string | null;
  location: string | null;
  map_x: number | null;
  map_y: number | null;
  created_at: Date | string;
  updated_at: Date | string;
}

/**
 * One bookable appointment row. A slot with a student email is claimed;
 * cancelling clears the email and leaves the row behind as an open slot.
 */
export class AppointmentSlot {
  private constructor(private readonly props: AppointmentSlotProps) {}

  static claim(properties: ClaimAppointmentProperties): AppointmentSlot {
    const now = properties.now ?? new Date();

    return new AppointmentSlot({
      id: uuidv7({ msecs: now.getTime() }),
      queueId: properties.queueId,
      timeslot: properties.timeslot,
      scheduledTime: new Date(properties.scheduledTime),
      duration: properties.duration,
      studentEmail: properties.studentEmail,
      name: properties.name,
      description: properties.description,
      location: properties.location,
      mapX: properties.mapX ?? 0,
      mapY: properties.mapY ?? 0,
      createdAt: now,
      updatedAt: now
    });
  }

  static fromPersistence(row: AppointmentSlotDatabaseRow): AppointmentSlot {
    return new AppointmentSlot({
      id: row.id,
      queueId: row.queue_id,
      timeslot: row.timeslot,
      scheduledTime: new Date(row.scheduled_time),
      duration: row.duration,
      studentEmail: row.student_email,
      name: row.name,
      description: row.description,
      location: row.location,
      mapX: row.map_x ?? 0,
      mapY: row.map_y ?? 0,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at)
    });
  }

  get id(): string {
    return this.props.id;
  }

  get queueId(): string {
    return this.props.queueId;
  }

  get timeslot(): number {
    return this.props.timeslot;
  }

  get scheduledTime(): Date {
    return new Date(this.props.scheduledTime);
  }

  get duration(): number {
    return this.props.duration;
  }

  get studentEmail(): string | null {
    return this.props.studentEmail;
  }

  get isClaimed(): boolean {
    return this.props.studentEmail !== null;
  }

  isOwnedBy(email: string): boolean {
    return this.props.studentEmail === email;
  }

  withDetails(details: AppointmentDetails, now = new Date()): AppointmentSlot {
    return new AppointmentSlot({ ...this.props, ...details, updatedAt: now });
  }

  claimedBy(email: string, now = new Date()): AppointmentSlot {
    return new AppointmentSlot({ ...this.props, studentEmail: email, updatedAt: now });
  }

  vacated(now = new Date()): AppointmentSlot {
    return new AppointmentSlot({ ...this.props, studentEmail: null, updatedAt: now });
  }

  toPersistence(): AppointmentSlotDatabaseRow {
    return {
      id: this.props.id,
      queue_id: this.props.queueId,
      timeslot: this.props.timeslot,
      scheduled_time: this.props.scheduledTime.toISOString(),
      duration: this.props.duration,
      student_email: this.props.studentEmail,
      name: this.props.name,
      description: this.props.description,
      location: this.props.location,
      map_x: this.props.mapX,
      map_y: this.props.mapY,
      created_at: this.props.createdAt.toISOString(),
      updated_at: this.props.updatedAt.toISOString()
    };
  }

  toDTO(): AppointmentResource {
    return {
      id: this.props.id,
      queueId: this.props.queueId,
      timeslot: this.props.timeslot,
      scheduledTime: this.props.scheduledTime.toISOString(),
      duration: this.props.duration,
      studentEmail: this.props.studentEmail,
      name: this.props.name,
      description: this.props.description,
      location: this.props.location,
      mapX: this.props.mapX,
      mapY: this.props.mapY,
      createdAt: this.props.createdAt.toISOString(),
      updatedAt: this.props.updatedAt.toISOString()
    };
  }
}
