import { getDb, withTransaction } from '@officehours/shared';
import type { PoolClient, QueryResult, QueryResultRow } from 'pg';

import {
  AppointmentSlot,
  type AppointmentDetails,
  type AppointmentSlotDatabaseRow
} from '../domain/appointmentSlot';
import { AppointmentSchedule, type AppointmentScheduleDatabaseRow } from '../domain/schedule';
import { orderBookingLocks } from './bookingLocks';
import type {
  AppointmentRepository,
  BookingLockRequest,
  BookingStore
} from './IAppointmentRepository';

const APPOINTMENT_COLUMNS = `
  id,
  queue_id,
  timeslot,
  scheduled_time,
  duration,
  student_email,
  name,
  description,
  location,
  map_x,
  map_y,
  created_at,
  updated_at
`;

const SCHEDULE_COLUMNS = `
  queue_id,
  day,
  duration,
  schedule
`;

function mapAppointmentRow(row: AppointmentSlotDatabaseRow): AppointmentSlot {
  return AppointmentSlot.fromPersistence(row);
}

function mapScheduleRow(row: AppointmentScheduleDatabaseRow): AppointmentSchedule {
  return AppointmentSchedule.fromPersistence(row);
}

export class PostgresAppointmentRepository implements BookingStore {
  /** Without a client every query runs on the shared pool. */
  constructor(private readonly client?: PoolClient) {}

  async withBookingLock<T>(
    keys: readonly BookingLockRequest[],
    work: (repository: AppointmentRepository) => Promise<T>
  ): Promise<T> {
    const ordered = orderBookingLocks(keys);

    return withTransaction(async (tx) => {
      // Transaction-scoped: released by the COMMIT or ROLLBACK in withTransaction.
      for (const { key, mode } of ordered) {
        const lock = mode === 'shared' ? 'pg_advisory_xact_lock_shared' : 'pg_advisory_xact_lock';
        await tx.query(`SELECT ${lock}(hashtext($1))`, [key]);
      }

      return work(new PostgresAppointmentRepository(tx));
    });
  }

  async getAppointment(id: string): Promise<AppointmentSlot | null> {
    const result = await this.query<AppointmentSlotDatabaseRow>(
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointment_slots WHERE id = $1`,
      [id]
    );

    const row = result.rows[0];
    return row ? mapAppointmentRow(row) : null;
  }

  async getAppointments(queueId: string, from: Date, to: Date): Promise<AppointmentSlot[]> {
    const result = await this.query<AppointmentSlotDatabaseRow>(
      `SELECT ${APPOINTMENT_COLUMNS}
         FROM appointment_slots
        WHERE queue_id = $1
          AND scheduled_time >= $2
          AND scheduled_time < $3
        ORDER BY scheduled_time ASC, id ASC`,
      [queueId, from.toISOString(), to.toISOString()]
    );

    return result.rows.map(mapAppointmentRow);
  }

  async getAppointmentsForUser(
    queueId: string,
    from: Date,
    to: Date,
    email: string
  ): Promise<AppointmentSlot[]> {
    const result = await this.query<AppointmentSlotDatabaseRow>(
      `SELECT ${APPOINTMENT_COLUMNS}
         FROM appointment_slots
        WHERE queue_id = $1
          AND scheduled_time >= $2
          AND scheduled_time < $3
          AND student_email = $4
        ORDER BY scheduled_time ASC, id ASC`,
      [queueId, from.toISOString(), to.toISOString(), email]
    );

    return result.rows.map(mapAppointmentRow);
  }

  async getAppointmentsByTimeslot(
    queueId: string,
    from: Date,
    to: Date,
    timeslot: number
  ): Promise<AppointmentSlot[]> {
    const result = await this.query<AppointmentSlotDatabaseRow>(
      `SELECT ${APPOINTMENT_COLUMNS}
         FROM appointment_slots
        WHERE queue_id = $1
          AND scheduled_time >= $2
          AND scheduled_time < $3
          AND timeslot = $4
        ORDER BY id ASC`,
      [queueId, from.toISOString(), to.toISOString(), timeslot]
    );

    return result.rows.map(mapAppointmentRow);
  }

  async insertAppointment(appointment: AppointmentSlot): Promise<AppointmentSlot> {
    const row = appointment.toPersistence();
    const result = await this.query<AppointmentSlotDatabaseRow>(
      `INSERT INTO appointment_slots (
        id,
        queue_id,
        timeslot,
        scheduled_time,
        duration,
        student_email,
        name,
        description,
        location,
        map_x,
        map_y,
        created_at,
        updated_at
      ) VALUES (
        $1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13
      ) RETURNING ${APPOINTMENT_COLUMNS}`,
      [
        row.id,
        row.queue_id,
        row.timeslot,
        row.scheduled_time,
        row.duration,
        row.student_email,
        row.name,
        row.description,
        row.location,
        row.map_x,
        row.map_y,
        row.created_at,
        row.updated_at
      ]
    );

    const inserted = result.rows[0];
    return inserted ? mapAppointmentRow(inserted) : appointment;
  }

  async updateAppointmentDetails(id: string, details: AppointmentDetails): Promise<void> {
    await this.query(
      `UPDATE appointment_slots
          SET name = $2,
              description = $3,
              location = $4,
              map_x = $5,
              map_y = $6,
              updated_at = now()
        WHERE id = $1`,
      [id, details.name, details.description, details.location, details.mapX, details.mapY]
    );
  }

  async removeAppointmentSignup(id: string): Promise<void> {
    await this.query(
      `UPDATE appointment_slots
          SET student_email = NULL,
              updated_at = now()
        WHERE id = $1`,
      [id]
    );
  }

  async claimOpenSlot(
    queueId: string,
    from: Date,
    to: Date,
    timeslot: number,
    email: string
  ): Promise<AppointmentSlot | null> {
    const result = await this.query<AppointmentSlotDatabaseRow>(
      `UPDATE appointment_slots
          SET student_email = $5,
              updated_at = now()
        WHERE id = (
                SELECT id
                  FROM appointment_slots
                 WHERE queue_id = $1
                   AND scheduled_time >= $2
                   AND scheduled_time < $3
                   AND timeslot = $4
                   AND student_email IS NULL
                 ORDER BY id ASC
                 LIMIT 1
                 FOR UPDATE SKIP LOCKED
              )
          AND student_email IS NULL
        RETURNING ${APPOINTMENT_COLUMNS}`,
      [queueId, from.toISOString(), to.toISOString(), timeslot, email]
    );

    const row = result.rows[0];
    return row ? mapAppointmentRow(row) : null;
  }

  async getScheduleForDay(queueId: string, day: number): Promise<AppointmentSchedule | null> {
    const result = await this.query<AppointmentScheduleDatabaseRow>(
      `SELECT ${SCHEDULE_COLUMNS}
         FROM appointment_schedules
        WHERE queue_id = $1
          AND day = $2`,
      [queueId, day]
    );

    const row = result.rows[0];
    return row ? mapScheduleRow(row) : null;
  }

  async getSchedules(queueId: string): Promise<AppointmentSchedule[]> {
    const result = await this.query<AppointmentScheduleDatabaseRow>(
      `SELECT ${SCHEDULE_COLUMNS}
         FROM appointment_schedules
        WHERE queue_id = $1
        ORDER BY day ASC`,
      [queueId]
    );

    return result.rows.map(mapScheduleRow);
  }

  async replaceSchedule(schedule: AppointmentSchedule): Promise<void> {
    const row = schedule.toPersistence();
    await this.query(
      `INSERT INTO appointment_schedules (queue_id, day, duration, schedule)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (queue_id, day) DO UPDATE
         SET duration = EXCLUDED.duration,
             schedule = EXCLUDED.schedule,
             updated_at = now()`,
      [row.queue_id, row.day, row.duration, row.schedule]
    );
  }

  async isQueueAdmin(queueId: string, email: string): Promise<boolean> {
    const result = await this.query(
      `SELECT 1
         FROM queue_admins
        WHERE queue_id = $1
          AND email = $2
        LIMIT 1`,
      [queueId, email.toLowerCase()]
    );

    return (result.rowCount ?? 0) > 0;
  }

  private async query<R extends QueryResultRow>(
    text: string,
    values: unknown[]
  ): Promise<QueryResult<R>> {
    if (this.client) {
      return this.client.query<R>(text, values);
    }
    return getDb().query<R>(text, values);
  }
}
