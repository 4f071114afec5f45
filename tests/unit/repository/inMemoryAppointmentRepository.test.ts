import { describe, expect, it } from 'vitest';

import { AppointmentSlot } from '../../../src/domain/appointmentSlot';
import { InMemoryAppointmentRepository } from '../../../src/repository/InMemoryAppointmentRepository';

const from = new Date('2026-10-20T00:00:00.000Z');
const to = new Date('2026-10-21T00:00:00.000Z');

function slot(timeslot: number, studentEmail: string, scheduledTime: string) {
  return AppointmentSlot.claim({
    queueId: 'cs101',
    timeslot,
    scheduledTime: new Date(scheduledTime),
    duration: 30,
    studentEmail,
    name: 'Student',
    description: 'Question',
    location: 'Room 101'
  });
}

describe('InMemoryAppointmentRepository', () => {
  it('runs holders of the same key one after another', async () => {
    const repository = new InMemoryAppointmentRepository();
    const order: string[] = [];

    const hold = (label: string) =>
      repository.withBookingLock(['timeslot:a'], async (locked) => {
        order.push(`${label}:start`);
        await locked.getAppointments('cs101', from, to);
        await locked.getAppointments('cs101', from, to);
        order.push(`${label}:end`);
      });

    await Promise.all([hold('first'), hold('second')]);

    expect(order).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('runs shared holders together and keeps an exclusive holder apart from them', async () => {
    const repository = new InMemoryAppointmentRepository();
    const order: string[] = [];

    const hold = (label: string, mode: 'shared' | 'exclusive') =>
      repository.withBookingLock([{ key: 'schedule:a', mode }], async (locked) => {
        order.push(`${label}:start`);
        await locked.getAppointments('cs101', from, to);
        order.push(`${label}:end`);
      });

    await Promise.all([
      hold('reader1', 'shared'),
      hold('reader2', 'shared'),
      hold('writer', 'exclusive'),
      hold('reader3', 'shared')
    ]);

    expect(order).toEqual([
      'reader1:start',
      'reader2:start',
      'reader1:end',
      'reader2:end',
      'writer:start',
      'writer:end',
      'reader3:start',
      'reader3:end'
    ]);
  });

  it('releases the keys when the work throws', async () => {
    const repository = new InMemoryAppointmentRepository();

    await expect(
      repository.withBookingLock(['timeslot:a'], async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(repository.withBookingLock(['timeslot:a'], async () => 'free')).resolves.toBe('free');
  });

  it('returns window rows ordered by scheduled time', async () => {
    const repository = new InMemoryAppointmentRepository();
    const late = await repository.insertAppointment(slot(2, 'b@example.edu', '2026-10-20T01:00:00.000Z'));
    const early = await repository.insertAppointment(slot(0, 'a@example.edu', '2026-10-20T00:00:00.000Z'));
    await repository.insertAppointment(slot(0, 'c@example.edu', '2026-10-21T00:00:00.000Z'));

    const rows = await repository.getAppointments('cs101', from, to);

    expect(rows.map((row) => row.id)).toEqual([early.id, late.id]);
  });

  it('claims only unclaimed rows', async () => {
    const repository = new InMemoryAppointmentRepository();
    const taken = await repository.insertAppointment(slot(1, 'a@example.edu', '2026-10-20T00:30:00.000Z'));

    await expect(repository.claimOpenSlot('cs101', from, to, 1, 'b@example.edu')).resolves.toBeNull();

    await repository.removeAppointmentSignup(taken.id);
    const claimed = await repository.claimOpenSlot('cs101', from, to, 1, 'b@example.edu');

    expect(claimed?.id).toBe(taken.id);
    expect(claimed?.studentEmail).toBe('b@example.edu');
  });

  it('matches queue admins case-insensitively', async () => {
    const repository = new InMemoryAppointmentRepository();
    repository.addQueueAdmin('cs101', 'TA@example.edu');

    await expect(repository.isQueueAdmin('cs101', 'ta@EXAMPLE.edu')).resolves.toBe(true);
    await expect(repository.isQueueAdmin('cs102', 'ta@example.edu')).resolves.toBe(false);
  });
});
