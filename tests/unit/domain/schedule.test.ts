import { describe, expect, it } from 'vitest';

import { BadRequestError } from '@officehours/shared';

import { AppointmentSchedule } from '../../../src/domain/schedule';

describe('AppointmentSchedule', () => {
  const tuesday = AppointmentSchedule.define({
    queueId: 'cs101',
    day: 2,
    duration: 30,
    schedule: '2110'
  });

  it('reads one capacity digit per timeslot', () => {
    expect(tuesday.timeslots).toBe(4);
    expect([0, 1, 2, 3].map((timeslot) => tuesday.capacityAt(timeslot))).toEqual([2, 1, 1, 0]);
  });

  it('has no capacity outside the schedule', () => {
    expect(tuesday.capacityAt(4)).toBeNull();
    expect(tuesday.capacityAt(5)).toBeNull();
    expect(tuesday.capacityAt(-1)).toBeNull();
    expect(tuesday.capacityAt(1.5)).toBeNull();
  });

  it('places timeslots at multiples of the duration from the window start', () => {
    const windowStart = new Date('2026-10-20T00:00:00.000Z');

    expect(tuesday.timeslotStart(windowStart, 0).toISOString()).toBe('2026-10-20T00:00:00.000Z');
    expect(tuesday.timeslotStart(windowStart, 3).toISOString()).toBe('2026-10-20T01:30:00.000Z');
  });

  it('rejects schedules with non-digit characters', () => {
    expect(() =>
      AppointmentSchedule.define({ queueId: 'cs101', day: 1, duration: 30, schedule: '12a' })
    ).toThrow(BadRequestError);
  });

  it('rejects non-positive durations', () => {
    expect(() =>
      AppointmentSchedule.define({ queueId: 'cs101', day: 1, duration: 0, schedule: '1' })
    ).toThrow('Appointment duration must be a positive number of minutes');
  });

  it('rejects a weekday outside 0-6', () => {
    expect(() =>
      AppointmentSchedule.define({ queueId: 'cs101', day: 7, duration: 30, schedule: '1' })
    ).toThrow('Day must be between 0 (Sunday) and 6 (Saturday)');
  });

  it('rejects schedules that run past midnight', () => {
    expect(() =>
      AppointmentSchedule.define({ queueId: 'cs101', day: 1, duration: 60, schedule: '1'.repeat(25) })
    ).toThrow('The schedule runs past the end of the day');

    expect(
      AppointmentSchedule.define({ queueId: 'cs101', day: 1, duration: 60, schedule: '1'.repeat(24) })
        .timeslots
    ).toBe(24);
  });

  it('accepts an empty schedule', () => {
    const empty = AppointmentSchedule.define({ queueId: 'cs101', day: 0, duration: 15, schedule: '' });
    expect(empty.timeslots).toBe(0);
    expect(empty.capacityAt(0)).toBeNull();
  });

  it('maps between persistence rows and resources', () => {
    const restored = AppointmentSchedule.fromPersistence({
      queue_id: 'cs101',
      day: 2,
      duration: 30,
      schedule: '2110'
    });

    expect(restored.toDTO()).toEqual({ queueId: 'cs101', day: 2, duration: 30, schedule: '2110' });
    expect(restored.toPersistence()).toEqual({
      queue_id: 'cs101',
      day: 2,
      duration: 30,
      schedule: '2110'
    });
  });
});
