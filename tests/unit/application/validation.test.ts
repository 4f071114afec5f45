import { describe, expect, it } from 'vitest';

import { BadRequestError, ForbiddenError } from '@officehours/shared';

import {
  assertNotInPast,
  assertOwnedBy,
  requireCompletePayload
} from '../../../src/application/validation';
import { AppointmentSlot } from '../../../src/domain/appointmentSlot';

describe('requireCompletePayload', () => {
  it('fills map coordinates with zero and keeps the timeslot', () => {
    expect(
      requireCompletePayload({
        name: 'Ada',
        description: 'Recursion',
        location: 'Room 101',
        timeslot: 3
      })
    ).toEqual({
      name: 'Ada',
      description: 'Recursion',
      location: 'Room 101',
      timeslot: 3,
      mapX: 0,
      mapY: 0
    });
  });

  it('lists every missing or blank field', () => {
    try {
      requireCompletePayload({ name: 'Ada', description: '   ', location: null });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(BadRequestError);
      expect(error).toMatchObject({
        message: 'It looks like you left out some fields in the appointment.',
        details: { missing: ['description', 'location'] }
      });
    }
  });
});

describe('assertOwnedBy', () => {
  const appointment = AppointmentSlot.claim({
    queueId: 'cs101',
    timeslot: 0,
    scheduledTime: new Date('2026-10-20T00:00:00.000Z'),
    duration: 30,
    studentEmail: 'alice@example.edu',
    name: 'Alice',
    description: 'Recursion',
    location: 'Room 101'
  });

  it('passes for the student holding the claim', () => {
    expect(() => assertOwnedBy(appointment, 'alice@example.edu', 'update')).not.toThrow();
  });

  it('names the attempted action when someone else asks', () => {
    expect(() => assertOwnedBy(appointment, 'bob@example.edu', 'delete')).toThrow(ForbiddenError);
    expect(() => assertOwnedBy(appointment, 'bob@example.edu', 'update')).toThrow(
      "You can't update someone else's appointment!"
    );
  });
});

describe('assertNotInPast', () => {
  const at = new Date('2026-10-20T00:00:00.000Z');

  it('allows the exact start time', () => {
    expect(() => assertNotInPast(at, at, 'too late')).not.toThrow();
  });

  it('rejects a time before now', () => {
    expect(() => assertNotInPast(at, new Date('2026-10-20T00:00:01.000Z'), 'too late')).toThrow(
      'too late'
    );
  });
});
