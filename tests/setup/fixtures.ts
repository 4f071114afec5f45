import { InMemoryEventBus } from '@officehours/shared';

import { BookingCoordinator } from '../../src/application/services/bookingCoordinator';
import { AppointmentSchedule } from '../../src/domain/schedule';
import type { AppointmentPayload } from '../../src/dtos';
import { signJwt } from '../../src/infrastructure/security/jwt';
import { InMemoryAppointmentRepository } from '../../src/repository/InMemoryAppointmentRepository';

/** Sunday morning; weekday 2 of this week starts 2026-10-20T00:00:00Z. */
export const SUNDAY_MORNING = new Date('2026-10-18T08:00:00.000Z');
export const TUESDAY_START = new Date('2026-10-20T00:00:00.000Z');

export const QUEUE_ID = 'cs101';
export const TEST_SECRET = 'test-secret';

export function createHarness(start: Date = SUNDAY_MORNING) {
  let now = start;
  const store = new InMemoryAppointmentRepository();
  const eventBus = new InMemoryEventBus();
  const clock = () => now;
  const coordinator = new BookingCoordinator(store, { eventBus, clock, timeZone: 'UTC' });

  return {
    store,
    eventBus,
    clock,
    coordinator,
    setNow(next: Date) {
      now = next;
    }
  };
}

export async function seedSchedule(
  store: InMemoryAppointmentRepository,
  day: number,
  duration: number,
  schedule: string,
  queueId: string = QUEUE_ID
): Promise<AppointmentSchedule> {
  const defined = AppointmentSchedule.define({ queueId, day, duration, schedule });
  await store.replaceSchedule(defined);
  return defined;
}

export function appointmentPayload(overrides: AppointmentPayload = {}): AppointmentPayload {
  return {
    name: 'Ada',
    description: 'Question about recursion',
    location: 'Room 101',
    ...overrides
  };
}

export function bearerFor(email: string, issuedAt: Date = SUNDAY_MORNING): string {
  const token = signJwt(TEST_SECRET, {
    email,
    expiresInSeconds: 3600,
    issuedAt: Math.floor(issuedAt.getTime() / 1000)
  });
  return `Bearer ${token}`;
}
