import type { AppointmentSlot } from './appointmentSlot';

/**
 * Slots still open at a timeslot: its capacity minus the appointments there
 * that are claimed. The result goes negative when a capacity was lowered
 * after bookings were made, so treat anything below 1 as full.
 */
export function openSlots(
  capacity: number,
  appointmentsAtTimeslot: ReadonlyArray<Pick<AppointmentSlot, 'isClaimed'>>
): number {
  return appointmentsAtTimeslot.reduce(
    (open, appointment) => (appointment.isClaimed ? open - 1 : open),
    capacity
  );
}
