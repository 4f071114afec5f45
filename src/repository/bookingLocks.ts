import type { BookingLockKey, BookingLockRequest } from './IAppointmentRepository';

/**
 * Distinct keys sorted for acquisition. A key requested in both modes is held
 * exclusively.
 */
export function orderBookingLocks(requests: readonly BookingLockRequest[]): BookingLockKey[] {
  const modes = new Map<string, BookingLockKey['mode']>();

  for (const request of requests) {
    const { key, mode }: BookingLockKey =
      typeof request === 'string' ? { key: request, mode: 'exclusive' } : request;
    if (modes.get(key) !== 'exclusive') {
      modes.set(key, mode);
    }
  }

  return [...modes.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, mode]) => ({ key, mode }));
}
