import type { AppointmentDetails, AppointmentSlot } from '../domain/appointmentSlot';
import type { AppointmentSchedule } from '../domain/schedule';
import { orderBookingLocks } from './bookingLocks';
import type {
  AppointmentRepository,
  BookingLockMode,
  BookingLockRequest,
  BookingStore
} from './IAppointmentRepository';

interface KeyState {
  mode: BookingLockMode | null;
  holders: number;
  waiting: Array<{ mode: BookingLockMode; grant: () => void }>;
}

/**
 * Per-key readers-writer lock. Waiters are granted in arrival order, so a
 * queued exclusive request holds back shared requests that arrive after it.
 */
class KeyedLock {
  private readonly states = new Map<string, KeyState>();

  async acquire(key: string, mode: BookingLockMode): Promise<() => void> {
    let state = this.states.get(key);
    if (!state) {
      state = { mode: null, holders: 0, waiting: [] };
      this.states.set(key, state);
    }

    const held = state;
    if (held.waiting.length === 0 && compatible(held, mode)) {
      held.mode = mode;
      held.holders += 1;
    } else {
      await new Promise<void>((resolve) => {
        held.waiting.push({ mode, grant: resolve });
      });
    }

    return () => {
      held.holders -= 1;
      if (held.holders === 0) {
        held.mode = null;
      }
      this.drain(key, held);
    };
  }

  private drain(key: string, state: KeyState): void {
    let next = state.waiting[0];
    while (next && compatible(state, next.mode)) {
      state.waiting.shift();
      state.mode = next.mode;
      state.holders += 1;
      next.grant();
      next = state.waiting[0];
    }

    if (state.holders === 0 && state.waiting.length === 0) {
      this.states.delete(key);
    }
  }
}

function compatible(state: KeyState, mode: BookingLockMode): boolean {
  return state.holders === 0 || (state.mode === 'shared' && mode === 'shared');
}

// Every call yields once, so concurrent callers interleave between awaits.
const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

function byScheduledTime(a: AppointmentSlot, b: AppointmentSlot): number {
  return a.scheduledTime.getTime() - b.scheduledTime.getTime() || a.id.localeCompare(b.id);
}

export class InMemoryAppointmentRepository implements BookingStore {
  private readonly appointments = new Map<string, AppointmentSlot>();
  private readonly schedules = new Map<string, AppointmentSchedule>();
  private readonly admins = new Set<string>();
  private readonly locks = new KeyedLock();

  async withBookingLock<T>(
    keys: readonly BookingLockRequest[],
    work: (repository: AppointmentRepository) => Promise<T>
  ): Promise<T> {
    const releases: Array<() => void> = [];

    try {
      for (const { key, mode } of orderBookingLocks(keys)) {
        releases.push(await this.locks.acquire(key, mode));
      }
      return await work(this);
    } finally {
      releases.reverse().forEach((release) => release());
    }
  }

  async getAppointment(id: string): Promise<AppointmentSlot | null> {
    await tick();
    return this.appointments.get(id) ?? null;
  }

  async getAppointments(queueId: string, from: Date, to: Date): Promise<AppointmentSlot[]> {
    await tick();
    return this.inWindow(queueId, from, to);
  }

  async getAppointmentsForUser(
    queueId: string,
    from: Date,
    to: Date,
    email: string
  ): Promise<AppointmentSlot[]> {
    await tick();
    return this.inWindow(queueId, from, to).filter((appointment) => appointment.isOwnedBy(email));
  }

  async getAppointmentsByTimeslot(
    queueId: string,
    from: Date,
    to: Date,
    timeslot: number
  ): Promise<AppointmentSlot[]> {
    await tick();
    return this.inWindow(queueId, from, to).filter(
      (appointment) => appointment.timeslot === timeslot
    );
  }

  async insertAppointment(appointment: AppointmentSlot): Promise<AppointmentSlot> {
    await tick();
    this.appointments.set(appointment.id, appointment);
    return appointment;
  }

  async updateAppointmentDetails(id: string, details: AppointmentDetails): Promise<void> {
    await tick();
    const existing = this.appointments.get(id);
    if (existing) {
      this.appointments.set(id, existing.withDetails(details));
    }
  }

  async removeAppointmentSignup(id: string): Promise<void> {
    await tick();
    const existing = this.appointments.get(id);
    if (existing) {
      this.appointments.set(id, existing.vacated());
    }
  }

  async claimOpenSlot(
    queueId: string,
    from: Date,
    to: Date,
    timeslot: number,
    email: string
  ): Promise<AppointmentSlot | null> {
    await tick();
    const open = this.inWindow(queueId, from, to)
      .filter((appointment) => appointment.timeslot === timeslot && !appointment.isClaimed)
      .sort((a, b) => a.id.localeCompare(b.id))[0];

    if (!open) {
      return null;
    }

    const claimed = open.claimedBy(email);
    this.appointments.set(claimed.id, claimed);
    return claimed;
  }

  async getScheduleForDay(queueId: string, day: number): Promise<AppointmentSchedule | null> {
    await tick();
    return this.schedules.get(scheduleKey(queueId, day)) ?? null;
  }

  async getSchedules(queueId: string): Promise<AppointmentSchedule[]> {
    await tick();
    return [...this.schedules.values()]
      .filter((schedule) => schedule.queueId === queueId)
      .sort((a, b) => a.day - b.day);
  }

  async replaceSchedule(schedule: AppointmentSchedule): Promise<void> {
    await tick();
    this.schedules.set(scheduleKey(schedule.queueId, schedule.day), schedule);
  }

  async isQueueAdmin(queueId: string, email: string): Promise<boolean> {
    await tick();
    return this.admins.has(adminKey(queueId, email));
  }

  addQueueAdmin(queueId: string, email: string): void {
    this.admins.add(adminKey(queueId, email));
  }

  private inWindow(queueId: string, from: Date, to: Date): AppointmentSlot[] {
    const start = from.getTime();
    const end = to.getTime();

    return [...this.appointments.values()]
      .filter((appointment) => {
        const at = appointment.scheduledTime.getTime();
        return appointment.queueId === queueId && at >= start && at < end;
      })
      .sort(byScheduledTime);
  }
}

function scheduleKey(queueId: string, day: number): string {
  return `${queueId}:${day}`;
}

function adminKey(queueId: string, email: string): string {
  return `${queueId}:${email.toLowerCase()}`;
}
