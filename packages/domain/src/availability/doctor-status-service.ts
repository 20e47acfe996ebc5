/**
 * Doctor Status Service
 *
 * Operator-driven status board. Transitions are direct sets with two rules:
 * ON_LEAVE needs an ordered leave range, and BUSY is paired with the
 * appointment being seen. A doctor without a record is AVAILABLE.
 * Writes for one doctor run under the `doctor:<vetId>` lock.
 *
 * @module domain/availability/doctor-status-service
 */
import {
  InMemoryKeyedLock,
  createLogger,
  systemClock,
  toCalendarDate,
  type Clock,
  type KeyedLock,
} from '@vetqueue/core';
import type { DoctorState, DoctorStatus } from '@vetqueue/types';

import type { DoctorStatusRepository } from './repositories.js';

const logger = createLogger({ name: 'doctor-status' });

const BOOKABLE_STATES: ReadonlySet<DoctorState> = new Set(['AVAILABLE', 'BUSY', 'BREAK']);

export interface SetStatusOptions {
  statusMessage?: string;
  leaveStart?: string | null;
  leaveEnd?: string | null;
  leaveReason?: string;
}

export type SetStatusResult =
  | { success: true; status: DoctorStatus }
  | { success: false; error: 'LEAVE_RANGE_REQUIRED'; message: string };

export interface DoctorStatusServiceDeps {
  statuses: DoctorStatusRepository;
  /** Process-local lock when omitted */
  lock?: KeyedLock;
  clock?: Clock;
  /** IANA zone used for "today" */
  timeZone?: string;
}

/**
 * True when the status's leave range covers `date`
 */
export function leaveCovers(status: DoctorStatus, date: string): boolean {
  return (
    status.leaveStart !== null &&
    status.leaveEnd !== null &&
    status.leaveStart <= date &&
    date <= status.leaveEnd
  );
}

export class DoctorStatusService {
  private readonly statuses: DoctorStatusRepository;
  private readonly lock: KeyedLock;
  private readonly clock: Clock;
  private readonly timeZone: string;

  constructor(deps: DoctorStatusServiceDeps) {
    this.statuses = deps.statuses;
    this.lock = deps.lock ?? new InMemoryKeyedLock();
    this.clock = deps.clock ?? systemClock;
    this.timeZone = deps.timeZone ?? 'UTC';
  }

  /**
   * Stored status, or the AVAILABLE default when none was ever recorded
   */
  async getStatus(vetId: string): Promise<DoctorStatus> {
    const stored = await this.statuses.get(vetId);
    if (stored) {
      return stored;
    }

    return {
      vetRef: vetId,
      state: 'AVAILABLE',
      statusMessage: '',
      leaveStart: null,
      leaveEnd: null,
      leaveReason: '',
      currentAppointmentRef: null,
      updatedAt: this.clock.now(),
    };
  }

  async setStatus(vetId: string, state: DoctorState, options: SetStatusOptions = {}): Promise<SetStatusResult> {
    const leaveStart = options.leaveStart ?? null;
    const leaveEnd = options.leaveEnd ?? null;

    const hasRange = leaveStart !== null && leaveEnd !== null;
    if (state === 'ON_LEAVE' && !hasRange) {
      return { success: false, error: 'LEAVE_RANGE_REQUIRED', message: 'Leave start and end dates are required' };
    }
    if (hasRange && leaveStart > leaveEnd) {
      return { success: false, error: 'LEAVE_RANGE_REQUIRED', message: 'Leave end must not precede leave start' };
    }

    return this.lock.withLock(this.lockKey(vetId), async (): Promise<SetStatusResult> => {
      const current = await this.getStatus(vetId);
      const next: DoctorStatus = {
        ...current,
        state,
        statusMessage: options.statusMessage ?? '',
        leaveStart: hasRange ? leaveStart : null,
        leaveEnd: hasRange ? leaveEnd : null,
        leaveReason: hasRange ? (options.leaveReason ?? '') : '',
        currentAppointmentRef: state === 'BUSY' ? current.currentAppointmentRef : null,
        updatedAt: this.clock.now(),
      };

      await this.statuses.save(next);
      logger.info({ vetId, from: current.state, to: state }, 'Doctor status changed');
      return { success: true, status: next };
    });
  }

  /**
   * Enter BUSY for the appointment being seen
   */
  async markBusy(vetId: string, appointmentRef: string): Promise<DoctorStatus> {
    return this.lock.withLock(this.lockKey(vetId), async () => {
      const current = await this.getStatus(vetId);
      const next: DoctorStatus = {
        ...current,
        state: 'BUSY',
        currentAppointmentRef: appointmentRef,
        updatedAt: this.clock.now(),
      };
      await this.statuses.save(next);
      return next;
    });
  }

  /**
   * Back to AVAILABLE once the current appointment ends. No-op when the
   * doctor has moved on to another appointment or state.
   */
  async releaseAppointment(vetId: string, appointmentRef: string): Promise<DoctorStatus> {
    return this.lock.withLock(this.lockKey(vetId), async () => {
      const current = await this.getStatus(vetId);
      if (current.state !== 'BUSY' || current.currentAppointmentRef !== appointmentRef) {
        return current;
      }

      const next: DoctorStatus = {
        ...current,
        state: 'AVAILABLE',
        currentAppointmentRef: null,
        updatedAt: this.clock.now(),
      };
      await this.statuses.save(next);
      return next;
    });
  }

  private lockKey(vetId: string): string {
    return `doctor:${vetId}`;
  }

  /**
   * Not on leave on `date` and in a state that accepts bookings.
   * Without a leave range, an ON_LEAVE state counts as on leave.
   */
  async isAvailableForBooking(vetId: string, date?: string): Promise<boolean> {
    const status = await this.getStatus(vetId);
    const day = date ?? toCalendarDate(this.clock.now(), this.timeZone);

    const onLeave =
      status.leaveStart !== null && status.leaveEnd !== null
        ? leaveCovers(status, day)
        : status.state === 'ON_LEAVE';
    return !onLeave && BOOKABLE_STATES.has(status.state);
  }
}
