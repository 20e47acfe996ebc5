/**
 * Token Scheduler
 *
 * Daily FIFO for routine appointments. Checking in hands out the next token
 * for the date; calling next picks the smallest checked-in token not yet
 * called. Counters for a date only change under the `queue:<date>` lock and
 * never move backwards.
 *
 * Emergency appointments stay out of the token queue: they go through the
 * emergency queue, and completing one resolves its linked case.
 *
 * @module domain/scheduling/token-scheduler
 */
import {
  InvariantViolationError,
  ValidationError,
  createLogger,
  systemClock,
  type Clock,
  type KeyedLock,
} from '@vetqueue/core';
import {
  CalendarDateSchema,
  type AppointmentSlot,
  type AppointmentStatus,
  type DailyQueueState,
} from '@vetqueue/types';

import type { DoctorStatusService } from '../availability/doctor-status-service.js';
import type { EmergencyQueue } from '../emergency/emergency-queue.js';
import { appointmentDateLockKey, canTransitionAppointment } from './appointment-lifecycle.js';
import type { AppointmentRepository, DailyQueueStateRepository } from './repositories.js';

const logger = createLogger({ name: 'token-scheduler' });

export const DEFAULT_AVG_WAIT_MINUTES = 15;

// =============================================================================
// Wait estimation
// =============================================================================

/**
 * Minutes until `tokenNumber` is called: 0 once called, else one slot per
 * patient strictly between the last called token and this one.
 */
export function estimateWaitMinutes(
  state: Pick<DailyQueueState, 'lastCalledToken' | 'avgWaitMinutes'>,
  tokenNumber: number,
  defaultAvgWaitMinutes = DEFAULT_AVG_WAIT_MINUTES
): number {
  if (tokenNumber <= state.lastCalledToken) {
    return 0;
  }
  const perPatient = state.avgWaitMinutes > 0 ? state.avgWaitMinutes : defaultAvgWaitMinutes;
  return (tokenNumber - state.lastCalledToken - 1) * perPatient;
}

/**
 * Guard a queue state write: counters never decrease and the last called
 * token never passes the last issued one.
 */
export function assertQueueStateTransition(previous: DailyQueueState, next: DailyQueueState): void {
  if (next.currentTokenCounter < previous.currentTokenCounter) {
    throw new InvariantViolationError(
      'token-counter-monotonic',
      `Token counter for ${next.date} would decrease from ${previous.currentTokenCounter} to ${next.currentTokenCounter}`
    );
  }
  if (next.lastCalledToken < previous.lastCalledToken) {
    throw new InvariantViolationError(
      'last-called-monotonic',
      `Last called token for ${next.date} would decrease from ${previous.lastCalledToken} to ${next.lastCalledToken}`
    );
  }
  if (next.lastCalledToken > next.currentTokenCounter) {
    throw new InvariantViolationError(
      'last-called-within-issued',
      `Last called token ${next.lastCalledToken} exceeds issued tokens ${next.currentTokenCounter} for ${next.date}`
    );
  }
}

// =============================================================================
// Results
// =============================================================================

export type CheckInResult =
  | { success: true; appointment: AppointmentSlot; tokenNumber: number; alreadyCheckedIn: boolean }
  | { success: false; error: 'NOT_FOUND' | 'EMERGENCY_APPOINTMENT' }
  | { success: false; error: 'INVALID_TRANSITION'; status: AppointmentStatus };

export type AppointmentTransitionResult =
  | { success: true; appointment: AppointmentSlot }
  | { success: false; error: 'NOT_FOUND' }
  | { success: false; error: 'INVALID_TRANSITION'; status: AppointmentStatus };

export interface QueueEntry {
  appointment: AppointmentSlot;
  tokenNumber: number;
  patientsAhead: number;
  estimatedWaitMinutes: number;
}

export interface QueueSnapshot {
  state: DailyQueueState;
  waiting: QueueEntry[];
}

export interface TokenSchedulerDeps {
  appointments: AppointmentRepository;
  queueStates: DailyQueueStateRepository;
  lock: KeyedLock;
  doctorStatus: DoctorStatusService;
  /** Resolves the case linked to a completed emergency appointment */
  emergencyQueue?: EmergencyQueue;
  clock?: Clock;
  defaultAvgWaitMinutes?: number;
}

function emptyState(date: string): DailyQueueState {
  return { date, currentTokenCounter: 0, lastCalledToken: 0, avgWaitMinutes: 0 };
}

type WaitingAppointment = AppointmentSlot & { tokenNumber: number };

function isWaiting(appointment: AppointmentSlot, lastCalledToken: number): appointment is WaitingAppointment {
  return (
    !appointment.isEmergency &&
    appointment.status === 'CONFIRMED' &&
    appointment.tokenNumber !== null &&
    appointment.tokenNumber > lastCalledToken
  );
}

// =============================================================================
// Scheduler
// =============================================================================

export class TokenScheduler {
  private readonly appointments: AppointmentRepository;
  private readonly queueStates: DailyQueueStateRepository;
  private readonly lock: KeyedLock;
  private readonly doctorStatus: DoctorStatusService;
  private readonly emergencyQueue: EmergencyQueue | null;
  private readonly clock: Clock;
  private readonly defaultAvgWaitMinutes: number;

  constructor(deps: TokenSchedulerDeps) {
    this.appointments = deps.appointments;
    this.queueStates = deps.queueStates;
    this.lock = deps.lock;
    this.doctorStatus = deps.doctorStatus;
    this.emergencyQueue = deps.emergencyQueue ?? null;
    this.clock = deps.clock ?? systemClock;
    this.defaultAvgWaitMinutes = deps.defaultAvgWaitMinutes ?? DEFAULT_AVG_WAIT_MINUTES;
  }

  /**
   * Issue the next token for a date. Not idempotent.
   */
  async nextToken(date: string): Promise<number> {
    this.assertDate(date);
    return this.lock.withLock(this.lockKey(date), () => this.issueToken(date));
  }

  async estimateWait(date: string, tokenNumber: number): Promise<number> {
    this.assertDate(date);
    const state = (await this.queueStates.get(date)) ?? emptyState(date);
    return estimateWaitMinutes(state, tokenNumber, this.defaultAvgWaitMinutes);
  }

  /**
   * Record arrival: issue a token and move the appointment to CONFIRMED.
   * A second check-in returns the token already issued. Emergency
   * appointments are not given tokens.
   */
  async checkIn(appointmentId: string, at?: Date): Promise<CheckInResult> {
    const found = await this.appointments.findById(appointmentId);
    if (!found) {
      return { success: false, error: 'NOT_FOUND' };
    }

    return this.lock.withLock(this.lockKey(found.date), async (): Promise<CheckInResult> => {
      const appointment = await this.appointments.findById(appointmentId);
      if (!appointment) {
        return { success: false, error: 'NOT_FOUND' };
      }
      if (appointment.isEmergency) {
        return { success: false, error: 'EMERGENCY_APPOINTMENT' };
      }
      if (appointment.tokenNumber !== null) {
        return { success: true, appointment, tokenNumber: appointment.tokenNumber, alreadyCheckedIn: true };
      }
      if (appointment.status !== 'SCHEDULED' && appointment.status !== 'CONFIRMED') {
        return { success: false, error: 'INVALID_TRANSITION', status: appointment.status };
      }

      const tokenNumber = await this.issueToken(appointment.date);
      const checkedIn: AppointmentSlot = {
        ...appointment,
        status: 'CONFIRMED',
        tokenNumber,
        checkInTime: at ?? this.clock.now(),
      };
      await this.appointments.save(checkedIn);

      logger.info({ appointmentId, date: appointment.date, tokenNumber }, 'Patient checked in');
      return { success: true, appointment: checkedIn, tokenNumber, alreadyCheckedIn: false };
    });
  }

  /**
   * Call the smallest waiting token of the date. Appointments that have not
   * checked in are never called. When a doctor is given they take the
   * appointment and become BUSY with it.
   */
  async callNext(date: string, vetId?: string): Promise<AppointmentSlot | null> {
    this.assertDate(date);

    const called = await this.lock.withLock(this.lockKey(date), async () => {
      const state = (await this.queueStates.get(date)) ?? emptyState(date);
      const waiting = (await this.appointments.findByDate(date))
        .filter((appointment): appointment is WaitingAppointment => isWaiting(appointment, state.lastCalledToken))
        .sort((left, right) => left.tokenNumber - right.tokenNumber);

      const next = waiting[0];
      if (!next) {
        return null;
      }

      const inProgress: AppointmentSlot = {
        ...next,
        status: 'IN_PROGRESS',
        vetRef: vetId ?? next.vetRef,
      };
      const nextState: DailyQueueState = { ...state, lastCalledToken: next.tokenNumber };
      assertQueueStateTransition(state, nextState);

      await this.appointments.save(inProgress);
      await this.queueStates.save(nextState);
      logger.info({ date, tokenNumber: next.tokenNumber, remaining: waiting.length - 1 }, 'Token called');
      return inProgress;
    });

    if (called && vetId) {
      await this.doctorStatus.markBusy(vetId, called.id);
    }
    return called;
  }

  /**
   * Checked-in appointments still waiting, in call order, with wait estimates
   */
  async queueSnapshot(date: string): Promise<QueueSnapshot> {
    this.assertDate(date);
    const state = (await this.queueStates.get(date)) ?? emptyState(date);
    const waiting = (await this.appointments.findByDate(date))
      .filter((appointment): appointment is WaitingAppointment => isWaiting(appointment, state.lastCalledToken))
      .sort((left, right) => left.tokenNumber - right.tokenNumber)
      .map((appointment, index) => ({
        appointment,
        tokenNumber: appointment.tokenNumber,
        patientsAhead: index,
        estimatedWaitMinutes: estimateWaitMinutes(state, appointment.tokenNumber, this.defaultAvgWaitMinutes),
      }));

    return { state, waiting };
  }

  /**
   * Finish an appointment: frees the doctor who was called for it and, for an
   * emergency appointment, resolves the linked case.
   */
  async complete(appointmentId: string): Promise<AppointmentTransitionResult> {
    const result = await this.transition(appointmentId, 'COMPLETED');
    if (!result.success) {
      return result;
    }
    const { appointment } = result;
    if (appointment.vetRef) {
      await this.doctorStatus.releaseAppointment(appointment.vetRef, appointmentId);
    }
    if (appointment.isEmergency && this.emergencyQueue) {
      await this.emergencyQueue.resolveForAppointment(appointmentId);
    }
    return result;
  }

  async cancel(appointmentId: string): Promise<AppointmentTransitionResult> {
    return this.transition(appointmentId, 'CANCELLED');
  }

  async markNoShow(appointmentId: string): Promise<AppointmentTransitionResult> {
    return this.transition(appointmentId, 'NO_SHOW');
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private lockKey(date: string): string {
    return appointmentDateLockKey(date);
  }

  private assertDate(date: string): void {
    const parsed = CalendarDateSchema.safeParse(date);
    if (!parsed.success) {
      throw ValidationError.fromZodIssues(parsed.error.issues);
    }
  }

  /** Caller must hold the date lock */
  private async issueToken(date: string): Promise<number> {
    const state = (await this.queueStates.get(date)) ?? emptyState(date);
    const next: DailyQueueState = { ...state, currentTokenCounter: state.currentTokenCounter + 1 };
    assertQueueStateTransition(state, next);
    await this.queueStates.save(next);

    logger.debug({ date, tokenNumber: next.currentTokenCounter }, 'Token issued');
    return next.currentTokenCounter;
  }

  private async transition(appointmentId: string, to: AppointmentStatus): Promise<AppointmentTransitionResult> {
    const found = await this.appointments.findById(appointmentId);
    if (!found) {
      return { success: false, error: 'NOT_FOUND' };
    }

    return this.lock.withLock(this.lockKey(found.date), async (): Promise<AppointmentTransitionResult> => {
      const appointment = await this.appointments.findById(appointmentId);
      if (!appointment) {
        return { success: false, error: 'NOT_FOUND' };
      }
      if (!canTransitionAppointment(appointment, to)) {
        return { success: false, error: 'INVALID_TRANSITION', status: appointment.status };
      }

      const updated: AppointmentSlot = { ...appointment, status: to };
      await this.appointments.save(updated);
      logger.info({ appointmentId, from: appointment.status, to }, 'Appointment status changed');
      return { success: true, appointment: updated };
    });
  }
}
