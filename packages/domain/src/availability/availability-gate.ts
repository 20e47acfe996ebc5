/**
 * Availability Gate
 *
 * Decides whether a doctor can take a booking at a date and time:
 *   1. a leave range covering the date rejects;
 *   2. same-day requests reject ON_LEAVE and warn on OFF_DUTY;
 *   3. a date-specific record decides when present;
 *   4. otherwise the recurring weekday record decides;
 *   5. with no schedule at all the booking is allowed.
 *
 * @module domain/availability/availability-gate
 */
import { createLogger, systemClock, toCalendarDate, weekdayOf, type Clock } from '@vetqueue/core';
import { CalendarDateSchema, TimeOfDaySchema, type DateAvailability, type RecurringAvailability } from '@vetqueue/types';

import { leaveCovers, type DoctorStatusService } from './doctor-status-service.js';
import type { DoctorAvailabilityRepository } from './repositories.js';

const logger = createLogger({ name: 'availability-gate' });

const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'] as const;

export interface AvailabilityDecision {
  ok: boolean;
  /** Why the booking was rejected; empty when allowed */
  reason: string;
  /** Set when the booking is allowed but the front desk should be told something */
  warning?: string;
}

export interface AvailabilityGateDeps {
  availability: DoctorAvailabilityRepository;
  doctorStatus: DoctorStatusService;
  clock?: Clock;
  timeZone?: string;
}

function checkWindow(
  record: DateAvailability | RecurringAvailability,
  time: string,
  unavailableReason: string
): AvailabilityDecision | null {
  if (!record.isAvailable) {
    return { ok: false, reason: unavailableReason };
  }
  if (time < record.startTime || time > record.endTime) {
    return {
      ok: false,
      reason: `Doctor is only available between ${record.startTime} and ${record.endTime}`,
    };
  }
  return null;
}

export class AvailabilityGate {
  private readonly availability: DoctorAvailabilityRepository;
  private readonly doctorStatus: DoctorStatusService;
  private readonly clock: Clock;
  private readonly timeZone: string;

  constructor(deps: AvailabilityGateDeps) {
    this.availability = deps.availability;
    this.doctorStatus = deps.doctorStatus;
    this.clock = deps.clock ?? systemClock;
    this.timeZone = deps.timeZone ?? 'UTC';
  }

  async isBookable(vetId: string, date: string, time: string): Promise<AvailabilityDecision> {
    if (!CalendarDateSchema.safeParse(date).success) {
      return { ok: false, reason: 'Invalid date, expected YYYY-MM-DD' };
    }
    if (!TimeOfDaySchema.safeParse(time).success) {
      return { ok: false, reason: 'Invalid time, expected HH:MM' };
    }

    const decision = await this.decide(vetId, date, time);
    if (!decision.ok) {
      logger.info({ vetId, date, time, decision: decision.reason }, 'Booking rejected by availability');
    }
    return decision;
  }

  private async decide(vetId: string, date: string, time: string): Promise<AvailabilityDecision> {
    const status = await this.doctorStatus.getStatus(vetId);
    if (leaveCovers(status, date)) {
      return { ok: false, reason: `Doctor is on leave from ${status.leaveStart} to ${status.leaveEnd}` };
    }

    let warning: string | undefined;
    if (date === toCalendarDate(this.clock.now(), this.timeZone)) {
      if (status.state === 'ON_LEAVE') {
        return { ok: false, reason: 'Doctor is on leave today' };
      }
      if (status.state === 'OFF_DUTY') {
        warning = 'Doctor is currently off duty';
      }
    }
    const allowed: AvailabilityDecision = warning ? { ok: true, reason: '', warning } : { ok: true, reason: '' };

    const dateRecord = await this.availability.findForDate(vetId, date);
    if (dateRecord) {
      return checkWindow(dateRecord, time, `Doctor is not available on ${date}`) ?? allowed;
    }

    const weekday = weekdayOf(date);
    const recurring = await this.availability.findRecurring(vetId, weekday);
    if (recurring) {
      return checkWindow(recurring, time, `Doctor is not available on ${WEEKDAY_NAMES[weekday] ?? 'this day'}s`) ?? allowed;
    }

    // No schedule recorded: open by default
    return allowed;
  }
}
