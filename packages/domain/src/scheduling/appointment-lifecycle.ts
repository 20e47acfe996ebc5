import type { AppointmentSlot, AppointmentStatus } from '@vetqueue/types';

/**
 * Allowed appointment status transitions.
 * SCHEDULED -> CONFIRMED (check-in) -> IN_PROGRESS (called) -> COMPLETED;
 * CANCELLED and NO_SHOW close any open appointment.
 */
export const APPOINTMENT_TRANSITIONS: Record<AppointmentStatus, readonly AppointmentStatus[]> = {
  SCHEDULED: ['CONFIRMED', 'CANCELLED', 'NO_SHOW'],
  CONFIRMED: ['IN_PROGRESS', 'CANCELLED', 'NO_SHOW'],
  IN_PROGRESS: ['COMPLETED', 'CANCELLED', 'NO_SHOW'],
  COMPLETED: [],
  CANCELLED: [],
  NO_SHOW: [],
};

/** Statuses that still hold a doctor's time slot */
export const OPEN_APPOINTMENT_STATUSES: readonly AppointmentStatus[] = ['SCHEDULED', 'CONFIRMED', 'IN_PROGRESS'];

export function canTransition(from: AppointmentStatus, to: AppointmentStatus): boolean {
  return APPOINTMENT_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: AppointmentStatus): boolean {
  return APPOINTMENT_TRANSITIONS[status].length === 0;
}

export function isOpenStatus(status: AppointmentStatus): boolean {
  return OPEN_APPOINTMENT_STATUSES.includes(status);
}

/**
 * Emergency appointments never join the token queue, so they close straight
 * to COMPLETED from any open status. Everything else follows the table.
 */
export function canTransitionAppointment(
  appointment: Pick<AppointmentSlot, 'status' | 'isEmergency'>,
  to: AppointmentStatus
): boolean {
  if (appointment.isEmergency && to === 'COMPLETED') {
    return isOpenStatus(appointment.status);
  }
  return canTransition(appointment.status, to);
}

/** Lock guarding the appointments and token counters of one date */
export function appointmentDateLockKey(date: string): string {
  return `queue:${date}`;
}
