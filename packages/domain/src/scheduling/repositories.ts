/**
 * Appointment and daily queue ports with in-memory adapters
 *
 * @module domain/scheduling/repositories
 */
import type { AppointmentSlot, DailyQueueState } from '@vetqueue/types';

export interface AppointmentRepository {
  save(appointment: AppointmentSlot): Promise<void>;
  findById(appointmentId: string): Promise<AppointmentSlot | null>;
  findByDate(date: string): Promise<AppointmentSlot[]>;
  /** Appointments of one doctor at one date and time, any status */
  findByVetAndSlot(vetRef: string, date: string, time: string): Promise<AppointmentSlot[]>;
}

export interface DailyQueueStateRepository {
  get(date: string): Promise<DailyQueueState | null>;
  save(state: DailyQueueState): Promise<void>;
}

export class InMemoryAppointmentRepository implements AppointmentRepository {
  private appointments = new Map<string, AppointmentSlot>();

  save(appointment: AppointmentSlot): Promise<void> {
    this.appointments.set(appointment.id, { ...appointment });
    return Promise.resolve();
  }

  findById(appointmentId: string): Promise<AppointmentSlot | null> {
    const found = this.appointments.get(appointmentId);
    return Promise.resolve(found ? { ...found } : null);
  }

  findByDate(date: string): Promise<AppointmentSlot[]> {
    return Promise.resolve(this.matching((appointment) => appointment.date === date));
  }

  findByVetAndSlot(vetRef: string, date: string, time: string): Promise<AppointmentSlot[]> {
    return Promise.resolve(
      this.matching(
        (appointment) => appointment.vetRef === vetRef && appointment.date === date && appointment.time === time
      )
    );
  }

  /**
   * Clear all appointments
   */
  clear(): void {
    this.appointments.clear();
  }

  private matching(predicate: (appointment: AppointmentSlot) => boolean): AppointmentSlot[] {
    return Array.from(this.appointments.values())
      .filter(predicate)
      .map((appointment) => ({ ...appointment }));
  }
}

export class InMemoryDailyQueueStateRepository implements DailyQueueStateRepository {
  private states = new Map<string, DailyQueueState>();

  get(date: string): Promise<DailyQueueState | null> {
    const state = this.states.get(date);
    return Promise.resolve(state ? { ...state } : null);
  }

  save(state: DailyQueueState): Promise<void> {
    this.states.set(state.date, { ...state });
    return Promise.resolve();
  }
}
