/**
 * Doctor schedule and status ports with in-memory adapters
 *
 * @module domain/availability/repositories
 */
import type {
  DateAvailability,
  DoctorAvailability,
  DoctorStatus,
  RecurringAvailability,
} from '@vetqueue/types';

export interface DoctorAvailabilityRepository {
  /** Date-specific override for one doctor and day */
  findForDate(vetRef: string, date: string): Promise<DateAvailability | null>;
  /** Recurring weekly record, weekday 0 = Monday */
  findRecurring(vetRef: string, weekday: number): Promise<RecurringAvailability | null>;
  save(record: DoctorAvailability): Promise<void>;
}

export interface DoctorStatusRepository {
  get(vetRef: string): Promise<DoctorStatus | null>;
  save(status: DoctorStatus): Promise<void>;
}

function availabilityKey(record: DoctorAvailability): string {
  return record.kind === 'date'
    ? `${record.vetRef}|date|${record.date}`
    : `${record.vetRef}|weekday|${record.weekday}`;
}

export class InMemoryDoctorAvailabilityRepository implements DoctorAvailabilityRepository {
  private records = new Map<string, DoctorAvailability>();

  findForDate(vetRef: string, date: string): Promise<DateAvailability | null> {
    const record = this.records.get(`${vetRef}|date|${date}`);
    return Promise.resolve(record?.kind === 'date' ? { ...record } : null);
  }

  findRecurring(vetRef: string, weekday: number): Promise<RecurringAvailability | null> {
    const record = this.records.get(`${vetRef}|weekday|${weekday}`);
    return Promise.resolve(record?.kind === 'recurring' ? { ...record } : null);
  }

  /**
   * Add or replace the record for the same doctor and day
   */
  save(record: DoctorAvailability): Promise<void> {
    this.records.set(availabilityKey(record), { ...record });
    return Promise.resolve();
  }
}

export class InMemoryDoctorStatusRepository implements DoctorStatusRepository {
  private statuses = new Map<string, DoctorStatus>();

  get(vetRef: string): Promise<DoctorStatus | null> {
    const status = this.statuses.get(vetRef);
    return Promise.resolve(status ? { ...status } : null);
  }

  save(status: DoctorStatus): Promise<void> {
    this.statuses.set(status.vetRef, { ...status });
    return Promise.resolve();
  }
}
