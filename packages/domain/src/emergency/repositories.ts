/**
 * Emergency case persistence ports and in-memory adapters
 *
 * @module domain/emergency/repositories
 */
import {
  ACTIVE_EMERGENCY_STATUSES,
  type EmergencyCase,
  type EmergencyCaseStatus,
  type EmergencyCohortState,
} from '@vetqueue/types';

/**
 * Fields a conditional write checks before replacing a case
 */
export interface EmergencyCaseExpectation {
  assignedVet: string | null;
  status: EmergencyCaseStatus;
}

export interface EmergencyCaseRepository {
  save(emergencyCase: EmergencyCase): Promise<void>;
  findById(caseId: string): Promise<EmergencyCase | null>;
  /** Cases in WAITING or IN_TREATMENT, in insertion order */
  findActive(): Promise<EmergencyCase[]>;
  /** The case opened for an appointment, if any */
  findByAppointmentRef(appointmentRef: string): Promise<EmergencyCase | null>;
  /**
   * Replace the case only if its current assignee and status equal
   * `expected`. Resolves false when the case changed or does not exist.
   */
  compareAndSet(caseId: string, expected: EmergencyCaseExpectation, next: EmergencyCase): Promise<boolean>;
}

export interface EmergencyCohortRepository {
  get(cohortKey: string): Promise<EmergencyCohortState | null>;
  save(state: EmergencyCohortState): Promise<void>;
}

const ACTIVE_STATUSES = new Set<EmergencyCaseStatus>(ACTIVE_EMERGENCY_STATUSES);

export function isActiveEmergencyStatus(status: EmergencyCaseStatus): boolean {
  return ACTIVE_STATUSES.has(status);
}

// =============================================================================
// In-memory adapters
// =============================================================================

/**
 * In-memory case store (tests, single-process deployments)
 */
export class InMemoryEmergencyCaseRepository implements EmergencyCaseRepository {
  private cases = new Map<string, EmergencyCase>();

  save(emergencyCase: EmergencyCase): Promise<void> {
    this.cases.set(emergencyCase.id, { ...emergencyCase });
    return Promise.resolve();
  }

  findById(caseId: string): Promise<EmergencyCase | null> {
    const found = this.cases.get(caseId);
    return Promise.resolve(found ? { ...found } : null);
  }

  findActive(): Promise<EmergencyCase[]> {
    return Promise.resolve(
      Array.from(this.cases.values())
        .filter((emergencyCase) => isActiveEmergencyStatus(emergencyCase.status))
        .map((emergencyCase) => ({ ...emergencyCase }))
    );
  }

  findByAppointmentRef(appointmentRef: string): Promise<EmergencyCase | null> {
    for (const emergencyCase of this.cases.values()) {
      if (emergencyCase.appointmentRef === appointmentRef) {
        return Promise.resolve({ ...emergencyCase });
      }
    }
    return Promise.resolve(null);
  }

  compareAndSet(caseId: string, expected: EmergencyCaseExpectation, next: EmergencyCase): Promise<boolean> {
    const current = this.cases.get(caseId);
    if (!current || current.assignedVet !== expected.assignedVet || current.status !== expected.status) {
      return Promise.resolve(false);
    }
    this.cases.set(caseId, { ...next });
    return Promise.resolve(true);
  }

  /**
   * Clear all cases
   */
  clear(): void {
    this.cases.clear();
  }
}

export class InMemoryEmergencyCohortRepository implements EmergencyCohortRepository {
  private states = new Map<string, EmergencyCohortState>();

  get(cohortKey: string): Promise<EmergencyCohortState | null> {
    const state = this.states.get(cohortKey);
    return Promise.resolve(state ? { ...state } : null);
  }

  save(state: EmergencyCohortState): Promise<void> {
    this.states.set(state.cohortKey, { ...state });
    return Promise.resolve();
  }
}
