/**
 * Emergency Queue
 *
 * Live ordering of emergency cases: severity first (CRITICAL before SEVERE
 * before MODERATE before MILD), then arrival order. Queue numbers are stable
 * identifiers handed out under the cohort lock; they never drive ordering.
 *
 * Claims and status changes are compare-and-set writes on the repository,
 * so two doctors racing for one case produce exactly one assignee.
 *
 * A case opened for an appointment shares its fate: resolving the case
 * completes the appointment, and `resolveForAppointment` closes the case when
 * the appointment is completed first.
 *
 * @module domain/emergency/emergency-queue
 */
import { v4 as uuidv4 } from 'uuid';
import {
  ConcurrencyError,
  ValidationError,
  createLogger,
  systemClock,
  type Clock,
  type KeyedLock,
} from '@vetqueue/core';
import {
  CreateEmergencyCaseSchema,
  type CreateEmergencyCase,
  type EmergencyCase,
  type EmergencyCaseStatus,
  type Severity,
} from '@vetqueue/types';

import {
  isActiveEmergencyStatus,
  type EmergencyCaseRepository,
  type EmergencyCohortRepository,
} from './repositories.js';
import { appointmentDateLockKey, canTransitionAppointment } from '../scheduling/appointment-lifecycle.js';
import type { AppointmentRepository } from '../scheduling/repositories.js';

const logger = createLogger({ name: 'emergency-queue' });

export const SEVERITY_RANK: Record<Severity, number> = {
  CRITICAL: 0,
  SEVERE: 1,
  MODERATE: 2,
  MILD: 3,
};

/** Conditional-write retries before a contended case is reported as a conflict */
const MAX_WRITE_ATTEMPTS = 3;

export const DEFAULT_COHORT_KEY = 'clinic';

/** Acts for the clinic when a linked appointment closes a case */
const APPOINTMENT_COMPLETION_ACTOR: CaseActor = { actorId: 'appointment-completion', isAdministrator: true };

// =============================================================================
// Results
// =============================================================================

export type ClaimResult =
  | { success: true; case: EmergencyCase; alreadyHeld: boolean }
  | { success: false; error: 'NOT_FOUND' | 'CASE_CLOSED' }
  | { success: false; error: 'ALREADY_ASSIGNED'; assignedVet: string };

export type CaseTransitionResult =
  | { success: true; case: EmergencyCase }
  | { success: false; error: 'NOT_FOUND' | 'NOT_PERMITTED' | 'CASE_CLOSED' };

export type ResolveResult = CaseTransitionResult;

/**
 * Who is acting on a case. Administrators may act on any case; a doctor only
 * on cases assigned to them.
 */
export interface CaseActor {
  actorId: string;
  isAdministrator?: boolean;
}

export interface EmergencyQueueDeps {
  cases: EmergencyCaseRepository;
  cohorts: EmergencyCohortRepository;
  lock: KeyedLock;
  /** Appointments referenced by `appointmentRef`; completed when their case resolves */
  appointments?: AppointmentRepository;
  clock?: Clock;
  idGenerator?: () => string;
  /** Identifies the queue's open cohort (one per clinic) */
  cohortKey?: string;
}

type TransitionDecision =
  | { kind: 'write'; next: EmergencyCase }
  | { kind: 'done'; result: CaseTransitionResult };

export function compareActiveCases(left: EmergencyCase, right: EmergencyCase): number {
  const bySeverity = SEVERITY_RANK[left.severity] - SEVERITY_RANK[right.severity];
  if (bySeverity !== 0) {
    return bySeverity;
  }
  return left.reportedAt.getTime() - right.reportedAt.getTime();
}

// =============================================================================
// Queue
// =============================================================================

export class EmergencyQueue {
  private readonly cases: EmergencyCaseRepository;
  private readonly cohorts: EmergencyCohortRepository;
  private readonly lock: KeyedLock;
  private readonly appointments: AppointmentRepository | null;
  private readonly clock: Clock;
  private readonly idGenerator: () => string;
  private readonly cohortKey: string;

  constructor(deps: EmergencyQueueDeps) {
    this.cases = deps.cases;
    this.cohorts = deps.cohorts;
    this.lock = deps.lock;
    this.appointments = deps.appointments ?? null;
    this.clock = deps.clock ?? systemClock;
    this.idGenerator = deps.idGenerator ?? (() => uuidv4());
    this.cohortKey = deps.cohortKey ?? DEFAULT_COHORT_KEY;
  }

  /**
   * Admit a case and assign its queue number.
   *
   * The number is one past the larger of the cohort's high-water mark and
   * the highest open number, so numbers are never reused while any case is
   * open. When the queue is empty a new cohort starts at 1.
   */
  async enqueue(input: CreateEmergencyCase): Promise<EmergencyCase> {
    const parsed = CreateEmergencyCaseSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZodIssues(parsed.error.issues);
    }
    const intake = parsed.data;

    return this.lock.withLock(`emergency-cohort:${this.cohortKey}`, async () => {
      const open = await this.cases.findActive();
      const cohort = await this.cohorts.get(this.cohortKey);

      const queueNumber =
        open.length === 0
          ? 1
          : Math.max(cohort?.highWaterMark ?? 0, ...open.map((entry) => entry.queueNumber)) + 1;

      const emergencyCase: EmergencyCase = {
        id: this.idGenerator(),
        petRef: intake.petRef,
        ownerRef: intake.ownerRef,
        appointmentRef: intake.appointmentRef,
        severity: intake.severity,
        symptoms: intake.symptoms,
        situation: intake.situation,
        assignedVet: null,
        status: 'WAITING',
        queueNumber,
        reportedAt: intake.reportedAt ?? this.clock.now(),
        treatmentStartedAt: null,
        resolvedAt: null,
        triageNotes: intake.triageNotes,
      };

      await this.cohorts.save({ cohortKey: this.cohortKey, highWaterMark: queueNumber });
      await this.cases.save(emergencyCase);

      logger.info(
        { caseId: emergencyCase.id, queueNumber, severity: emergencyCase.severity, openCases: open.length + 1 },
        'Emergency case enqueued'
      );
      return emergencyCase;
    });
  }

  /**
   * Assign a doctor to a case and start treatment.
   * Re-claiming by the assigned doctor is an idempotent success.
   */
  async claim(caseId: string, vetId: string): Promise<ClaimResult> {
    for (let attempt = 0; attempt < MAX_WRITE_ATTEMPTS; attempt++) {
      const current = await this.cases.findById(caseId);
      if (!current) {
        return { success: false, error: 'NOT_FOUND' };
      }
      if (!isActiveEmergencyStatus(current.status)) {
        return { success: false, error: 'CASE_CLOSED' };
      }
      if (current.assignedVet === vetId) {
        return { success: true, case: current, alreadyHeld: true };
      }
      if (current.assignedVet !== null) {
        logger.warn({ caseId, requestedBy: vetId, assignedVet: current.assignedVet }, 'Claim rejected, case already assigned');
        return { success: false, error: 'ALREADY_ASSIGNED', assignedVet: current.assignedVet };
      }

      const next: EmergencyCase = {
        ...current,
        assignedVet: vetId,
        status: 'IN_TREATMENT',
        treatmentStartedAt: current.treatmentStartedAt ?? this.clock.now(),
      };
      if (await this.cases.compareAndSet(caseId, { assignedVet: null, status: current.status }, next)) {
        logger.info({ caseId, vetId, queueNumber: next.queueNumber }, 'Emergency case claimed');
        return { success: true, case: next, alreadyHeld: false };
      }
    }

    throw new ConcurrencyError('EmergencyCase', caseId);
  }

  /**
   * Close a case. Permissive: no treatment details are required, and any
   * non-resolved status may be resolved. Resolving twice is a no-op success.
   * The linked appointment, if still open, is completed.
   */
  async resolve(caseId: string, actor: CaseActor): Promise<ResolveResult> {
    const result = await this.transition(caseId, actor, (current) => {
      if (current.status === 'RESOLVED') {
        return { kind: 'done', result: { success: true, case: current } };
      }
      return { kind: 'write', next: this.closed(current, 'RESOLVED') };
    });
    if (result.success) {
      await this.completeLinkedAppointment(result.case);
    }
    return result;
  }

  /**
   * Resolve the case opened for an appointment that has been completed.
   * Resolves null when no case references the appointment.
   */
  async resolveForAppointment(appointmentRef: string): Promise<ResolveResult | null> {
    const linked = await this.cases.findByAppointmentRef(appointmentRef);
    if (!linked) {
      return null;
    }
    return this.resolve(linked.id, APPOINTMENT_COMPLETION_ACTOR);
  }

  /**
   * Mark an active case as stabilized; it leaves the live queue
   */
  async stabilize(caseId: string, actor: CaseActor): Promise<CaseTransitionResult> {
    return this.transition(caseId, actor, (current) => {
      if (!isActiveEmergencyStatus(current.status)) {
        return { kind: 'done', result: { success: false, error: 'CASE_CLOSED' } };
      }
      return { kind: 'write', next: { ...current, status: 'STABILIZED' } };
    });
  }

  /**
   * Hand a case over to another facility
   */
  async refer(caseId: string, actor: CaseActor): Promise<CaseTransitionResult> {
    return this.transition(caseId, actor, (current) => {
      if (current.status === 'RESOLVED' || current.status === 'REFERRED') {
        return { kind: 'done', result: { success: false, error: 'CASE_CLOSED' } };
      }
      return { kind: 'write', next: this.closed(current, 'REFERRED') };
    });
  }

  /**
   * Open cases by (severity rank, reportedAt)
   */
  async activeOrdered(): Promise<EmergencyCase[]> {
    const open = await this.cases.findActive();
    return open.sort(compareActiveCases);
  }

  /**
   * Open cases a doctor may work on: their own and unassigned ones
   */
  async visibleTo(vetId: string): Promise<EmergencyCase[]> {
    const ordered = await this.activeOrdered();
    return ordered.filter((entry) => entry.assignedVet === null || entry.assignedVet === vetId);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private closed(current: EmergencyCase, status: EmergencyCaseStatus): EmergencyCase {
    return { ...current, status, resolvedAt: this.clock.now() };
  }

  private async completeLinkedAppointment(emergencyCase: EmergencyCase): Promise<void> {
    const { appointments } = this;
    const appointmentRef = emergencyCase.appointmentRef;
    if (!appointments || !appointmentRef) {
      return;
    }
    const found = await appointments.findById(appointmentRef);
    if (!found) {
      logger.warn({ caseId: emergencyCase.id, appointmentRef }, 'Linked appointment not found');
      return;
    }

    await this.lock.withLock(appointmentDateLockKey(found.date), async () => {
      const appointment = await appointments.findById(appointmentRef);
      if (!appointment || !canTransitionAppointment(appointment, 'COMPLETED')) {
        return;
      }
      await appointments.save({ ...appointment, status: 'COMPLETED' });
      logger.info(
        { caseId: emergencyCase.id, appointmentId: appointment.id, from: appointment.status },
        'Linked appointment completed'
      );
    });
  }

  private async transition(
    caseId: string,
    actor: CaseActor,
    decide: (current: EmergencyCase) => TransitionDecision
  ): Promise<CaseTransitionResult> {
    for (let attempt = 0; attempt < MAX_WRITE_ATTEMPTS; attempt++) {
      const current = await this.cases.findById(caseId);
      if (!current) {
        return { success: false, error: 'NOT_FOUND' };
      }
      if (!actor.isAdministrator && current.assignedVet !== actor.actorId) {
        logger.warn({ caseId, actorId: actor.actorId }, 'Case transition not permitted');
        return { success: false, error: 'NOT_PERMITTED' };
      }

      const decision = decide(current);
      if (decision.kind === 'done') {
        return decision.result;
      }

      const expected = { assignedVet: current.assignedVet, status: current.status };
      if (await this.cases.compareAndSet(caseId, expected, decision.next)) {
        logger.info({ caseId, from: current.status, to: decision.next.status }, 'Emergency case status changed');
        return { success: true, case: decision.next };
      }
    }

    throw new ConcurrencyError('EmergencyCase', caseId);
  }
}
