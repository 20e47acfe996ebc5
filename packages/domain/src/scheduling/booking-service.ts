/**
 * Appointment Booking Service
 *
 * Orchestrates a booking: request validation, calendar and doctor checks,
 * triage of the stated reason, persistence and, for emergencies, admission
 * to the emergency queue.
 *
 * @module domain/scheduling/booking-service
 */
import { v4 as uuidv4 } from 'uuid';
import {
  ValidationError,
  createLogger,
  systemClock,
  toCalendarDate,
  toTimeOfDay,
  type Clock,
  type KeyedLock,
} from '@vetqueue/core';
import {
  BookingRequestSchema,
  type AppointmentSlot,
  type BookingRequest,
  type EmergencyCase,
  type ImageClassification,
  type Severity,
  type TriageVerdict,
} from '@vetqueue/types';

import type { AvailabilityGate } from '../availability/availability-gate.js';
import { alwaysOpenCalendar, type ClinicCalendar } from '../availability/clinic-calendar.js';
import type { EmergencyQueue } from '../emergency/emergency-queue.js';
import { applyImageEvidence, type ImageEvidenceOptions } from '../triage/image-evidence.js';
import { SeverityGrader } from '../triage/severity-grader.js';
import type { TriageEngine } from '../triage/triage-engine.js';
import { isOpenStatus } from './appointment-lifecycle.js';
import type { AppointmentRepository } from './repositories.js';

const logger = createLogger({ name: 'booking-service' });

export type BookingRejection =
  | 'INVALID_REQUEST'
  | 'IN_THE_PAST'
  | 'CLINIC_CLOSED'
  | 'VET_UNAVAILABLE'
  | 'SLOT_CONFLICT';

export type BookingOutcome =
  | {
      success: true;
      appointment: AppointmentSlot;
      verdict: TriageVerdict;
      /** Set when the booking was triaged as an emergency */
      emergencyCase: EmergencyCase | null;
      severity: Severity | null;
      warnings: string[];
    }
  | { success: false; error: BookingRejection; reason: string };

export interface BookingOptions {
  /** Classifier output for a photo attached to the booking */
  image?: ImageClassification;
}

export interface AppointmentBookingServiceDeps {
  appointments: AppointmentRepository;
  triage: TriageEngine;
  emergencyQueue: EmergencyQueue;
  availabilityGate: AvailabilityGate;
  lock: KeyedLock;
  severityGrader?: SeverityGrader;
  calendar?: ClinicCalendar;
  clock?: Clock;
  timeZone?: string;
  idGenerator?: () => string;
  imageEvidence?: ImageEvidenceOptions;
}

export class AppointmentBookingService {
  private readonly appointments: AppointmentRepository;
  private readonly triage: TriageEngine;
  private readonly emergencyQueue: EmergencyQueue;
  private readonly availabilityGate: AvailabilityGate;
  private readonly lock: KeyedLock;
  private readonly severityGrader: SeverityGrader;
  private readonly calendar: ClinicCalendar;
  private readonly clock: Clock;
  private readonly timeZone: string;
  private readonly idGenerator: () => string;
  private readonly imageEvidence: ImageEvidenceOptions;

  constructor(deps: AppointmentBookingServiceDeps) {
    this.appointments = deps.appointments;
    this.triage = deps.triage;
    this.emergencyQueue = deps.emergencyQueue;
    this.availabilityGate = deps.availabilityGate;
    this.lock = deps.lock;
    this.severityGrader = deps.severityGrader ?? new SeverityGrader();
    this.calendar = deps.calendar ?? alwaysOpenCalendar;
    this.clock = deps.clock ?? systemClock;
    this.timeZone = deps.timeZone ?? 'UTC';
    this.idGenerator = deps.idGenerator ?? (() => uuidv4());
    this.imageEvidence = deps.imageEvidence ?? {};
  }

  async book(request: BookingRequest, options: BookingOptions = {}): Promise<BookingOutcome> {
    const parsed = BookingRequestSchema.safeParse(request);
    if (!parsed.success) {
      return { success: false, error: 'INVALID_REQUEST', reason: ValidationError.fromZodIssues(parsed.error.issues).message };
    }
    const booking = parsed.data;

    const now = this.clock.now();
    const today = toCalendarDate(now, this.timeZone);
    if (booking.date < today || (booking.date === today && booking.time < toTimeOfDay(now, this.timeZone))) {
      return { success: false, error: 'IN_THE_PAST', reason: 'Cannot book appointments in the past' };
    }

    if (!(await this.calendar.isOpen(booking.date))) {
      return { success: false, error: 'CLINIC_CLOSED', reason: `The clinic is closed on ${booking.date}` };
    }

    const warnings: string[] = [];
    if (booking.vetRef) {
      const decision = await this.availabilityGate.isBookable(booking.vetRef, booking.date, booking.time);
      if (!decision.ok) {
        return { success: false, error: 'VET_UNAVAILABLE', reason: decision.reason };
      }
      if (decision.warning) {
        warnings.push(decision.warning);
      }
    }

    const verdict = await this.triage.classify(booking.reason, booking.petRef);
    const priority = options.image
      ? applyImageEvidence(verdict.priority, options.image, this.imageEvidence)
      : verdict.priority;
    const priorityReason =
      priority !== verdict.priority && options.image
        ? `${verdict.reason} (raised by image evidence: ${options.image.label})`
        : verdict.reason;

    const appointment: AppointmentSlot = {
      id: this.idGenerator(),
      petRef: booking.petRef,
      ownerRef: booking.ownerRef,
      vetRef: booking.vetRef ?? null,
      date: booking.date,
      time: booking.time,
      durationMinutes: booking.durationMinutes,
      status: 'SCHEDULED',
      priority,
      priorityReason,
      reason: booking.reason,
      isEmergency: priority === 'EMERGENCY',
      tokenNumber: null,
      checkInTime: null,
      createdAt: now,
    };

    const vetRef = booking.vetRef;
    if (vetRef) {
      const stored = await this.lock.withLock(`slot:${vetRef}:${booking.date}:${booking.time}`, async () => {
        const taken = await this.appointments.findByVetAndSlot(vetRef, booking.date, booking.time);
        if (taken.some((existing) => isOpenStatus(existing.status))) {
          return false;
        }
        await this.appointments.save(appointment);
        return true;
      });
      if (!stored) {
        return { success: false, error: 'SLOT_CONFLICT', reason: 'The selected time slot is already booked' };
      }
    } else {
      await this.appointments.save(appointment);
    }

    logger.info(
      { appointmentId: appointment.id, date: appointment.date, priority, source: verdict.source },
      'Appointment booked'
    );

    if (priority !== 'EMERGENCY') {
      return { success: true, appointment, verdict, emergencyCase: null, severity: null, warnings };
    }

    const grade = this.severityGrader.gradeWithEvidence(verdict, booking.reason);
    let emergencyCase = await this.emergencyQueue.enqueue({
      petRef: booking.petRef,
      ownerRef: booking.ownerRef,
      appointmentRef: appointment.id,
      severity: grade.severity,
      symptoms: booking.reason,
      situation: `Triaged at booking.\nSource: ${verdict.source}\nReason: ${verdict.reason}`,
      triageNotes: grade.matchedKeyword ? `Severity keyword: ${grade.matchedKeyword}` : '',
      reportedAt: now,
    });

    if (vetRef) {
      const claim = await this.emergencyQueue.claim(emergencyCase.id, vetRef);
      if (claim.success) {
        emergencyCase = claim.case;
      }
    }

    return { success: true, appointment, verdict, emergencyCase, severity: grade.severity, warnings };
  }
}
