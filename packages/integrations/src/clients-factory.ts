/**
 * Client factory: turns validated environment config into the triage
 * collaborators and the clinic services that depend on them.
 *
 * Optional collaborators degrade instead of failing: without an API key the
 * reasoning tier is skipped, and without a readable pattern library the
 * pattern tier is skipped. The keyword tier is always present.
 */

import {
  InMemoryKeyedLock,
  createLogger,
  getEnv,
  logSecretsStatus,
  systemClock,
  type AppEnv,
  type Clock,
  type KeyedLock,
} from '@vetqueue/core';
import {
  AppointmentBookingService,
  AvailabilityGate,
  DoctorStatusService,
  EmergencyQueue,
  InMemoryAppointmentRepository,
  InMemoryDailyQueueStateRepository,
  InMemoryDoctorAvailabilityRepository,
  InMemoryDoctorStatusRepository,
  InMemoryEmergencyCaseRepository,
  InMemoryEmergencyCohortRepository,
  TokenScheduler,
  alwaysOpenCalendar,
  createTriageEngine,
  type AppointmentRepository,
  type ClinicCalendar,
  type DailyQueueStateRepository,
  type DoctorAvailabilityRepository,
  type DoctorStatusRepository,
  type EmergencyCaseRepository,
  type EmergencyCohortRepository,
  type ImageEvidenceOptions,
  type ReasoningService,
  type TriageEngine,
} from '@vetqueue/domain';
import type { PatternLibrary } from '@vetqueue/types';

import { createOpenAIReasoningService } from './openai.js';
import { loadPatternLibrary } from './pattern-library.js';

const logger = createLogger({ name: 'clients-factory' });

/** Supported client names for configuration checks */
export type ClientName = 'reasoning' | 'patternLibrary';

/**
 * Result of triage client initialization
 */
export interface TriageClients {
  reasoningService: ReasoningService | null;
  patternLibrary: PatternLibrary | null;
  triageEngine: TriageEngine;
  imageEvidence: ImageEvidenceOptions;
  /** Returns true if all required optional clients are available */
  isConfigured: (required: ClientName[]) => boolean;
}

/**
 * Build the triage chain from config
 */
export async function createTriageClients(env: AppEnv = getEnv()): Promise<TriageClients> {
  logSecretsStatus(logger);

  const reasoningService = env.OPENAI_API_KEY
    ? createOpenAIReasoningService({
        apiKey: env.OPENAI_API_KEY,
        model: env.REASONING_MODEL,
        timeoutMs: env.REASONING_TIMEOUT_MS,
      })
    : null;

  const patternLibrary = env.PATTERN_LIBRARY_DIR ? await loadPatternLibrary(env.PATTERN_LIBRARY_DIR) : null;

  const triageEngine = createTriageEngine({
    patternLibrary,
    reasoningService,
    reasoningTimeoutMs: env.REASONING_TIMEOUT_MS,
  });

  const available: Record<ClientName, boolean> = {
    reasoning: reasoningService !== null,
    patternLibrary: patternLibrary !== null,
  };

  logger.info(available, 'Triage clients initialized');

  return {
    reasoningService,
    patternLibrary,
    triageEngine,
    imageEvidence: {
      seriousLabels: env.SERIOUS_SKIN_CONDITIONS,
      confidenceThreshold: env.IMAGE_CONFIDENCE_THRESHOLD,
    },
    isConfigured: (required) => required.every((name) => available[name]),
  };
}

// =============================================================================
// Clinic services
// =============================================================================

export interface ClinicRepositories {
  emergencyCases: EmergencyCaseRepository;
  emergencyCohorts: EmergencyCohortRepository;
  appointments: AppointmentRepository;
  queueStates: DailyQueueStateRepository;
  availability: DoctorAvailabilityRepository;
  doctorStatuses: DoctorStatusRepository;
}

export interface ClinicServicesOptions {
  env?: AppEnv;
  /** Storage adapters; in-memory adapters when omitted */
  repositories?: Partial<ClinicRepositories>;
  lock?: KeyedLock;
  clock?: Clock;
  calendar?: ClinicCalendar;
}

export interface ClinicServices extends TriageClients {
  emergencyQueue: EmergencyQueue;
  tokenScheduler: TokenScheduler;
  doctorStatus: DoctorStatusService;
  availabilityGate: AvailabilityGate;
  booking: AppointmentBookingService;
}

/**
 * Wire every clinic service around one lock, clock and clinic time zone
 */
export async function createClinicServices(options: ClinicServicesOptions = {}): Promise<ClinicServices> {
  const env = options.env ?? getEnv();
  const triage = await createTriageClients(env);

  const lock = options.lock ?? new InMemoryKeyedLock();
  const clock = options.clock ?? systemClock;
  const timeZone = env.CLINIC_TIMEZONE;
  const repositories = options.repositories ?? {};
  const appointments = repositories.appointments ?? new InMemoryAppointmentRepository();

  const emergencyQueue = new EmergencyQueue({
    cases: repositories.emergencyCases ?? new InMemoryEmergencyCaseRepository(),
    cohorts: repositories.emergencyCohorts ?? new InMemoryEmergencyCohortRepository(),
    lock,
    appointments,
    clock,
  });
  const doctorStatus = new DoctorStatusService({
    statuses: repositories.doctorStatuses ?? new InMemoryDoctorStatusRepository(),
    lock,
    clock,
    timeZone,
  });
  const availabilityGate = new AvailabilityGate({
    availability: repositories.availability ?? new InMemoryDoctorAvailabilityRepository(),
    doctorStatus,
    clock,
    timeZone,
  });
  const tokenScheduler = new TokenScheduler({
    appointments,
    queueStates: repositories.queueStates ?? new InMemoryDailyQueueStateRepository(),
    lock,
    doctorStatus,
    emergencyQueue,
    clock,
    defaultAvgWaitMinutes: env.DEFAULT_AVG_WAIT_MINUTES,
  });
  const booking = new AppointmentBookingService({
    appointments,
    triage: triage.triageEngine,
    emergencyQueue,
    availabilityGate,
    lock,
    calendar: options.calendar ?? alwaysOpenCalendar,
    clock,
    timeZone,
    imageEvidence: triage.imageEvidence,
  });

  logger.info({ timeZone, defaultAvgWaitMinutes: env.DEFAULT_AVG_WAIT_MINUTES }, 'Clinic services initialized');

  return { ...triage, emergencyQueue, tokenScheduler, doctorStatus, availabilityGate, booking };
}
