export {
  EmergencyQueue,
  SEVERITY_RANK,
  DEFAULT_COHORT_KEY,
  compareActiveCases,
  type ClaimResult,
  type CaseTransitionResult,
  type ResolveResult,
  type CaseActor,
  type EmergencyQueueDeps,
} from './emergency-queue.js';

export {
  InMemoryEmergencyCaseRepository,
  InMemoryEmergencyCohortRepository,
  isActiveEmergencyStatus,
  type EmergencyCaseRepository,
  type EmergencyCohortRepository,
  type EmergencyCaseExpectation,
} from './repositories.js';
