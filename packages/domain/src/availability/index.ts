export {
  AvailabilityGate,
  type AvailabilityDecision,
  type AvailabilityGateDeps,
} from './availability-gate.js';

export {
  DoctorStatusService,
  leaveCovers,
  type SetStatusOptions,
  type SetStatusResult,
  type DoctorStatusServiceDeps,
} from './doctor-status-service.js';

export {
  WeeklyClinicCalendar,
  alwaysOpenCalendar,
  type ClinicCalendar,
  type WeeklyClinicCalendarOptions,
} from './clinic-calendar.js';

export {
  InMemoryDoctorAvailabilityRepository,
  InMemoryDoctorStatusRepository,
  type DoctorAvailabilityRepository,
  type DoctorStatusRepository,
} from './repositories.js';
