export {
  TokenScheduler,
  estimateWaitMinutes,
  assertQueueStateTransition,
  DEFAULT_AVG_WAIT_MINUTES,
  type CheckInResult,
  type AppointmentTransitionResult,
  type QueueEntry,
  type QueueSnapshot,
  type TokenSchedulerDeps,
} from './token-scheduler.js';

export {
  AppointmentBookingService,
  type BookingOutcome,
  type BookingRejection,
  type BookingOptions,
  type AppointmentBookingServiceDeps,
} from './booking-service.js';

export {
  APPOINTMENT_TRANSITIONS,
  OPEN_APPOINTMENT_STATUSES,
  canTransition,
  isTerminalStatus,
  isOpenStatus,
  canTransitionAppointment,
  appointmentDateLockKey,
} from './appointment-lifecycle.js';

export {
  InMemoryAppointmentRepository,
  InMemoryDailyQueueStateRepository,
  type AppointmentRepository,
  type DailyQueueStateRepository,
} from './repositories.js';
