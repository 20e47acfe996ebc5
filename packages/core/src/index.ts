/**
 * @vetqueue/core
 *
 * Ambient stack shared by every package: logging, errors, configuration,
 * async utilities, locking and clock.
 */

export {
  createLogger,
  withCorrelationId,
  generateCorrelationId,
  redactObject,
  logger,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  ValidationError,
  ExternalServiceError,
  TimeoutError,
  NotFoundError,
  ConcurrencyError,
  InvariantViolationError,
  isOperationalError,
  toSafeErrorResponse,
  type SafeErrorDetails,
} from './errors.js';

export { AppEnvSchema, validateEnv, getEnv, hasSecret, logSecretsStatus, type AppEnv } from './env.js';

export {
  withRetry,
  withTimeout,
  sleep,
  isDefined,
  isTransientError,
  backoffDelay,
  type RetryOptions,
} from './utils.js';

export { InMemoryKeyedLock, type KeyedLock } from './keyed-lock.js';

export {
  systemClock,
  fixedClock,
  toCalendarDate,
  toTimeOfDay,
  weekdayOf,
  minutesOfDay,
  type Clock,
} from './clock.js';
