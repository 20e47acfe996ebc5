/**
 * VetQueue Types Package
 *
 * Zod schemas and inferred types for the triage and clinic queue platform.
 * All schemas live in the schemas/ directory as the Single Source of Truth.
 *
 * @module @vetqueue/types
 *
 * ## Domain Schemas (`schemas/`)
 * - Common validation (calendar dates, times of day, entity references)
 * - Triage (priority, severity, verdicts, pattern library, image classifier output)
 * - Emergency cases and cohort counters
 * - Appointments, booking requests and daily queue state
 * - Doctor availability and status
 */
export * from './schemas/index.js';
