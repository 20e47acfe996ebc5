/**
 * @vetqueue/domain
 *
 * Symptom triage and clinic queue scheduling. Services depend on repository
 * ports; in-memory adapters ship for tests and single-process use.
 */
export * from './triage/index.js';
export * from './emergency/index.js';
export * from './availability/index.js';
export * from './scheduling/index.js';
