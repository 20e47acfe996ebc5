/**
 * Consolidated schemas - Single Source of Truth
 */
export * from './common.js';
export * from './triage.js';
export * from './emergency.js';
export * from './appointment.js';
export * from './availability.js';
