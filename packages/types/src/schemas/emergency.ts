/**
 * Emergency Case Schemas
 *
 * @module @vetqueue/types/schemas/emergency
 */
import { z } from 'zod';

import { EntityRefSchema, TimestampSchema } from './common.js';
import { SeveritySchema } from './triage.js';

export const EmergencyCaseStatusSchema = z.enum([
  'WAITING',
  'IN_TREATMENT',
  'STABILIZED',
  'RESOLVED',
  'REFERRED',
]);

/**
 * Statuses that keep a case in the live emergency queue
 */
export const ACTIVE_EMERGENCY_STATUSES = ['WAITING', 'IN_TREATMENT'] as const;

export const EmergencyCaseSchema = z.object({
  id: z.string().min(1),
  petRef: EntityRefSchema,
  ownerRef: EntityRefSchema,
  appointmentRef: z.string().nullable(),
  severity: SeveritySchema,
  symptoms: z.string(),
  /** Free-text context recorded at intake (triage source, reason) */
  situation: z.string(),
  assignedVet: EntityRefSchema.nullable(),
  status: EmergencyCaseStatusSchema,
  /** Stable identifier within the open cohort; not an ordering key */
  queueNumber: z.number().int().positive(),
  reportedAt: TimestampSchema,
  treatmentStartedAt: TimestampSchema.nullable(),
  resolvedAt: TimestampSchema.nullable(),
  triageNotes: z.string(),
});

/**
 * Intake payload; queue number, status and timestamps are assigned by the queue
 */
export const CreateEmergencyCaseSchema = z.object({
  petRef: EntityRefSchema,
  ownerRef: EntityRefSchema,
  appointmentRef: z.string().nullable().default(null),
  severity: SeveritySchema,
  symptoms: z.string(),
  situation: z.string().default(''),
  triageNotes: z.string().default(''),
  reportedAt: TimestampSchema.optional(),
});

/**
 * Counter state owned by one open cohort of emergency cases
 */
export const EmergencyCohortStateSchema = z.object({
  cohortKey: z.string().min(1),
  highWaterMark: z.number().int().min(0),
});

export type EmergencyCaseStatus = z.infer<typeof EmergencyCaseStatusSchema>;
export type EmergencyCase = z.infer<typeof EmergencyCaseSchema>;
export type CreateEmergencyCase = z.input<typeof CreateEmergencyCaseSchema>;
export type EmergencyCohortState = z.infer<typeof EmergencyCohortStateSchema>;
