/**
 * Symptom Triage Schemas
 *
 * Priority and severity vocabularies, the triage verdict, and the reference data
 * consumed by the pattern tier and the image evidence upgrade.
 *
 * @module @vetqueue/types/schemas/triage
 */
import { z } from 'zod';

import { EntityRefSchema, UnitScoreSchema } from './common.js';

// =============================================================================
// Vocabularies
// =============================================================================

/**
 * Triage output for any symptom report (EMERGENCY > HIGH > NORMAL > LOW)
 */
export const PrioritySchema = z.enum(['EMERGENCY', 'HIGH', 'NORMAL', 'LOW']);

/**
 * Clinical urgency grade of a confirmed emergency (CRITICAL > SEVERE > MODERATE > MILD)
 */
export const SeveritySchema = z.enum(['CRITICAL', 'SEVERE', 'MODERATE', 'MILD']);

/**
 * Which step of the classification chain produced a verdict
 */
export const TriageSourceSchema = z.enum([
  'input_validation',
  'pattern_matcher',
  'reasoning_service',
  'keyword_classifier',
]);

export const PatternMatchTypeSchema = z.enum(['exact', 'partial']);

// =============================================================================
// Report and Verdict
// =============================================================================

export const SymptomReportSchema = z.object({
  text: z.string(),
  subjectId: EntityRefSchema.optional(),
});

export const TriageVerdictSchema = z.object({
  priority: PrioritySchema,
  reason: z.string(),
  source: TriageSourceSchema,
  /** Similarity of the matched pattern; null for tiers that do not score */
  matchScore: UnitScoreSchema.nullable(),
  /** Matched keywords, regex sources or pattern text behind the decision */
  rawEvidence: z.array(z.string()),
  /** Severity read from a linked pattern assessment (pattern tier only) */
  severity: SeveritySchema.nullable(),
  matchType: PatternMatchTypeSchema.nullable(),
});

// =============================================================================
// Pattern Library
// =============================================================================

export const SymptomPatternSchema = z.object({
  subjectTag: z.string().min(1).optional(),
  symptomText: z.string().min(1),
});

export const PatternAssessmentSchema = z.object({
  assessment: z.string(),
});

export const PatternLibrarySchema = z.object({
  patterns: z.array(SymptomPatternSchema),
  assessments: z.record(PatternAssessmentSchema),
});

// =============================================================================
// Image Classifier
// =============================================================================

export const ImageLabelScoreSchema = z.object({
  label: z.string().min(1),
  confidence: UnitScoreSchema,
});

export const ImageClassificationSchema = ImageLabelScoreSchema.extend({
  alternatives: z.array(ImageLabelScoreSchema).default([]),
});

export type Priority = z.infer<typeof PrioritySchema>;
export type Severity = z.infer<typeof SeveritySchema>;
export type TriageSource = z.infer<typeof TriageSourceSchema>;
export type PatternMatchType = z.infer<typeof PatternMatchTypeSchema>;
export type SymptomReport = z.infer<typeof SymptomReportSchema>;
export type TriageVerdict = z.infer<typeof TriageVerdictSchema>;
export type SymptomPattern = z.infer<typeof SymptomPatternSchema>;
export type PatternAssessment = z.infer<typeof PatternAssessmentSchema>;
export type PatternLibrary = z.infer<typeof PatternLibrarySchema>;
export type ImageLabelScore = z.infer<typeof ImageLabelScoreSchema>;
export type ImageClassification = z.infer<typeof ImageClassificationSchema>;
