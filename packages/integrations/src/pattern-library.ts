/**
 * Pattern library loader
 *
 * Reads the curated emergency presentations from two JSON files in one
 * directory. Any missing or malformed file yields `null`, which leaves the
 * pattern tier inconclusive instead of failing startup.
 */
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { createLogger } from '@vetqueue/core';
import { PatternAssessmentSchema, SymptomPatternSchema, type PatternLibrary } from '@vetqueue/types';

const logger = createLogger({ name: 'pattern-library' });

export const SYMPTOM_PATTERNS_FILE = 'symptom-patterns.json';
export const PATTERN_ASSESSMENTS_FILE = 'pattern-assessments.json';

const SymptomPatternsFileSchema = z.array(SymptomPatternSchema);
const PatternAssessmentsFileSchema = z.record(PatternAssessmentSchema);

async function readJson(path: string): Promise<unknown> {
  const raw = await readFile(path, 'utf8');
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

/**
 * Load and validate the pattern library under `directory`
 */
export async function loadPatternLibrary(directory: string): Promise<PatternLibrary | null> {
  let patternsRaw: unknown;
  let assessmentsRaw: unknown;
  try {
    [patternsRaw, assessmentsRaw] = await Promise.all([
      readJson(join(directory, SYMPTOM_PATTERNS_FILE)),
      readJson(join(directory, PATTERN_ASSESSMENTS_FILE)),
    ]);
  } catch (error) {
    logger.warn({ err: error, directory }, 'Pattern library unreadable, pattern tier disabled');
    return null;
  }

  const patterns = SymptomPatternsFileSchema.safeParse(patternsRaw);
  const assessments = PatternAssessmentsFileSchema.safeParse(assessmentsRaw);
  if (!patterns.success || !assessments.success) {
    logger.warn(
      {
        directory,
        patternIssues: patterns.success ? 0 : patterns.error.issues.length,
        assessmentIssues: assessments.success ? 0 : assessments.error.issues.length,
      },
      'Pattern library invalid, pattern tier disabled'
    );
    return null;
  }

  logger.info(
    { patternCount: patterns.data.length, assessmentCount: Object.keys(assessments.data).length },
    'Pattern library loaded'
  );
  return { patterns: patterns.data, assessments: assessments.data };
}
