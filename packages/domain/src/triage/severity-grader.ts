import { InvariantViolationError } from '@vetqueue/core';
import type { Severity, TriageVerdict } from '@vetqueue/types';

import { findFirstKeyword, getDefaultSeverityKeywords, type SeverityVocabulary } from './keyword-tables.js';

export interface SeverityGrade {
  severity: Severity;
  /** Keyword that decided the grade; null for the MODERATE default */
  matchedKeyword: string | null;
}

/**
 * Grades an EMERGENCY verdict by scanning the raw complaint: CRITICAL
 * vocabulary first, then SEVERE, else MODERATE.
 */
export class SeverityGrader {
  constructor(private readonly vocabulary: SeverityVocabulary = getDefaultSeverityKeywords().symptoms) {}

  grade(verdict: TriageVerdict, rawText: string): Severity {
    return this.gradeWithEvidence(verdict, rawText).severity;
  }

  gradeWithEvidence(verdict: TriageVerdict, rawText: string): SeverityGrade {
    if (verdict.priority !== 'EMERGENCY') {
      throw new InvariantViolationError(
        'severity-requires-emergency',
        `Severity is only graded for EMERGENCY verdicts, got ${verdict.priority}`
      );
    }

    const critical = findFirstKeyword(rawText, this.vocabulary.CRITICAL);
    if (critical) {
      return { severity: 'CRITICAL', matchedKeyword: critical };
    }

    const severe = findFirstKeyword(rawText, this.vocabulary.SEVERE);
    if (severe) {
      return { severity: 'SEVERE', matchedKeyword: severe };
    }

    return { severity: 'MODERATE', matchedKeyword: null };
  }
}
