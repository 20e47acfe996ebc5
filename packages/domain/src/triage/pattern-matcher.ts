/**
 * Pattern tier: matches a complaint against a curated library of known
 * emergency presentations and reads priority, severity and reason from the
 * assessment linked to the matched pattern.
 *
 * @module domain/triage/pattern-matcher
 */
import type {
  PatternLibrary,
  PatternMatchType,
  Priority,
  Severity,
  SymptomPattern,
  SymptomReport,
  TriageVerdict,
} from '@vetqueue/types';

import { conclusive, inconclusive, type ClassifierOutcome, type TriageClassifier } from './classifier.js';
import {
  findFirstKeyword,
  getDefaultSeverityKeywords,
  type SeverityVocabulary,
} from './keyword-tables.js';
import { extractKeywords, keywordSimilarity, normalizeText, sequenceSimilarity } from './text-similarity.js';

/** Keyword Jaccard index at which a pattern counts as a partial match */
export const PARTIAL_MATCH_KEYWORD_THRESHOLD = 0.5;

const UNLINKED_PATTERN_REASON = 'Symptoms matched predefined emergency pattern';
const EMPTY_ASSESSMENT_REASON = 'Symptoms require attention';

export interface PatternMatch {
  pattern: SymptomPattern;
  score: number;
  matchType: PatternMatchType;
}

interface PreparedPattern {
  pattern: SymptomPattern;
  normalized: string;
  keywords: Set<string>;
}

// =============================================================================
// Assessment readers
// =============================================================================

export function priorityFromAssessment(assessment: string): Priority {
  const lower = assessment.toLowerCase();
  if (lower.includes('emergency')) return 'EMERGENCY';
  if (lower.includes('urgent')) return 'HIGH';
  return 'NORMAL';
}

export function severityFromAssessment(
  assessment: string,
  vocabulary: SeverityVocabulary = getDefaultSeverityKeywords().assessments
): Severity {
  if (findFirstKeyword(assessment, vocabulary.CRITICAL)) return 'CRITICAL';
  if (findFirstKeyword(assessment, vocabulary.SEVERE)) return 'SEVERE';
  return 'MODERATE';
}

/**
 * Text after the last "reason:" marker, else the first sentence
 */
export function reasonFromAssessment(assessment: string): string {
  const lowered = assessment.toLowerCase();
  const marker = lowered.lastIndexOf('reason:');
  if (marker >= 0) {
    const rest = lowered.slice(marker + 'reason:'.length).trim();
    return rest ? rest.charAt(0).toUpperCase() + rest.slice(1) : EMPTY_ASSESSMENT_REASON;
  }

  if (assessment) {
    return (assessment.split('.')[0] ?? '').trim();
  }
  return EMPTY_ASSESSMENT_REASON;
}

// =============================================================================
// Matcher
// =============================================================================

export class PatternMatcher implements TriageClassifier {
  readonly source = 'pattern_matcher' as const;
  private readonly prepared: PreparedPattern[] | null;

  constructor(
    private readonly library: PatternLibrary | null,
    private readonly assessmentVocabulary: SeverityVocabulary = getDefaultSeverityKeywords().assessments
  ) {
    this.prepared = library
      ? library.patterns
          .map((pattern) => ({
            pattern,
            normalized: normalizeText(pattern.symptomText),
            keywords: extractKeywords(pattern.symptomText),
          }))
          .filter((entry) => entry.normalized.length > 0)
      : null;
  }

  get isAvailable(): boolean {
    return this.prepared !== null;
  }

  /**
   * Best pattern for the text. An exact match wins outright; otherwise the
   * strictly highest partial score, first pattern on ties.
   */
  match(text: string, subjectId?: string): PatternMatch | null {
    if (!this.prepared) {
      return null;
    }

    const input = normalizeText(text);
    if (!input) {
      return null;
    }
    const inputKeywords = extractKeywords(text);

    let best: PatternMatch | null = null;
    for (const entry of this.prepared) {
      const tag = entry.pattern.subjectTag;
      if (subjectId && tag && tag !== subjectId) {
        continue;
      }

      if (entry.normalized === input) {
        return { pattern: entry.pattern, score: 1, matchType: 'exact' };
      }

      const keywordScore = keywordSimilarity(inputKeywords, entry.keywords);
      const isPartial =
        input.includes(entry.normalized) ||
        entry.normalized.includes(input) ||
        keywordScore >= PARTIAL_MATCH_KEYWORD_THRESHOLD;
      if (!isPartial) {
        continue;
      }

      const score = Math.max(sequenceSimilarity(input, entry.normalized), keywordScore);
      if (score > (best?.score ?? 0)) {
        best = { pattern: entry.pattern, score, matchType: 'partial' };
      }
    }

    return best;
  }

  tryClassify(report: SymptomReport): Promise<ClassifierOutcome> {
    if (!this.library) {
      return Promise.resolve(inconclusive('pattern library unavailable'));
    }

    const match = this.match(report.text, report.subjectId);
    if (!match) {
      return Promise.resolve(inconclusive('no matching pattern'));
    }

    return Promise.resolve(conclusive(this.toVerdict(match, this.library)));
  }

  private toVerdict(match: PatternMatch, library: PatternLibrary): TriageVerdict {
    const tag = match.pattern.subjectTag;
    const linked = tag !== undefined ? library.assessments[tag] : undefined;

    const base = {
      source: this.source,
      matchScore: match.score,
      rawEvidence: [match.pattern.symptomText],
      matchType: match.matchType,
    };

    if (!linked) {
      return { ...base, priority: 'EMERGENCY', severity: 'MODERATE', reason: UNLINKED_PATTERN_REASON };
    }

    return {
      ...base,
      priority: priorityFromAssessment(linked.assessment),
      severity: severityFromAssessment(linked.assessment, this.assessmentVocabulary),
      reason: reasonFromAssessment(linked.assessment),
    };
  }
}
