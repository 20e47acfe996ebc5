import type { SymptomReport, TriageVerdict } from '@vetqueue/types';

import { conclusive, type ClassifierOutcome, type TriageClassifier } from './classifier.js';
import { getDefaultKeywordTables, type KeywordTables } from './keyword-tables.js';

/** Matched keywords listed in a verdict reason */
const REASON_KEYWORD_LIMIT = 3;

/**
 * Deterministic rule-based tier. Always conclusive, so it closes the chain.
 *
 * Tables are scanned in order (EMERGENCY, HIGH, NORMAL, LOW). Within a table
 * literal keywords are checked first, then regex patterns; the first table
 * with any hit decides the priority.
 */
export class KeywordClassifier implements TriageClassifier {
  readonly source = 'keyword_classifier' as const;

  constructor(private readonly tables: KeywordTables = getDefaultKeywordTables()) {}

  classify(text: string): TriageVerdict {
    const lower = text.toLowerCase().trim();

    for (const table of this.tables.tables) {
      const matched = table.keywords.filter((keyword) => lower.includes(keyword));
      if (matched.length > 0) {
        return this.verdict(
          table.priority,
          `${table.label}: ${matched.slice(0, REASON_KEYWORD_LIMIT).join(', ')}`,
          matched
        );
      }

      const pattern = table.patterns.find((candidate) => candidate.test(lower));
      if (pattern) {
        return this.verdict(table.priority, table.patternReason, [pattern.source]);
      }
    }

    return this.verdict('NORMAL', this.tables.defaultReason, []);
  }

  tryClassify(report: SymptomReport): Promise<ClassifierOutcome> {
    return Promise.resolve(conclusive(this.classify(report.text)));
  }

  private verdict(priority: TriageVerdict['priority'], reason: string, rawEvidence: string[]): TriageVerdict {
    return {
      priority,
      reason,
      source: this.source,
      matchScore: null,
      rawEvidence,
      severity: null,
      matchType: null,
    };
  }
}
