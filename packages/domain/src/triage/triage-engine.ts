/**
 * Triage Engine
 *
 * Runs a symptom report through an ordered chain of classifiers. The first
 * conclusive verdict wins; a tier that is missing, inconclusive or throws
 * cedes to the next one. The keyword tier closes the chain, so every report
 * gets a priority.
 *
 * @module domain/triage/triage-engine
 */
import { createLogger } from '@vetqueue/core';
import type { PatternLibrary, SymptomReport, TriageVerdict } from '@vetqueue/types';

import type { TriageClassifier } from './classifier.js';
import { KeywordClassifier } from './keyword-classifier.js';
import type { KeywordTables } from './keyword-tables.js';
import { PatternMatcher } from './pattern-matcher.js';
import { ReasoningClassifier, type ReasoningService } from './reasoning-classifier.js';

const logger = createLogger({ name: 'triage-engine' });

const EMPTY_REPORT_REASON = 'No symptoms provided';

function freezeVerdict(verdict: TriageVerdict): TriageVerdict {
  Object.freeze(verdict.rawEvidence);
  return Object.freeze(verdict);
}

export class TriageEngine {
  constructor(
    private readonly tiers: readonly TriageClassifier[],
    private readonly fallback: KeywordClassifier = new KeywordClassifier()
  ) {}

  /**
   * Classify free-text symptoms. Never rejects.
   */
  async classify(text: string, subjectId?: string): Promise<TriageVerdict> {
    if (!text.trim()) {
      return freezeVerdict({
        priority: 'NORMAL',
        reason: EMPTY_REPORT_REASON,
        source: 'input_validation',
        matchScore: null,
        rawEvidence: [],
        severity: null,
        matchType: null,
      });
    }

    const report: SymptomReport = subjectId ? { text, subjectId } : { text };

    for (const tier of this.tiers) {
      try {
        const outcome = await tier.tryClassify(report);
        if (outcome.conclusive) {
          logger.info(
            { source: outcome.verdict.source, priority: outcome.verdict.priority, textLength: text.length },
            'Triage verdict reached'
          );
          return freezeVerdict(outcome.verdict);
        }
        logger.debug({ tier: tier.source, outcome: outcome.reason }, 'Triage tier inconclusive');
      } catch (error) {
        logger.warn({ err: error, tier: tier.source }, 'Triage tier threw, treating as inconclusive');
      }
    }

    const verdict = this.fallback.classify(text);
    logger.info(
      { source: verdict.source, priority: verdict.priority, textLength: text.length },
      'Triage verdict reached'
    );
    return freezeVerdict(verdict);
  }
}

export interface TriageEngineOptions {
  /** Null or omitted disables the pattern tier */
  patternLibrary?: PatternLibrary | null;
  /** Null or omitted disables the reasoning tier */
  reasoningService?: ReasoningService | null;
  reasoningTimeoutMs?: number;
  keywordTables?: KeywordTables;
}

/**
 * Build the standard chain: pattern library, reasoning service, keywords
 */
export function createTriageEngine(options: TriageEngineOptions = {}): TriageEngine {
  const tiers: TriageClassifier[] = [];

  if (options.patternLibrary) {
    tiers.push(new PatternMatcher(options.patternLibrary));
  }
  if (options.reasoningService) {
    tiers.push(
      new ReasoningClassifier(
        options.reasoningService,
        options.reasoningTimeoutMs !== undefined ? { timeoutMs: options.reasoningTimeoutMs } : {}
      )
    );
  }

  return new TriageEngine(tiers, new KeywordClassifier(options.keywordTables));
}
