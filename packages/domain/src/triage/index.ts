/**
 * Symptom triage: classifier chain, severity grading and image evidence
 */
export {
  conclusive,
  inconclusive,
  type ClassifierOutcome,
  type TriageClassifier,
} from './classifier.js';

export {
  compileKeywordTables,
  parseSeverityKeywords,
  getDefaultKeywordTables,
  getDefaultSeverityKeywords,
  findFirstKeyword,
  KeywordTablesSchema,
  SeverityKeywordsSchema,
  type KeywordTable,
  type KeywordTables,
  type SeverityKeywords,
  type SeverityVocabulary,
} from './keyword-tables.js';

export { KeywordClassifier } from './keyword-classifier.js';

export {
  PatternMatcher,
  PARTIAL_MATCH_KEYWORD_THRESHOLD,
  priorityFromAssessment,
  severityFromAssessment,
  reasonFromAssessment,
  type PatternMatch,
} from './pattern-matcher.js';

export {
  ReasoningClassifier,
  buildTriagePrompt,
  parseReasoningReply,
  TRIAGE_SYSTEM_PROMPT,
  DEFAULT_REASONING_TIMEOUT_MS,
  type ReasoningService,
  type ReasoningClassifierOptions,
  type TriagePrompt,
  type ReasoningCallOptions,
  type ReasoningCategory,
  type ParsedReasoningReply,
} from './reasoning-classifier.js';

export { TriageEngine, createTriageEngine, type TriageEngineOptions } from './triage-engine.js';

export { SeverityGrader, type SeverityGrade } from './severity-grader.js';

export {
  applyImageEvidence,
  DEFAULT_SERIOUS_LABELS,
  DEFAULT_IMAGE_CONFIDENCE_THRESHOLD,
  type ImageClassifier,
  type ImageEvidenceOptions,
} from './image-evidence.js';

export {
  normalizeText,
  extractKeywords,
  keywordSimilarity,
  sequenceSimilarity,
} from './text-similarity.js';
