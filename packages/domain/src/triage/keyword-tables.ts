/**
 * Keyword vocabularies for the rule-based triage tier and severity grading.
 *
 * The vocabularies are data, shipped as JSON under `packages/domain/data`
 * and validated on first use.
 *
 * @module domain/triage/keyword-tables
 */
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';
import { ValidationError } from '@vetqueue/core';
import { PrioritySchema, type Priority } from '@vetqueue/types';

// =============================================================================
// Schemas
// =============================================================================

const RegexSourceSchema = z.string().min(1).refine(
  (source) => {
    try {
      new RegExp(source, 'i');
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Invalid regular expression' }
);

const KeywordTableSchema = z.object({
  priority: PrioritySchema,
  /** Reason prefix when literal keywords match */
  label: z.string().min(1),
  /** Reason when only a regex pattern matches */
  patternReason: z.string().min(1),
  keywords: z.array(z.string().min(1)),
  patterns: z.array(RegexSourceSchema),
});

export const KeywordTablesSchema = z.object({
  defaultReason: z.string().min(1),
  tables: z.array(KeywordTableSchema).min(1),
});

const SeverityVocabularySchema = z.object({
  CRITICAL: z.array(z.string().min(1)),
  SEVERE: z.array(z.string().min(1)),
});

export const SeverityKeywordsSchema = z.object({
  /** Scanned against raw symptom text by the severity grader */
  symptoms: SeverityVocabularySchema,
  /** Scanned against linked pattern assessments by the pattern matcher */
  assessments: SeverityVocabularySchema,
});

export type SeverityVocabulary = z.infer<typeof SeverityVocabularySchema>;
export type SeverityKeywords = z.infer<typeof SeverityKeywordsSchema>;

// =============================================================================
// Compiled tables
// =============================================================================

export interface KeywordTable {
  priority: Priority;
  label: string;
  patternReason: string;
  /** Lowercased literal keywords, in table order */
  keywords: readonly string[];
  patterns: readonly RegExp[];
}

export interface KeywordTables {
  defaultReason: string;
  tables: readonly KeywordTable[];
}

/**
 * Validate raw table data and compile its regex sources
 */
export function compileKeywordTables(raw: unknown): KeywordTables {
  const result = KeywordTablesSchema.safeParse(raw);
  if (!result.success) {
    throw ValidationError.fromZodIssues(result.error.issues);
  }

  return {
    defaultReason: result.data.defaultReason,
    tables: result.data.tables.map((table) => ({
      priority: table.priority,
      label: table.label,
      patternReason: table.patternReason,
      keywords: [...new Set(table.keywords.map((keyword) => keyword.toLowerCase()))],
      patterns: table.patterns.map((source) => new RegExp(source, 'i')),
    })),
  };
}

/**
 * Validate raw severity vocabularies, lowercasing every keyword
 */
export function parseSeverityKeywords(raw: unknown): SeverityKeywords {
  const result = SeverityKeywordsSchema.safeParse(raw);
  if (!result.success) {
    throw ValidationError.fromZodIssues(result.error.issues);
  }

  const lower = (vocabulary: SeverityVocabulary): SeverityVocabulary => ({
    CRITICAL: vocabulary.CRITICAL.map((keyword) => keyword.toLowerCase()),
    SEVERE: vocabulary.SEVERE.map((keyword) => keyword.toLowerCase()),
  });

  return { symptoms: lower(result.data.symptoms), assessments: lower(result.data.assessments) };
}

// =============================================================================
// Bundled data
// =============================================================================

function readBundledJson(fileName: string): unknown {
  const path = fileURLToPath(new URL(`../../data/${fileName}`, import.meta.url));
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parsed;
}

let defaultKeywordTables: KeywordTables | undefined;
let defaultSeverityKeywords: SeverityKeywords | undefined;

/**
 * Keyword tables shipped with the package (EMERGENCY, HIGH, NORMAL, LOW)
 */
export function getDefaultKeywordTables(): KeywordTables {
  defaultKeywordTables ??= compileKeywordTables(readBundledJson('triage-keywords.json'));
  return defaultKeywordTables;
}

/**
 * Severity vocabularies shipped with the package
 */
export function getDefaultSeverityKeywords(): SeverityKeywords {
  defaultSeverityKeywords ??= parseSeverityKeywords(readBundledJson('severity-keywords.json'));
  return defaultSeverityKeywords;
}

/**
 * First keyword of `keywords` contained in `text` (case-insensitive)
 */
export function findFirstKeyword(text: string, keywords: readonly string[]): string | null {
  const lower = text.toLowerCase();
  return keywords.find((keyword) => lower.includes(keyword)) ?? null;
}
