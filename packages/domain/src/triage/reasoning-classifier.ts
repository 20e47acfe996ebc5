/**
 * Reasoning tier: asks an external language-model service to sort a
 * complaint into Emergency / Urgent / Routine.
 *
 * Any failure (transport error, timeout, unparsable reply) makes the tier
 * inconclusive. Nothing is propagated to the caller.
 *
 * @module domain/triage/reasoning-classifier
 */
import { createLogger, withTimeout } from '@vetqueue/core';
import type { Priority, SymptomReport, TriageVerdict } from '@vetqueue/types';

import { conclusive, inconclusive, type ClassifierOutcome, type TriageClassifier } from './classifier.js';

const logger = createLogger({ name: 'reasoning-classifier' });

export const DEFAULT_REASONING_TIMEOUT_MS = 20000;

// =============================================================================
// Port
// =============================================================================

export interface TriagePrompt {
  system: string;
  user: string;
}

export interface ReasoningCallOptions {
  /** Aborted when the tier stops waiting; the service should stop work then */
  signal?: AbortSignal;
}

/**
 * Text-completion service behind the reasoning tier
 */
export interface ReasoningService {
  complete(prompt: TriagePrompt, options?: ReasoningCallOptions): Promise<string>;
}

// =============================================================================
// Prompt and reply format
// =============================================================================

export const TRIAGE_SYSTEM_PROMPT =
  'You are a professional veterinary triage assistant. Be concise and accurate.';

export function buildTriagePrompt(symptoms: string): TriagePrompt {
  const user = [
    'Classify the following pet symptoms into ONLY ONE category:',
    '',
    '1. Emergency - life-threatening, needs immediate vet care',
    '2. Urgent - needs vet care soon (within 24 hours)',
    '3. Routine - can be monitored or handled with basic care',
    '',
    'Give a short reason (one line only).',
    '',
    'Respond strictly in this format:',
    'Category: <Emergency/Urgent/Routine>',
    'Reason: <one-line explanation>',
    '',
    'Symptoms:',
    symptoms,
  ].join('\n');

  return { system: TRIAGE_SYSTEM_PROMPT, user };
}

export type ReasoningCategory = 'Emergency' | 'Urgent' | 'Routine';

export interface ParsedReasoningReply {
  category: ReasoningCategory;
  priority: Priority;
  reason: string;
}

const CATEGORY_PRIORITY: Record<ReasoningCategory, Priority> = {
  Emergency: 'EMERGENCY',
  Urgent: 'HIGH',
  Routine: 'NORMAL',
};

const UNPARSED_REASON = 'Unable to parse response';

/**
 * Parse a `Category: ... / Reason: ...` reply. Returns null without a
 * Category line.
 */
export function parseReasoningReply(reply: string): ParsedReasoningReply | null {
  let category: ReasoningCategory | null = null;
  let reason = UNPARSED_REASON;

  for (const rawLine of reply.trim().split('\n')) {
    const line = rawLine.trim();
    const lower = line.toLowerCase();
    const value = line.slice(line.indexOf(':') + 1).trim();

    if (lower.startsWith('category:')) {
      const categoryText = value.toLowerCase();
      if (categoryText.includes('emergency')) {
        category = 'Emergency';
      } else if (categoryText.includes('urgent')) {
        category = 'Urgent';
      } else {
        category = 'Routine';
      }
    } else if (lower.startsWith('reason:') && value) {
      reason = value;
    }
  }

  if (!category) {
    return null;
  }
  return { category, priority: CATEGORY_PRIORITY[category], reason };
}

// =============================================================================
// Classifier
// =============================================================================

export interface ReasoningClassifierOptions {
  timeoutMs?: number;
}

export class ReasoningClassifier implements TriageClassifier {
  readonly source = 'reasoning_service' as const;
  private readonly timeoutMs: number;

  constructor(
    private readonly service: ReasoningService,
    options: ReasoningClassifierOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REASONING_TIMEOUT_MS;
  }

  async tryClassify(report: SymptomReport): Promise<ClassifierOutcome> {
    const controller = new AbortController();
    let reply: string;
    try {
      reply = await withTimeout(
        this.service.complete(buildTriagePrompt(report.text), { signal: controller.signal }),
        this.timeoutMs,
        'reasoning service call'
      );
    } catch (error) {
      controller.abort(error);
      logger.warn({ err: error, timeoutMs: this.timeoutMs }, 'Reasoning service failed, falling through');
      return inconclusive('reasoning service unavailable');
    }

    const parsed = parseReasoningReply(reply);
    if (!parsed) {
      logger.warn({ replyLength: reply.length }, 'Reasoning reply had no category line');
      return inconclusive('unparsable reasoning reply');
    }

    const verdict: TriageVerdict = {
      priority: parsed.priority,
      reason: parsed.reason,
      source: this.source,
      matchScore: null,
      rawEvidence: [`Category: ${parsed.category}`],
      severity: null,
      matchType: null,
    };
    return conclusive(verdict);
  }
}
