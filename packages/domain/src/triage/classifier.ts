/**
 * Triage classifier contract
 *
 * Every tier of the triage chain answers with either a conclusive verdict or
 * an inconclusive outcome that hands the report to the next tier.
 *
 * @module domain/triage/classifier
 */
import type { SymptomReport, TriageSource, TriageVerdict } from '@vetqueue/types';

export type ClassifierOutcome =
  | { conclusive: true; verdict: TriageVerdict }
  | { conclusive: false; reason: string };

export interface TriageClassifier {
  /** Source tag carried by verdicts this tier produces */
  readonly source: TriageSource;
  tryClassify(report: SymptomReport): Promise<ClassifierOutcome>;
}

export function conclusive(verdict: TriageVerdict): ClassifierOutcome {
  return { conclusive: true, verdict };
}

export function inconclusive(reason: string): ClassifierOutcome {
  return { conclusive: false, reason };
}
