import type { ImageClassification, Priority } from '@vetqueue/types';

/**
 * Image classifier collaborator (black box)
 */
export interface ImageClassifier {
  classifyImage(image: Uint8Array): Promise<ImageClassification>;
}

export const DEFAULT_SERIOUS_LABELS = ['MANGE', 'RINGWORM'] as const;
export const DEFAULT_IMAGE_CONFIDENCE_THRESHOLD = 0.8;

export interface ImageEvidenceOptions {
  seriousLabels?: readonly string[];
  /** Confidence must be strictly above this value */
  confidenceThreshold?: number;
}

/**
 * Raise a priority to at least HIGH when a confident image label names a
 * serious condition. Never lowers a priority; EMERGENCY stays EMERGENCY.
 */
export function applyImageEvidence(
  priority: Priority,
  classification: ImageClassification,
  options: ImageEvidenceOptions = {}
): Priority {
  if (priority === 'EMERGENCY' || priority === 'HIGH') {
    return priority;
  }

  const labels: readonly string[] = options.seriousLabels ?? DEFAULT_SERIOUS_LABELS;
  const seriousLabels = labels.map((label) => label.toUpperCase());
  const threshold = options.confidenceThreshold ?? DEFAULT_IMAGE_CONFIDENCE_THRESHOLD;

  const isSerious = seriousLabels.includes(classification.label.toUpperCase());
  return isSerious && classification.confidence > threshold ? 'HIGH' : priority;
}
