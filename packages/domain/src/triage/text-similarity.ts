/**
 * Text similarity primitives for symptom pattern matching
 *
 * @module domain/triage/text-similarity
 */

// Applied in order; " and " must be replaced before single characters
const KEYWORD_DELIMITERS = [',', ';', '.', ' and ', ' or ', ' with ', '-', '/', '(', ')'] as const;

/**
 * Lowercase and collapse every run of whitespace to a single space
 */
export function normalizeText(text: string): string {
  return text.toLowerCase().split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Split symptom text into a keyword set
 */
export function extractKeywords(text: string): Set<string> {
  let normalized = text.toLowerCase();
  for (const delimiter of KEYWORD_DELIMITERS) {
    normalized = normalized.split(delimiter).join(' ');
  }
  return new Set(normalized.split(/\s+/).filter(Boolean));
}

/**
 * Jaccard index of two keyword sets; 0 when either is empty
 */
export function keywordSimilarity(left: ReadonlySet<string>, right: ReadonlySet<string>): number {
  if (left.size === 0 || right.size === 0) {
    return 0;
  }

  let intersection = 0;
  for (const keyword of left) {
    if (right.has(keyword)) {
      intersection++;
    }
  }
  const union = left.size + right.size - intersection;
  return intersection / union;
}

interface MatchingBlock {
  leftStart: number;
  rightStart: number;
  size: number;
}

/**
 * Longest common substring of left[leftLo, leftHi) and right[rightLo, rightHi).
 * Ties resolve to the earliest position in `left`, then in `right`.
 */
function findLongestMatch(
  left: string,
  leftLo: number,
  leftHi: number,
  rightLo: number,
  rightHi: number,
  rightIndex: ReadonlyMap<string, readonly number[]>
): MatchingBlock {
  let best: MatchingBlock = { leftStart: leftLo, rightStart: rightLo, size: 0 };
  let runLengths = new Map<number, number>();

  for (let i = leftLo; i < leftHi; i++) {
    const nextRunLengths = new Map<number, number>();
    for (const j of rightIndex.get(left.charAt(i)) ?? []) {
      if (j < rightLo) continue;
      if (j >= rightHi) break;
      const length = (runLengths.get(j - 1) ?? 0) + 1;
      nextRunLengths.set(j, length);
      if (length > best.size) {
        best = { leftStart: i - length + 1, rightStart: j - length + 1, size: length };
      }
    }
    runLengths = nextRunLengths;
  }

  return best;
}

/**
 * Ratcliff/Obershelp similarity: 2 * matched characters / total characters.
 * Two empty strings are identical (1.0).
 */
export function sequenceSimilarity(left: string, right: string): number {
  const total = left.length + right.length;
  if (total === 0) {
    return 1;
  }

  const rightIndex = new Map<string, number[]>();
  for (let j = 0; j < right.length; j++) {
    const char = right.charAt(j);
    const positions = rightIndex.get(char);
    if (positions) {
      positions.push(j);
    } else {
      rightIndex.set(char, [j]);
    }
  }

  let matched = 0;
  const pending: [number, number, number, number][] = [[0, left.length, 0, right.length]];
  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;
    const [leftLo, leftHi, rightLo, rightHi] = range;
    const block = findLongestMatch(left, leftLo, leftHi, rightLo, rightHi, rightIndex);
    if (block.size === 0) continue;

    matched += block.size;
    if (leftLo < block.leftStart && rightLo < block.rightStart) {
      pending.push([leftLo, block.leftStart, rightLo, block.rightStart]);
    }
    const leftEnd = block.leftStart + block.size;
    const rightEnd = block.rightStart + block.size;
    if (leftEnd < leftHi && rightEnd < rightHi) {
      pending.push([leftEnd, leftHi, rightEnd, rightHi]);
    }
  }

  return (2 * matched) / total;
}
