/**
 * @ace/playbook - Duplicate detection strategies
 *
 * The merger and the grow-and-refine pass ask a SimilarityStrategy whether
 * two bullet texts say the same thing. The default is normalized text
 * equality; token overlap is available for looser matching. Anything
 * smarter (embeddings, an LLM judge) plugs in behind the same interface.
 */

export interface SimilarityStrategy {
  readonly name: string;
  isDuplicate(a: string, b: string): boolean;
}

/**
 * Lower-case, collapse whitespace, strip surrounding quotes and trailing
 * punctuation.
 */
export function normalizeText(text: string): string {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^["'`]+|["'`]+$/g, '')
    .replace(/[\s.!?;:,]+$/u, '')
    .trim();
}

const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'in', 'into',
  'is', 'it', 'of', 'on', 'or', 'that', 'the', 'to', 'when', 'with',
]);

/**
 * Split text into lowercase alphanumeric tokens, dropping stopwords.
 */
export function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0 && !STOPWORDS.has(token));
}

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

/** Exact match after normalizeText(). */
export class NormalizedTextSimilarity implements SimilarityStrategy {
  readonly name = 'normalized';

  isDuplicate(a: string, b: string): boolean {
    return normalizeText(a) === normalizeText(b);
  }
}

/**
 * Jaccard similarity of token sets, duplicate at or above `threshold`.
 * Falls back to normalized equality when either side has no tokens.
 */
export class TokenOverlapSimilarity implements SimilarityStrategy {
  readonly name = 'token-overlap';
  private readonly threshold: number;

  constructor(threshold = 0.85) {
    if (threshold <= 0 || threshold > 1) {
      throw new RangeError(`Similarity threshold must be in (0, 1], got ${threshold}`);
    }
    this.threshold = threshold;
  }

  score(a: string, b: string): number {
    const left = new Set(tokenize(a));
    const right = new Set(tokenize(b));
    if (left.size === 0 || right.size === 0) {
      return normalizeText(a) === normalizeText(b) ? 1 : 0;
    }
    let shared = 0;
    for (const token of left) {
      if (right.has(token)) shared++;
    }
    return shared / (left.size + right.size - shared);
  }

  isDuplicate(a: string, b: string): boolean {
    return this.score(a, b) >= this.threshold;
  }
}

/**
 * Build a strategy from its configured name.
 */
export function createSimilarity(
  name: 'normalized' | 'token-overlap',
  threshold?: number,
): SimilarityStrategy {
  return name === 'token-overlap'
    ? new TokenOverlapSimilarity(threshold)
    : new NormalizedTextSimilarity();
}
