/**
 * Typo-tolerant term lookup against the synonym dictionary.
 *
 * Scores are 0-100. The weighted ratio takes the best of a plain indel
 * ratio, a word-order-insensitive ratio, and (for strings of very different
 * length) a best-window partial ratio, each scaled down the further it is
 * from a plain comparison.
 */
import { ROUTING_DEFAULTS } from '../config.js';
import { SYNONYM_TERMS } from './synonyms.js';

/** Terms this short match too many dictionary entries by accident. */
export const MIN_FUZZY_TERM_LENGTH = 4;

const TOKEN_SORT_SCALE = 0.95;
const PARTIAL_LENGTH_RATIO = 1.5;
const PARTIAL_SCALE = 0.9;
const PARTIAL_SCALE_FAR = 0.6;
const FAR_LENGTH_RATIO = 8;

/** Lower-case, non-alphanumerics to single spaces, trimmed. */
export function preprocess(value: string): string {
  return value.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, ' ').trim();
}

function sortTokens(value: string): string {
  return value.split(' ').filter(Boolean).sort().join(' ');
}

/** Longest common subsequence length, one DP row. */
function lcsLength(a: string, b: string): number {
  const row = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    let diagonal = 0;
    for (let j = 1; j <= b.length; j++) {
      const above = row[j];
      row[j] = a[i - 1] === b[j - 1] ? diagonal + 1 : Math.max(above, row[j - 1]);
      diagonal = above;
    }
  }
  return row[b.length];
}

/**
 * Indel similarity: 100 * (1 - indel / (|a| + |b|)), where indel counts the
 * insertions and deletions (no substitutions) turning a into b. A swapped
 * pair of letters costs 2 of 14 for a 7-letter word.
 */
export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  const indel = total - 2 * lcsLength(a, b);
  return 100 * (1 - indel / total);
}

/** Best ratio of the shorter string against every same-length window of the longer. */
export function partialRatio(a: string, b: string): number {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter.length === 0) return 0;

  let best = 0;
  for (let i = 0; i + shorter.length <= longer.length; i++) {
    best = Math.max(best, ratio(shorter, longer.slice(i, i + shorter.length)));
    if (best === 100) break;
  }
  return best;
}

export function tokenSortRatio(a: string, b: string): number {
  return ratio(sortTokens(a), sortTokens(b));
}

/**
 * Holistic similarity of two strings, 0-100.
 * Both inputs are preprocessed; an empty side scores 0.
 */
export function weightedRatio(a: string, b: string): number {
  const p1 = preprocess(a);
  const p2 = preprocess(b);
  if (!p1 || !p2) return 0;

  const simple = ratio(p1, p2);
  const lengthRatio = Math.max(p1.length, p2.length) / Math.min(p1.length, p2.length);

  if (lengthRatio < PARTIAL_LENGTH_RATIO) {
    return Math.max(simple, tokenSortRatio(p1, p2) * TOKEN_SORT_SCALE);
  }

  const scale = lengthRatio < FAR_LENGTH_RATIO ? PARTIAL_SCALE : PARTIAL_SCALE_FAR;
  const partial = partialRatio(p1, p2) * scale;
  const partialSorted = partialRatio(sortTokens(p1), sortTokens(p2)) * TOKEN_SORT_SCALE * scale;
  return Math.max(simple, partial, partialSorted);
}

/**
 * Find the closest candidate for a possibly misspelled term.
 *
 * Returns null for short terms, an empty candidate list, or when the best
 * score is under the threshold. Equal scores keep the earlier candidate.
 */
export function fuzzyLookup(
  term: string,
  candidates: readonly string[] = SYNONYM_TERMS,
  threshold: number = ROUTING_DEFAULTS.fuzzyThreshold,
): string | null {
  if (term.length < MIN_FUZZY_TERM_LENGTH) return null;
  if (candidates.length === 0) return null;

  let best: string | null = null;
  let bestScore = -1;
  for (const candidate of candidates) {
    const score = weightedRatio(term, candidate);
    if (score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }

  return bestScore >= threshold ? best : null;
}
