/**
 * "Did you mean" suggestions for mistyped keywords
 */

import { SUGGESTION_CUTOFF } from './constants.js';

/**
 * Plain Levenshtein distance
 */
export function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    previous = current;
  }

  return previous[b.length] ?? 0;
}

/**
 * Similarity in 0..1, where 1 means identical
 */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - editDistance(a, b) / longest;
}

/**
 * Closest candidate at or above the cutoff, compared case-insensitively.
 * Ties go to the earlier candidate.
 */
export function closestMatch(
  word: string,
  candidates: Iterable<string>,
  cutoff: number = SUGGESTION_CUTOFF
): string | null {
  const target = word.toUpperCase();
  let best: string | null = null;
  let bestScore = cutoff;

  for (const candidate of candidates) {
    const score = similarity(target, candidate.toUpperCase());
    if (score > bestScore || (best === null && score >= bestScore)) {
      best = candidate;
      bestScore = score;
    }
  }

  return best;
}
