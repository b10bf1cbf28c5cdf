/**
 * Merging and ordering of candidates from several strategies
 */

import type { ScoredCandidate } from './types.js';

export const DEFAULT_SUGGESTION_LIMIT = 5;

/**
 * Merge candidate lists keeping the highest score per commune, best first.
 * Equal scores keep the order in which the communes were first seen.
 */
export function mergeCandidates(
  lists: ReadonlyArray<readonly ScoredCandidate[]>,
  excluding?: string | null
): ScoredCandidate[] {
  const best = new Map<string, { score: number; seen: number }>();
  let seen = 0;

  for (const list of lists) {
    for (const { commune, score } of list) {
      if (commune === excluding) {
        continue;
      }
      const current = best.get(commune);
      if (!current) {
        best.set(commune, { score, seen: seen++ });
      } else if (score > current.score) {
        current.score = score;
      }
    }
  }

  return [...best.entries()]
    .sort(([, a], [, b]) => b.score - a.score || a.seen - b.seen)
    .map(([commune, { score }]) => ({ commune, score }));
}

/**
 * Names of the best alternatives, without the already-matched commune
 */
export function rankSuggestions(
  lists: ReadonlyArray<readonly ScoredCandidate[]>,
  excluding?: string | null,
  limit: number = DEFAULT_SUGGESTION_LIMIT
): string[] {
  return mergeCandidates(lists, excluding)
    .slice(0, Math.max(0, limit))
    .map(candidate => candidate.commune);
}
