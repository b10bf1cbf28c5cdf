/**
 * Trigram (3-character shingle) index over gazetteer aliases
 */

import type { Gazetteer } from './gazetteer.js';
import type { ScoredCandidate } from './types.js';

/**
 * Shingles of "  text  " with a sliding window of 3
 */
export function shingles(normalized: string): Set<string> {
  const result = new Set<string>();
  if (!normalized) {
    return result;
  }
  const padded = `  ${normalized}  `;
  for (let i = 0; i < padded.length - 2; i++) {
    result.add(padded.slice(i, i + 3));
  }
  return result;
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) {
    return 0;
  }
  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) {
      intersection++;
    }
  }
  return intersection / (a.size + b.size - intersection);
}

export class TrigramIndex {
  /** shingle -> canonical names */
  private readonly postings = new Map<string, Set<string>>();
  /** canonical name -> union of shingles across its aliases */
  private readonly communeShingles = new Map<string, Set<string>>();
  private readonly gazetteer: Gazetteer;

  constructor(gazetteer: Gazetteer) {
    this.gazetteer = gazetteer;

    for (const { commune, alias } of gazetteer.allAliases()) {
      let aggregate = this.communeShingles.get(commune);
      if (!aggregate) {
        aggregate = new Set();
        this.communeShingles.set(commune, aggregate);
      }

      for (const shingle of shingles(alias)) {
        aggregate.add(shingle);
        let posting = this.postings.get(shingle);
        if (!posting) {
          posting = new Set();
          this.postings.set(shingle, posting);
        }
        posting.add(commune);
      }
    }
  }

  get size(): number {
    return this.postings.size;
  }

  /**
   * Jaccard similarity between the query's shingles and each candidate's aggregated
   * shingles. Only communes sharing at least one shingle are scored.
   */
  search(normalized: string, topK: number): ScoredCandidate[] {
    const queryShingles = shingles(normalized);
    if (queryShingles.size === 0 || topK <= 0) {
      return [];
    }

    const candidates = new Set<string>();
    for (const shingle of queryShingles) {
      const posting = this.postings.get(shingle);
      if (posting) {
        for (const commune of posting) {
          candidates.add(commune);
        }
      }
    }

    const scored: ScoredCandidate[] = [];
    for (const commune of candidates) {
      const communeSet = this.communeShingles.get(commune);
      if (!communeSet) {
        continue;
      }
      const score = jaccard(queryShingles, communeSet);
      if (score > 0) {
        scored.push({ commune, score });
      }
    }

    return scored
      .sort(
        (a, b) =>
          b.score - a.score || this.gazetteer.orderOf(a.commune) - this.gazetteer.orderOf(b.commune)
      )
      .slice(0, topK);
  }
}
