/**
 * Edit-similarity matching over normalized aliases
 *
 * Similarity is the Ratcliff/Obershelp ratio: twice the number of characters in
 * matching blocks divided by the total length of both strings. Matching blocks are
 * found by taking the longest common substring, then recursing on the text to its
 * left and right.
 */

import type { Gazetteer } from './gazetteer.js';
import type { ScoredCandidate } from './types.js';

/** Added when one string contains the other ("florida" in "la florida") */
export const SUBSTRING_BONUS = 0.2;

interface Block {
  aStart: number;
  bStart: number;
  size: number;
}

function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const list = positions.get(b[j]);
    if (list) {
      list.push(j);
    } else {
      positions.set(b[j], [j]);
    }
  }
  return positions;
}

/**
 * Longest common block of a[aLo, aHi) and b[bLo, bHi).
 * Ties go to the block that starts earliest in a, then earliest in b.
 */
function longestMatch(
  a: string,
  b2j: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): Block {
  let best: Block = { aStart: aLo, bStart: bLo, size: 0 };
  let lengths = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < bLo) {
        continue;
      }
      if (j >= bHi) {
        break;
      }
      const k = (lengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) {
        best = { aStart: i - k + 1, bStart: j - k + 1, size: k };
      }
    }
    lengths = next;
  }

  return best;
}

/**
 * Total number of characters in the matching blocks of a and b
 */
export function matchingCharacters(a: string, b: string): number {
  const b2j = indexPositions(b);
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let total = 0;

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) {
      break;
    }
    const [aLo, aHi, bLo, bHi] = range;
    const block = longestMatch(a, b2j, aLo, aHi, bLo, bHi);
    if (block.size === 0) {
      continue;
    }
    total += block.size;
    if (aLo < block.aStart && bLo < block.bStart) {
      queue.push([aLo, block.aStart, bLo, block.bStart]);
    }
    if (block.aStart + block.size < aHi && block.bStart + block.size < bHi) {
      queue.push([block.aStart + block.size, aHi, block.bStart + block.size, bHi]);
    }
  }

  return total;
}

/**
 * Ratcliff/Obershelp similarity in [0, 1]. Two empty strings are identical.
 */
export function similarityRatio(a: string, b: string): number {
  const length = a.length + b.length;
  if (length === 0) {
    return 1;
  }
  return (2 * matchingCharacters(a, b)) / length;
}

export class FuzzyMatcher {
  private readonly gazetteer: Gazetteer;
  private readonly substringBonus: number;

  constructor(gazetteer: Gazetteer, substringBonus: number = SUBSTRING_BONUS) {
    this.gazetteer = gazetteer;
    this.substringBonus = substringBonus;
  }

  /**
   * Score the query against every alias, keeping the best score per commune.
   * Scores are capped at 1; results at or above the threshold, best first.
   */
  search(normalized: string, threshold: number, limit?: number): ScoredCandidate[] {
    if (!normalized) {
      return [];
    }

    const best = new Map<string, number>();
    for (const { commune, alias } of this.gazetteer.allAliases()) {
      let score = similarityRatio(normalized, alias);
      if (alias.includes(normalized) || normalized.includes(alias)) {
        score += this.substringBonus;
      }
      score = Math.min(1, score);

      if (score > (best.get(commune) ?? -1)) {
        best.set(commune, score);
      }
    }

    const matches: ScoredCandidate[] = [];
    for (const [commune, score] of best) {
      if (score >= threshold) {
        matches.push({ commune, score });
      }
    }

    matches.sort(
      (a, b) =>
        b.score - a.score || this.gazetteer.orderOf(a.commune) - this.gazetteer.orderOf(b.commune)
    );

    return limit === undefined ? matches : matches.slice(0, limit);
  }
}
