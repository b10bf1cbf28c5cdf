/**
 * Matching strategies behind one interface, composed by the cascade
 *
 * Exact, trigram and fuzzy matching are synchronous and never suspend; only the
 * embedding strategy waits on a provider.
 */

import { createMatcherError } from '../domain/error-handler.js';
import { failure, success, type Outcome } from '../domain/types.js';
import type { EmbeddingMatcher } from './embedding-matcher.js';
import type { FuzzyMatcher } from './fuzzy-matcher.js';
import type { Gazetteer } from './gazetteer.js';
import type { TrigramIndex } from './trigram-index.js';
import type { NormalizedQuery, ScoredCandidate } from './types.js';

export type StrategyName = 'exact' | 'trigram' | 'fuzzy' | 'embedding';

export type StrategyOutcome = Outcome<ScoredCandidate[]>;

export interface SearchParams {
  /** Drop candidates scoring below this */
  threshold: number;
  limit: number;
}

export interface MatchStrategy {
  readonly name: StrategyName;
  search(query: NormalizedQuery, params: SearchParams): StrategyOutcome;
}

export interface AsyncMatchStrategy {
  readonly name: StrategyName;
  search(query: NormalizedQuery, params: SearchParams, signal?: AbortSignal): Promise<StrategyOutcome>;
}

function guard(name: StrategyName, run: () => ScoredCandidate[]): StrategyOutcome {
  try {
    return success(run());
  } catch (error) {
    return failure(
      createMatcherError(
        'STRATEGY_ERROR',
        `${name} strategy failed: ${error instanceof Error ? error.message : String(error)}`,
        { strategy: name }
      )
    );
  }
}

function applyThreshold(candidates: ScoredCandidate[], params: SearchParams): ScoredCandidate[] {
  return candidates.filter(candidate => candidate.score >= params.threshold).slice(0, params.limit);
}

export class ExactStrategy implements MatchStrategy {
  readonly name = 'exact';
  private readonly gazetteer: Gazetteer;

  constructor(gazetteer: Gazetteer) {
    this.gazetteer = gazetteer;
  }

  search(query: NormalizedQuery): StrategyOutcome {
    return guard(this.name, () => {
      const commune = this.gazetteer.exactLookup(query.normalized);
      return commune ? [{ commune, score: 1 }] : [];
    });
  }
}

export class TrigramStrategy implements MatchStrategy {
  readonly name = 'trigram';
  private readonly index: TrigramIndex;

  constructor(index: TrigramIndex) {
    this.index = index;
  }

  search(query: NormalizedQuery, params: SearchParams): StrategyOutcome {
    return guard(this.name, () => applyThreshold(this.index.search(query.normalized, params.limit), params));
  }
}

export class FuzzyStrategy implements MatchStrategy {
  readonly name = 'fuzzy';
  private readonly matcher: FuzzyMatcher;

  constructor(matcher: FuzzyMatcher) {
    this.matcher = matcher;
  }

  search(query: NormalizedQuery, params: SearchParams): StrategyOutcome {
    return guard(this.name, () => this.matcher.search(query.normalized, params.threshold, params.limit));
  }
}

export class EmbeddingStrategy implements AsyncMatchStrategy {
  readonly name = 'embedding';
  private readonly matcher: EmbeddingMatcher;
  private readonly timeoutMs: number;

  constructor(matcher: EmbeddingMatcher, timeoutMs: number) {
    this.matcher = matcher;
    this.timeoutMs = timeoutMs;
  }

  async search(
    query: NormalizedQuery,
    params: SearchParams,
    signal?: AbortSignal
  ): Promise<StrategyOutcome> {
    const outcome = await this.matcher.search(query.normalized, params.limit, {
      timeoutMs: this.timeoutMs,
      signal,
    });
    return outcome.ok ? success(applyThreshold(outcome.value, params)) : outcome;
  }
}
