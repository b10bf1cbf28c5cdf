/**
 * Matching cascade: strategies in fixed priority order, first confident result wins
 */

import type { MatchThresholds } from '../config/env.js';
import { logger } from '../domain/logger.js';
import { metrics } from '../domain/metrics.js';
import { getRequestId } from '../domain/request-context.js';
import type { Generation } from './generation.js';
import type { LocationExtractor } from './location-extractor.js';
import { fallbackExtraction, fallbackIntent, looksLikeSentence } from './location-extractor.js';
import { normalize } from './normalizer.js';
import type { StrategyOutcome } from './strategies.js';
import { rankSuggestions } from './suggestion-ranker.js';
import type {
  LocationIntent,
  MatchResult,
  NormalizedQuery,
  ResolvedMatch,
  ScoredCandidate,
} from './types.js';

export interface CascadeSettings {
  thresholds: MatchThresholds;
  /** Caller's floor for trigram and relaxed fuzzy winners */
  confidenceThreshold: number;
  suggestionLimit: number;
  /** Queries with more tokens than this are treated as sentences */
  maxNameTokens: number;
  extractor?: LocationExtractor;
  signal?: AbortSignal;
}

interface WorkingText {
  working: NormalizedQuery;
  locationIntent?: LocationIntent;
  /** True when the working text is the LLM's extraction */
  fromLlm: boolean;
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/**
 * Unwrap a strategy outcome; an error counts as "no candidates"
 */
export function candidatesOf(outcome: StrategyOutcome, strategy: string): ScoredCandidate[] {
  if (outcome.ok) {
    return outcome.value;
  }

  metrics.incrementStrategyFailure(strategy, outcome.error.code);
  const context = {
    requestId: getRequestId(),
    strategy,
    code: outcome.error.code,
    error: outcome.error.message,
  };
  if (outcome.error.code === 'CANCELLED') {
    logger.debug('Strategy skipped', context);
  } else {
    logger.warn('Strategy skipped', context);
  }
  return [];
}

/**
 * Decide which text the strategies run on. Sentences are reduced to their location
 * phrase, by the LLM when it answers confidently, by word filtering otherwise.
 */
async function chooseWorkingText(
  initial: NormalizedQuery,
  generation: Generation,
  settings: CascadeSettings
): Promise<WorkingText> {
  if (!looksLikeSentence(initial.normalized, settings.maxNameTokens)) {
    return { working: initial, fromLlm: false };
  }

  let intent: LocationIntent;
  let phrase: string;
  let fromLlm = false;

  if (settings.extractor?.enabled) {
    const extractor = settings.extractor;
    const { intent: extracted, error } = await extractor.extract(
      initial.original,
      generation.gazetteer.sample(extractor.sampleSize),
      settings.signal
    );
    if (error) {
      metrics.incrementStrategyFailure('nl_extraction', error.code);
    }

    intent = extracted;
    if (
      extracted.source === 'llm' &&
      extracted.extractedLocation &&
      extracted.confidence >= settings.thresholds.nlMinConfidence
    ) {
      phrase = extracted.extractedLocation;
      fromLlm = true;
    } else if (extracted.source === 'fallback') {
      phrase = extracted.extractedLocation;
    } else {
      phrase = fallbackExtraction(initial.original);
    }
  } else {
    intent = fallbackIntent(initial.original, 'LLM extraction disabled');
    phrase = intent.extractedLocation;
  }

  const candidate = normalize(phrase);
  if (!candidate.normalized) {
    return { working: initial, locationIntent: intent, fromLlm: false };
  }

  logger.debug('Working text extracted from sentence', {
    requestId: getRequestId(),
    phrase,
    source: fromLlm ? 'llm' : 'fallback',
  });

  return { working: candidate, locationIntent: intent, fromLlm };
}

/**
 * Run the cascade for one query against one generation. Never rejects for a built
 * generation: strategy failures only remove that strategy's candidates.
 */
export async function runCascade(
  generation: Generation,
  query: string,
  settings: CascadeSettings
): Promise<MatchResult> {
  const { gazetteer } = generation;
  const { thresholds, suggestionLimit: limit } = settings;
  const initial = normalize(query);

  // 1. Nothing to match: cold-start suggestions
  if (!initial.normalized) {
    return {
      originalQuery: query,
      normalizedQuery: '',
      matchedCommune: null,
      confidence: 0,
      method: 'none',
      suggestions: gazetteer.mostCommon(limit),
    };
  }

  // 2. Sentences are reduced to their location phrase
  const { working, locationIntent, fromLlm } = await chooseWorkingText(initial, generation, settings);
  const base = {
    originalQuery: query,
    normalizedQuery: working.normalized,
    ...(locationIntent ? { locationIntent } : {}),
  };

  const floor = (list: ScoredCandidate[]) =>
    list.filter(candidate => candidate.score >= thresholds.suggestion);

  const accept = (
    method: ResolvedMatch['method'],
    winner: ScoredCandidate,
    alternatives: ScoredCandidate[]
  ): ResolvedMatch => ({
    ...base,
    method,
    matchedCommune: winner.commune,
    confidence: clamp01(winner.score),
    suggestions: rankSuggestions([floor(alternatives)], winner.commune, limit),
  });

  // 3. Exact alias lookup
  const exact = candidatesOf(generation.exact.search(working), 'exact');
  if (exact.length > 0) {
    return {
      ...base,
      method: fromLlm ? 'nl_extracted' : 'exact',
      matchedCommune: exact[0].commune,
      confidence: 1,
      suggestions: [],
    };
  }

  const pool = Math.max(limit + 1, 10);

  // 4. Embeddings, when this generation has them
  let semantic: ScoredCandidate[] = [];
  if (generation.embedding) {
    semantic = candidatesOf(
      await generation.embedding.search(working, { threshold: 0, limit: pool }, settings.signal),
      'embedding'
    );
    if (semantic[0] && semantic[0].score >= thresholds.embedding) {
      return accept('embedding', semantic[0], semantic);
    }
  }

  // 5. Strong fuzzy match. The list is scored down to the suggestion floor so the
  // same run feeds the relaxed acceptance and the suggestions below.
  const fuzzy = candidatesOf(
    generation.fuzzy.search(working, { threshold: thresholds.suggestion, limit: pool }),
    'fuzzy'
  );
  if (fuzzy[0] && fuzzy[0].score >= thresholds.fuzzy) {
    return accept('fuzzy', fuzzy[0], fuzzy);
  }

  // 6. Trigram overlap at the caller's threshold
  const trigram = candidatesOf(generation.trigram.search(working, { threshold: 0, limit: pool }), 'trigram');
  if (trigram[0] && trigram[0].score >= settings.confidenceThreshold) {
    return accept('trigram', trigram[0], trigram);
  }

  // 7. Fuzzy at the caller's threshold
  if (fuzzy[0] && fuzzy[0].score >= settings.confidenceThreshold) {
    return accept('fuzzy', fuzzy[0], fuzzy);
  }

  // 8. No confident match
  const lists = [fuzzy, floor(trigram), floor(semantic)];
  const bestScore = Math.max(0, ...lists.map(list => list[0]?.score ?? 0));

  return {
    ...base,
    method: 'none',
    matchedCommune: null,
    confidence: clamp01(bestScore),
    suggestions: rankSuggestions(lists, null, limit),
  };
}
