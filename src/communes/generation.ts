/**
 * One immutable, fully built set of gazetteer and indexes
 */

import { logger } from '../domain/logger.js';
import type { EmbeddingProvider } from '../domain/openai-clients.js';
import { EmbeddingMatcher } from './embedding-matcher.js';
import { FuzzyMatcher } from './fuzzy-matcher.js';
import { Gazetteer } from './gazetteer.js';
import {
  EmbeddingStrategy,
  ExactStrategy,
  FuzzyStrategy,
  TrigramStrategy,
} from './strategies.js';
import { TrigramIndex } from './trigram-index.js';
import type { CommuneInput } from './types.js';

export interface Generation {
  readonly id: number;
  readonly builtAt: Date;
  readonly gazetteer: Gazetteer;
  readonly trigramIndex: TrigramIndex;
  readonly exact: ExactStrategy;
  readonly trigram: TrigramStrategy;
  readonly fuzzy: FuzzyStrategy;
  /** Absent when no provider is configured or the index could not be built */
  readonly embedding?: EmbeddingStrategy;
  readonly embeddingStatus: 'ready' | 'disabled' | 'unavailable';
}

export interface GenerationOptions {
  embeddingProvider?: EmbeddingProvider;
  /** Deadline for encoding every alias */
  indexTimeoutMs: number;
  /** Deadline for encoding one query */
  providerTimeoutMs: number;
}

/**
 * Build every index for a set of records. The embedding index is optional:
 * if it cannot be built the generation is still usable without it.
 *
 * @throws DataUnavailableError when the records are empty or unusable
 */
export async function buildGeneration(
  id: number,
  records: readonly CommuneInput[],
  options: GenerationOptions
): Promise<Generation> {
  const gazetteer = Gazetteer.build(records);
  const trigramIndex = new TrigramIndex(gazetteer);
  const fuzzyMatcher = new FuzzyMatcher(gazetteer);

  let embedding: EmbeddingStrategy | undefined;
  let embeddingStatus: Generation['embeddingStatus'] = 'disabled';

  if (options.embeddingProvider) {
    const built = await EmbeddingMatcher.build(gazetteer, options.embeddingProvider, {
      timeoutMs: options.indexTimeoutMs,
    });
    if (built.ok) {
      embedding = new EmbeddingStrategy(built.value, options.providerTimeoutMs);
      embeddingStatus = 'ready';
    } else {
      embeddingStatus = 'unavailable';
      logger.warn('Embedding index unavailable, continuing without semantic matching', {
        generationId: id,
        code: built.error.code,
        error: built.error.message,
      });
    }
  }

  logger.info('Generation built', {
    generationId: id,
    communes: gazetteer.size,
    aliases: gazetteer.aliasCount,
    shingles: trigramIndex.size,
    embeddingStatus,
  });

  return Object.freeze({
    id,
    builtAt: new Date(),
    gazetteer,
    trigramIndex,
    exact: new ExactStrategy(gazetteer),
    trigram: new TrigramStrategy(trigramIndex),
    fuzzy: new FuzzyStrategy(fuzzyMatcher),
    embedding,
    embeddingStatus,
  });
}
