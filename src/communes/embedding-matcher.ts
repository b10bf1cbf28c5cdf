/**
 * Semantic matching against precomputed alias embeddings
 */

import { logger } from '../domain/logger.js';
import { callProvider } from '../domain/provider-call.js';
import { createMatcherError } from '../domain/error-handler.js';
import { failure, success, type Outcome } from '../domain/types.js';
import type { EmbeddingProvider } from '../domain/openai-clients.js';
import type { Gazetteer } from './gazetteer.js';
import type { ScoredCandidate } from './types.js';

interface AliasVector {
  vector: readonly number[];
  norm: number;
}

export interface EmbeddingCallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

function norm(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/**
 * Cosine similarity; 0 when either vector has no magnitude or the lengths differ
 */
export function cosineSimilarity(
  a: readonly number[],
  b: readonly number[],
  normA = norm(a),
  normB = norm(b)
): number {
  if (a.length !== b.length || normA === 0 || normB === 0) {
    return 0;
  }
  let dot = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
  }
  return dot / (normA * normB);
}

export class EmbeddingMatcher {
  private readonly provider: EmbeddingProvider;
  private readonly gazetteer: Gazetteer;
  private readonly vectors: ReadonlyMap<string, readonly AliasVector[]>;

  private constructor(
    provider: EmbeddingProvider,
    gazetteer: Gazetteer,
    vectors: Map<string, AliasVector[]>
  ) {
    this.provider = provider;
    this.gazetteer = gazetteer;
    this.vectors = vectors;
  }

  /**
   * Encode every distinct normalized alias once and group the vectors by commune
   */
  static async build(
    gazetteer: Gazetteer,
    provider: EmbeddingProvider,
    options: EmbeddingCallOptions
  ): Promise<Outcome<EmbeddingMatcher>> {
    const entries = gazetteer.allAliases();
    const texts = entries.map(entry => entry.alias);

    const encoded = await callProvider(
      { provider: provider.name, timeoutMs: options.timeoutMs, signal: options.signal },
      signal => provider.encode(texts, signal)
    );
    if (!encoded.ok) {
      return encoded;
    }

    const rows = encoded.value;
    if (rows.length !== texts.length) {
      return failure(
        createMatcherError('INVALID_RESPONSE', 'Embedding provider returned the wrong number of vectors', {
          provider: provider.name,
          expected: texts.length,
          received: rows.length,
        })
      );
    }

    const dimension = rows[0]?.length ?? 0;
    const vectors = new Map<string, AliasVector[]>();
    for (let i = 0; i < entries.length; i++) {
      const vector = rows[i];
      if (vector.length !== dimension || dimension === 0) {
        return failure(
          createMatcherError('INVALID_RESPONSE', 'Embedding provider returned inconsistent vectors', {
            provider: provider.name,
            alias: entries[i].alias,
          })
        );
      }
      const list = vectors.get(entries[i].commune) ?? [];
      list.push({ vector, norm: norm(vector) });
      vectors.set(entries[i].commune, list);
    }

    logger.info('Embedding index built', {
      provider: provider.name,
      communes: vectors.size,
      vectors: rows.length,
      dimension,
    });

    return success(new EmbeddingMatcher(provider, gazetteer, vectors));
  }

  get providerName(): string {
    return this.provider.name;
  }

  /**
   * Encode the query and score every commune by its best alias
   */
  async search(
    normalized: string,
    topK: number,
    options: EmbeddingCallOptions
  ): Promise<Outcome<ScoredCandidate[]>> {
    if (!normalized || topK <= 0) {
      return success([]);
    }

    const encoded = await callProvider(
      { provider: this.provider.name, timeoutMs: options.timeoutMs, signal: options.signal },
      signal => this.provider.encode([normalized], signal)
    );
    if (!encoded.ok) {
      return encoded;
    }

    const query = encoded.value[0];
    if (!query || query.length === 0) {
      return failure(
        createMatcherError('INVALID_RESPONSE', 'Embedding provider returned no vector for the query', {
          provider: this.provider.name,
        })
      );
    }

    const queryNorm = norm(query);
    const scored: ScoredCandidate[] = [];
    for (const [commune, aliasVectors] of this.vectors) {
      let best = 0;
      for (const { vector, norm: aliasNorm } of aliasVectors) {
        best = Math.max(best, cosineSimilarity(query, vector, queryNorm, aliasNorm));
      }
      scored.push({ commune, score: Math.min(1, best) });
    }

    return success(
      scored
        .sort(
          (a, b) =>
            b.score - a.score || this.gazetteer.orderOf(a.commune) - this.gazetteer.orderOf(b.commune)
        )
        .slice(0, topK)
    );
  }
}
