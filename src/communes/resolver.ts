/**
 * CommuneResolver - public entry point for commune matching
 *
 * Holds a pointer to the active generation. Every call captures the pointer once and
 * works on that generation to the end; reload builds a new generation beside the old
 * one and swaps the pointer when it is complete.
 */

import { DEFAULT_THRESHOLDS, type MatchThresholds } from '../config/env.js';
import { logger } from '../domain/logger.js';
import { metrics } from '../domain/metrics.js';
import type { EmbeddingProvider, LlmProvider } from '../domain/openai-clients.js';
import { generateRequestId, runWithContext } from '../domain/request-context.js';
import { candidatesOf, runCascade } from './cascade.js';
import { buildGeneration, type Generation, type GenerationOptions } from './generation.js';
import { fallbackExtraction, LocationExtractor, looksLikeSentence } from './location-extractor.js';
import { normalize } from './normalizer.js';
import { ConfidenceThresholdSchema, SuggestionLimitSchema } from './schemas.js';
import { DEFAULT_SUGGESTION_LIMIT, rankSuggestions } from './suggestion-ranker.js';
import type {
  CommuneInput,
  CommuneRecord,
  GenerationStats,
  MatchOptions,
  MatchResult,
  ScoredCandidate,
  SuggestionOptions,
} from './types.js';

export interface ResolverOptions {
  thresholds?: Partial<MatchThresholds>;
  suggestionLimit?: number;
  /** Deadline for one provider call made while matching (default 5000) */
  providerTimeoutMs?: number;
  /** Deadline for encoding the whole gazetteer (default 30000) */
  indexTimeoutMs?: number;
  embeddingProvider?: EmbeddingProvider;
  llmProvider?: LlmProvider;
  /** Known names included in LLM prompts (default 20) */
  promptSampleSize?: number;
  /** Queries longer than this many tokens are read as sentences (default 5) */
  maxNameTokens?: number;
}

export class CommuneResolver {
  private generation: Generation;
  private buildSequence: number;
  private readonly thresholds: MatchThresholds;
  private readonly suggestionLimit: number;
  private readonly maxNameTokens: number;
  private readonly extractor: LocationExtractor;
  private readonly generationOptions: GenerationOptions;

  private constructor(
    generation: Generation,
    options: ResolverOptions,
    generationOptions: GenerationOptions
  ) {
    this.generation = generation;
    this.buildSequence = generation.id;
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...options.thresholds };
    this.suggestionLimit = options.suggestionLimit ?? DEFAULT_SUGGESTION_LIMIT;
    this.maxNameTokens = options.maxNameTokens ?? 5;
    this.generationOptions = generationOptions;
    this.extractor = new LocationExtractor({
      llm: options.llmProvider,
      timeoutMs: generationOptions.providerTimeoutMs,
      sampleSize: options.promptSampleSize,
    });
  }

  /**
   * Build the first generation and return a ready resolver
   *
   * @throws DataUnavailableError when the records are empty or unusable
   */
  static async create(
    records: readonly CommuneInput[],
    options: ResolverOptions = {}
  ): Promise<CommuneResolver> {
    const generationOptions: GenerationOptions = {
      embeddingProvider: options.embeddingProvider,
      providerTimeoutMs: options.providerTimeoutMs ?? 5000,
      indexTimeoutMs: options.indexTimeoutMs ?? 30000,
    };
    const generation = await buildGeneration(1, records, generationOptions);
    const resolver = new CommuneResolver(generation, options, generationOptions);

    logger.info('Commune resolver ready', {
      generationId: generation.id,
      communes: generation.gazetteer.size,
      embeddings: generation.embeddingStatus,
      llm: resolver.extractor.enabled ? 'enabled' : 'disabled',
    });

    return resolver;
  }

  get generationId(): number {
    return this.generation.id;
  }

  /**
   * Resolve free text to a canonical commune
   */
  async match(query: string, options: MatchOptions = {}): Promise<MatchResult> {
    const generation = this.generation;
    const requestId = generateRequestId();
    const startTime = Date.now();
    const confidenceThreshold = this.resolveThreshold(options.confidenceThreshold);

    return runWithContext({ requestId, generationId: generation.id }, async () => {
      logger.logMatchStart(query, generation.id, requestId);

      const result = await runCascade(generation, query, {
        thresholds: this.thresholds,
        confidenceThreshold,
        suggestionLimit: this.suggestionLimit,
        maxNameTokens: this.maxNameTokens,
        extractor: this.extractor,
        signal: options.signal,
      });

      const latencyMs = Date.now() - startTime;
      logger.logMatchEnd(result.method, result.confidence, latencyMs, requestId, result.matchedCommune);
      metrics.incrementMatch(result.method);
      metrics.recordLatency(latencyMs);

      return result;
    });
  }

  /**
   * Ranked commune names for a partial or misspelled query, without picking a winner.
   * An empty query gets the most common communes.
   */
  async suggestions(query: string, options: SuggestionOptions = {}): Promise<string[]> {
    const generation = this.generation;
    const limit = this.resolveLimit(options.limit);
    let working = normalize(query);

    if (!working.normalized) {
      return generation.gazetteer.mostCommon(limit);
    }
    if (looksLikeSentence(working.normalized, this.maxNameTokens)) {
      const phrase = normalize(fallbackExtraction(query));
      if (phrase.normalized) {
        working = phrase;
      }
    }

    const pool = Math.max(limit, 10);
    const floor = this.thresholds.suggestion;
    const lists: ScoredCandidate[][] = [
      candidatesOf(generation.exact.search(working), 'exact'),
      candidatesOf(generation.fuzzy.search(working, { threshold: floor, limit: pool }), 'fuzzy'),
      candidatesOf(generation.trigram.search(working, { threshold: floor, limit: pool }), 'trigram'),
    ];
    if (generation.embedding) {
      lists.push(
        candidatesOf(
          await generation.embedding.search(working, { threshold: floor, limit: pool }, options.signal),
          'embedding'
        )
      );
    }

    return rankSuggestions(lists, null, limit);
  }

  /**
   * Build a generation from new reference data and make it active. Calls in flight keep
   * the generation they started with. When reloads overlap, the one started last wins.
   *
   * @throws DataUnavailableError when the records are empty; the current generation stays active
   */
  async reload(records: readonly CommuneInput[]): Promise<void> {
    const id = ++this.buildSequence;
    logger.info('Reloading commune reference data', { generationId: id, records: records.length });

    let next: Generation;
    try {
      next = await buildGeneration(id, records, this.generationOptions);
    } catch (error) {
      metrics.incrementReload('error');
      if (error instanceof Error) {
        logger.logError(error, { context: 'reload', generationId: id });
      }
      throw error;
    }

    if (next.id < this.generation.id) {
      logger.warn('Discarding generation superseded by a newer reload', {
        generationId: next.id,
        activeGenerationId: this.generation.id,
      });
      return;
    }

    const previousId = this.generation.id;
    this.generation = next;
    metrics.incrementReload('success');
    logger.info('Generation swapped', { previousGenerationId: previousId, generationId: next.id });
  }

  getCommune(name: string): CommuneRecord | undefined {
    return this.generation.gazetteer.getCommune(name);
  }

  listCommunes(region?: string): string[] {
    return this.generation.gazetteer.listCommunes(region);
  }

  regions(): string[] {
    return this.generation.gazetteer.regions();
  }

  stats(): GenerationStats {
    const generation = this.generation;
    return {
      generationId: generation.id,
      builtAt: generation.builtAt.toISOString(),
      communes: generation.gazetteer.size,
      aliases: generation.gazetteer.aliasCount,
      shingles: generation.trigramIndex.size,
      regions: generation.gazetteer.regions().length,
      embeddings: generation.embeddingStatus,
      llm: this.extractor.enabled ? 'enabled' : 'disabled',
    };
  }

  private resolveThreshold(value: number | undefined): number {
    if (value === undefined) {
      return this.thresholds.confidence;
    }
    const parsed = ConfidenceThresholdSchema.safeParse(value);
    if (!parsed.success) {
      logger.warn('Ignoring invalid confidence threshold', { value });
      return this.thresholds.confidence;
    }
    return parsed.data;
  }

  private resolveLimit(value: number | undefined): number {
    if (value === undefined) {
      return this.suggestionLimit;
    }
    const parsed = SuggestionLimitSchema.safeParse(value);
    if (!parsed.success) {
      logger.warn('Ignoring invalid suggestion limit', { value });
      return this.suggestionLimit;
    }
    return parsed.data;
  }
}
