/**
 * Commune resolver
 * Turns free text into a canonical Chilean commune with a confidence score and suggestions
 */

export { CommuneResolver, type ResolverOptions } from './communes/resolver.js';
export { createResolverFromConfig, loadReferenceData } from './communes/factory.js';
export { CommunesDB, loadCommunesFromFile } from './communes/loader.js';
export { normalize, normalizeText } from './communes/normalizer.js';
export type {
  CommuneInput,
  CommuneRecord,
  GenerationStats,
  IntentType,
  LocationIntent,
  MatchMethod,
  MatchOptions,
  MatchResult,
  NoMatch,
  NormalizedQuery,
  ResolvedMatch,
  SuggestionOptions,
} from './communes/types.js';
export type { MatchStrategy, AsyncMatchStrategy, StrategyName } from './communes/strategies.js';

export { DEFAULT_THRESHOLDS, getConfig, loadConfig } from './config/env.js';
export type { MatchThresholds, ResolverConfig } from './config/env.js';

export { DataUnavailableError } from './domain/error-handler.js';
export type { ErrorCode, MatcherError, Outcome } from './domain/types.js';
export { logger, type LogLevel } from './domain/logger.js';
export { metrics } from './domain/metrics.js';
export {
  createOpenAIClient,
  OpenAIChatClient,
  OpenAIEmbeddingClient,
  type EmbeddingProvider,
  type LlmProvider,
  type LlmRequest,
} from './domain/openai-clients.js';
