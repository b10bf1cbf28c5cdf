/**
 * Configuration management for the commune resolver
 * Loads and validates environment variables
 */

import { isLogLevel, type LogLevel } from '../domain/logger.js';

export interface MatchThresholds {
  /** Default caller threshold for trigram and relaxed fuzzy acceptance */
  confidence: number;
  /** Minimum cosine similarity for an embedding winner */
  embedding: number;
  /** Minimum ratio for a strong fuzzy winner */
  fuzzy: number;
  /** Floor for candidates that only feed suggestions */
  suggestion: number;
  /** Minimum LLM confidence for its extraction to replace the query */
  nlMinConfidence: number;
}

export interface ResolverConfig {
  // Reference data
  communesDataPath: string;
  communesDbPath?: string;

  // Providers
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  llmModel: string;
  embeddingModel: string;
  enableLlm: boolean;
  enableEmbeddings: boolean;
  providerTimeoutMs: number;
  indexTimeoutMs: number;

  // Matching
  thresholds: MatchThresholds;
  suggestionLimit: number;

  logLevel: LogLevel;
}

export const DEFAULT_THRESHOLDS: MatchThresholds = {
  confidence: 0.7,
  embedding: 0.85,
  fuzzy: 0.9,
  suggestion: 0.3,
  nlMinConfidence: 0.5,
};

function parseBoolean(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (['1', 'true', 'yes', 'on'].includes(raw.toLowerCase())) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(raw.toLowerCase())) {
    return false;
  }
  throw new Error(`Invalid ${name}: ${raw} (expected true or false)`);
}

function parseRatio(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (Number.isNaN(value) || value < 0 || value > 1) {
    throw new Error(`Invalid ${name}: ${raw} (expected a number between 0 and 1)`);
  }
  return value;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    throw new Error(`Invalid ${name}: ${raw} (expected a positive integer)`);
  }
  return value;
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
  const communesDataPath = env.COMMUNES_DATA_PATH || './data/communes.json';
  const communesDbPath = env.COMMUNES_DB_PATH || undefined;

  const openaiApiKey = env.OPENAI_API_KEY || undefined;
  const openaiBaseUrl = env.OPENAI_BASE_URL || undefined;
  if (openaiBaseUrl) {
    try {
      new URL(openaiBaseUrl);
    } catch {
      throw new Error(`Invalid OPENAI_BASE_URL: ${openaiBaseUrl}`);
    }
  }

  // Providers default to on when credentials exist
  const enableLlm = parseBoolean('COMMUNE_ENABLE_LLM', env.COMMUNE_ENABLE_LLM, Boolean(openaiApiKey));
  const enableEmbeddings = parseBoolean(
    'COMMUNE_ENABLE_EMBEDDINGS',
    env.COMMUNE_ENABLE_EMBEDDINGS,
    Boolean(openaiApiKey)
  );

  const logLevel = env.COMMUNE_LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid COMMUNE_LOG_LEVEL: ${logLevel}`);
  }

  const thresholds: MatchThresholds = {
    confidence: parseRatio(
      'COMMUNE_CONFIDENCE_THRESHOLD',
      env.COMMUNE_CONFIDENCE_THRESHOLD,
      DEFAULT_THRESHOLDS.confidence
    ),
    embedding: parseRatio(
      'COMMUNE_EMBEDDING_THRESHOLD',
      env.COMMUNE_EMBEDDING_THRESHOLD,
      DEFAULT_THRESHOLDS.embedding
    ),
    fuzzy: parseRatio('COMMUNE_FUZZY_THRESHOLD', env.COMMUNE_FUZZY_THRESHOLD, DEFAULT_THRESHOLDS.fuzzy),
    suggestion: parseRatio(
      'COMMUNE_SUGGESTION_THRESHOLD',
      env.COMMUNE_SUGGESTION_THRESHOLD,
      DEFAULT_THRESHOLDS.suggestion
    ),
    nlMinConfidence: parseRatio(
      'COMMUNE_NL_MIN_CONFIDENCE',
      env.COMMUNE_NL_MIN_CONFIDENCE,
      DEFAULT_THRESHOLDS.nlMinConfidence
    ),
  };

  return {
    communesDataPath,
    communesDbPath,
    openaiApiKey,
    openaiBaseUrl,
    llmModel: env.COMMUNE_LLM_MODEL || 'gpt-4o-mini',
    embeddingModel: env.COMMUNE_EMBEDDING_MODEL || 'text-embedding-3-small',
    enableLlm,
    enableEmbeddings,
    providerTimeoutMs: parsePositiveInt(
      'COMMUNE_PROVIDER_TIMEOUT_MS',
      env.COMMUNE_PROVIDER_TIMEOUT_MS,
      5000
    ),
    indexTimeoutMs: parsePositiveInt('COMMUNE_INDEX_TIMEOUT_MS', env.COMMUNE_INDEX_TIMEOUT_MS, 30000),
    thresholds,
    suggestionLimit: parsePositiveInt('COMMUNE_SUGGESTION_LIMIT', env.COMMUNE_SUGGESTION_LIMIT, 5),
    logLevel,
  };
}

// Singleton config instance
let configInstance: ResolverConfig | null = null;

/**
 * Get the current configuration (loads on first call)
 */
export function getConfig(): ResolverConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}
