/**
 * Wire a resolver from configuration: reference data source, providers and thresholds
 */

import { getConfig, type ResolverConfig } from '../config/env.js';
import { logger } from '../domain/logger.js';
import {
  createOpenAIClient,
  OpenAIChatClient,
  OpenAIEmbeddingClient,
  type EmbeddingProvider,
  type LlmProvider,
} from '../domain/openai-clients.js';
import { CommunesDB, loadCommunesFromFile } from './loader.js';
import { CommuneResolver } from './resolver.js';
import type { CommuneInput } from './types.js';

/**
 * Load reference data from the pharmacy database when one is configured, the communes file otherwise
 */
export async function loadReferenceData(config: ResolverConfig): Promise<CommuneInput[]> {
  if (config.communesDbPath) {
    const db = new CommunesDB(config.communesDbPath);
    try {
      return db.loadCommunes();
    } finally {
      db.close();
    }
  }
  return loadCommunesFromFile(config.communesDataPath);
}

interface Providers {
  embeddingProvider?: EmbeddingProvider;
  llmProvider?: LlmProvider;
}

function createProviders(config: ResolverConfig): Providers {
  if (!config.openaiApiKey) {
    if (config.enableLlm || config.enableEmbeddings) {
      logger.warn('OPENAI_API_KEY not set, LLM extraction and embeddings disabled');
    }
    return {};
  }
  if (!config.enableLlm && !config.enableEmbeddings) {
    return {};
  }

  const client = createOpenAIClient({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    timeoutMs: Math.max(config.providerTimeoutMs, config.indexTimeoutMs),
  });

  return {
    embeddingProvider: config.enableEmbeddings
      ? new OpenAIEmbeddingClient(client, config.embeddingModel)
      : undefined,
    llmProvider: config.enableLlm ? new OpenAIChatClient(client, config.llmModel) : undefined,
  };
}

/**
 * Build a ready resolver from the environment
 *
 * @throws DataUnavailableError when the reference data cannot be loaded
 */
export async function createResolverFromConfig(
  config: ResolverConfig = getConfig()
): Promise<CommuneResolver> {
  logger.setLevel(config.logLevel);

  const records = await loadReferenceData(config);
  const providers = createProviders(config);

  return CommuneResolver.create(records, {
    ...providers,
    thresholds: config.thresholds,
    suggestionLimit: config.suggestionLimit,
    providerTimeoutMs: config.providerTimeoutMs,
    indexTimeoutMs: config.indexTimeoutMs,
  });
}
