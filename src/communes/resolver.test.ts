/**
 * Tests for CommuneResolver: matching cascade, suggestions, degradation and reload
 */

import { fileURLToPath } from 'node:url';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DataUnavailableError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { metrics } from '../domain/metrics.js';
import type { EmbeddingProvider } from '../domain/openai-clients.js';
import { FIXTURE_COMMUNES } from '../../tests/fixtures/communes.js';
import { FakeEmbeddingProvider, FakeLlmProvider, HangingLlmProvider } from '../../tests/fixtures/providers.js';
import { Gazetteer } from './gazetteer.js';
import { loadCommunesFromFile } from './loader.js';
import { CommuneResolver } from './resolver.js';
import type { CommuneInput } from './types.js';

const VALPARAISO = [1, 0, 0, 0];
const OTHER_COMMUNE = [0, 0, 1, 0];
const UNKNOWN = [0, 0, 0, 1];

/**
 * Valparaíso and "puerto de valparaiso" share a direction; every other alias shares
 * another one; any other text is orthogonal to both
 */
function semanticProvider(): FakeEmbeddingProvider {
  const table = new Map<string, number[]>();
  for (const { commune, alias } of Gazetteer.build(FIXTURE_COMMUNES).allAliases()) {
    table.set(alias, commune === 'Valparaíso' ? VALPARAISO : OTHER_COMMUNE);
  }
  table.set('puerto de valparaiso', VALPARAISO);
  return new FakeEmbeddingProvider(table, UNKNOWN);
}

const KILPUE_ALTERNATIVES = ['Maipú', 'Puente Alto', 'Punta Arenas', 'Puerto Montt', 'Villa Alemana'];

beforeEach(() => {
  vi.restoreAllMocks();
  for (const level of ['debug', 'info', 'warn', 'error'] as const) {
    vi.spyOn(logger, level).mockImplementation(() => {});
  }
  metrics.reset();
});

describe('CommuneResolver.create', () => {
  it('should reject empty reference data', async () => {
    await expect(CommuneResolver.create([])).rejects.toThrow(DataUnavailableError);
  });

  it('should describe the first generation', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    expect(resolver.generationId).toBe(1);
    expect(resolver.stats()).toMatchObject({
      generationId: 1,
      communes: 22,
      aliases: 26,
      regions: 10,
      embeddings: 'disabled',
      llm: 'disabled',
    });
    expect(resolver.stats().shingles).toBeGreaterThan(0);
  });
});

describe('CommuneResolver.match', () => {
  it('should match every canonical name exactly', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    for (const { canonicalName } of FIXTURE_COMMUNES) {
      const result = await resolver.match(canonicalName);
      expect(result.method).toBe('exact');
      expect(result.matchedCommune).toBe(canonicalName);
      expect(result.confidence).toBe(1);
    }
  });

  it('should ignore accents and case', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    for (const query of ['Quilpué', 'quilpue', 'QUILPUE', '  quilpué ']) {
      const result = await resolver.match(query);
      expect(result.matchedCommune).toBe('Quilpué');
      expect(result.method).toBe('exact');
    }
  });

  it('should return a complete exact result', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    expect(await resolver.match('Quilpué')).toEqual({
      originalQuery: 'Quilpué',
      normalizedQuery: 'quilpue',
      matchedCommune: 'Quilpué',
      confidence: 1,
      method: 'exact',
      suggestions: [],
    });
  });

  it('should match derived aliases', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    expect((await resolver.match('condes')).matchedCommune).toBe('Las Condes');
    expect((await resolver.match('OHiggins')).matchedCommune).toBe("O'Higgins");
    expect((await resolver.match('Vina del Mar')).matchedCommune).toBe('Viña del Mar');
  });

  it('should resolve a misspelling with relaxed fuzzy matching', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    const result = await resolver.match('kilpue');

    expect(result.method).toBe('fuzzy');
    expect(result.matchedCommune).toBe('Quilpué');
    expect(result.confidence).toBeCloseTo(10 / 13, 10);
    expect(result.suggestions).toEqual(KILPUE_ALTERNATIVES);
  });

  it('should accept a strong fuzzy match', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    const result = await resolver.match('providensia');

    expect(result.method).toBe('fuzzy');
    expect(result.matchedCommune).toBe('Providencia');
    expect(result.confidence).toBeCloseTo(10 / 11, 10);
  });

  it('should accept trigram matches at the caller threshold', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    const result = await resolver.match('kilpue', { confidenceThreshold: 0.4 });

    expect(result.method).toBe('trigram');
    expect(result.matchedCommune).toBe('Quilpué');
    expect(result.confidence).toBeCloseTo(5 / 12, 10);
    expect(result.suggestions).toEqual([]);
  });

  it('should return suggestions when nothing reaches the threshold', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    const result = await resolver.match('kilpue', { confidenceThreshold: 0.8 });

    expect(result.method).toBe('none');
    expect(result.matchedCommune).toBeNull();
    expect(result.confidence).toBeCloseTo(10 / 13, 10);
    expect(result.suggestions).toEqual(['Quilpué', 'Maipú', 'Puente Alto', 'Punta Arenas', 'Puerto Montt']);
  });

  it('should fall back to the default threshold for invalid values', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    const result = await resolver.match('kilpue', { confidenceThreshold: 1.5 });

    expect(result.method).toBe('fuzzy');
    expect(logger.warn).toHaveBeenCalledWith('Ignoring invalid confidence threshold', { value: 1.5 });
  });

  it('should extract the location from a sentence without an LLM', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    const result = await resolver.match('farmacias en la florida');

    expect(result).toEqual({
      originalQuery: 'farmacias en la florida',
      normalizedQuery: 'la florida',
      matchedCommune: 'La Florida',
      confidence: 1,
      method: 'exact',
      suggestions: [],
      locationIntent: {
        originalQuery: 'farmacias en la florida',
        extractedLocation: 'La Florida',
        intentType: 'pharmacy_search',
        confidence: 0,
        reasoning: 'fallback extraction: LLM extraction disabled',
        source: 'fallback',
      },
    });
  });

  it('should resolve sentences naming communes with connectors', async () => {
    const communes = await loadCommunesFromFile(
      fileURLToPath(new URL('../../data/communes.json', import.meta.url))
    );
    const resolver = await CommuneResolver.create(communes);

    const islaDeMaipo = await resolver.match('farmacias isla de maipo');
    expect(islaDeMaipo.method).toBe('exact');
    expect(islaDeMaipo.matchedCommune).toBe('Isla de Maipo');
    expect(islaDeMaipo.normalizedQuery).toBe('isla de maipo');

    const sanPedro = await resolver.match('buscar farmacia san pedro de la paz');
    expect(sanPedro.method).toBe('exact');
    expect(sanPedro.matchedCommune).toBe('San Pedro de la Paz');

    const caboDeHornos = await resolver.match('farmacia cabo de hornos');
    expect(caboDeHornos.method).toBe('exact');
    expect(caboDeHornos.matchedCommune).toBe('Cabo de Hornos');
  });

  it('should report no match for unrelated text', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    expect(await resolver.match('xyz123')).toEqual({
      originalQuery: 'xyz123',
      normalizedQuery: 'xyz123',
      matchedCommune: null,
      confidence: 0,
      method: 'none',
      suggestions: [],
    });
  });

  it('should offer the most common communes for an empty query', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    for (const query of ['', '   ']) {
      expect(await resolver.match(query)).toEqual({
        originalQuery: query,
        normalizedQuery: '',
        matchedCommune: null,
        confidence: 0,
        method: 'none',
        suggestions: ['Santiago', 'Las Condes', 'Maipú', 'La Florida', 'Puente Alto'],
      });
    }
  });

  it('should be idempotent', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    for (const query of ['kilpue', 'farmacias en la florida', 'xyz123', '']) {
      expect(await resolver.match(query)).toEqual(await resolver.match(query));
    }
  });

  it('should honour the configured suggestion limit', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES, { suggestionLimit: 2 });

    expect((await resolver.match('kilpue')).suggestions).toEqual(['Maipú', 'Puente Alto']);
  });

  it('should log and count each decision', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);
    const logMatchEnd = vi.spyOn(logger, 'logMatchEnd');

    await resolver.match('Quilpué');

    expect(logMatchEnd).toHaveBeenCalledWith('exact', 1, expect.any(Number), expect.any(String), 'Quilpué');
    expect(metrics.getMetrics().matches).toEqual({ exact: 1 });
    expect(metrics.getMetrics().latency.count).toBe(1);
  });
});

describe('CommuneResolver.match with an LLM', () => {
  it('should mark exact hits on the extracted location', async () => {
    const llm = new FakeLlmProvider({
      extracted_location: 'Viña del Mar',
      intent_type: 'pharmacy_search',
      confidence: 0.92,
      reasoning: 'menciona viña del mar',
    });
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES, { llmProvider: llm });

    const result = await resolver.match('necesito una farmacia de turno cerca de vina del mar');

    expect(result.method).toBe('nl_extracted');
    expect(result.matchedCommune).toBe('Viña del Mar');
    expect(result.confidence).toBe(1);
    expect(result.normalizedQuery).toBe('vina del mar');
    expect(result.locationIntent?.source).toBe('llm');
    expect(resolver.stats().llm).toBe('enabled');
  });

  it('should not call the LLM for bare names', async () => {
    const llm = new FakeLlmProvider({ extracted_location: 'Temuco', intent_type: 'general', confidence: 1 });
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES, { llmProvider: llm });

    await resolver.match('Quilpué');

    expect(llm.requests).toHaveLength(0);
  });

  it('should run later strategies on an extracted misspelling', async () => {
    const llm = new FakeLlmProvider({
      extracted_location: 'Kilpue',
      intent_type: 'pharmacy_search',
      confidence: 0.9,
    });
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES, { llmProvider: llm });

    const result = await resolver.match('farmacias de turno en kilpue');

    expect(result.method).toBe('fuzzy');
    expect(result.matchedCommune).toBe('Quilpué');
  });

  it('should ignore a low-confidence extraction', async () => {
    const llm = new FakeLlmProvider({
      extracted_location: 'Temuco',
      intent_type: 'pharmacy_search',
      confidence: 0.3,
    });
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES, { llmProvider: llm });

    const result = await resolver.match('busco farmacia en quilpue');

    expect(result.method).toBe('exact');
    expect(result.matchedCommune).toBe('Quilpué');
    expect(result.locationIntent?.confidence).toBe(0.3);
  });

  it('should fall back to word filtering when the LLM times out', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES, {
      llmProvider: new HangingLlmProvider(),
      providerTimeoutMs: 20,
    });

    const result = await resolver.match('farmacias en quilpue');

    expect(result.method).toBe('exact');
    expect(result.matchedCommune).toBe('Quilpué');
    expect(result.locationIntent?.source).toBe('fallback');
    expect(metrics.getMetrics().strategyFailures).toEqual({
      nl_extraction: { PROVIDER_TIMEOUT: 1 },
    });
  });
});

describe('CommuneResolver.match with embeddings', () => {
  it('should accept a confident semantic match', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES, {
      embeddingProvider: semanticProvider(),
    });

    const result = await resolver.match('puerto de valparaiso');

    expect(result.method).toBe('embedding');
    expect(result.matchedCommune).toBe('Valparaíso');
    expect(result.confidence).toBe(1);
    expect(result.suggestions).toEqual([]);
    expect(resolver.stats().embeddings).toBe('ready');
  });

  it('should not encode queries that match exactly', async () => {
    const provider = semanticProvider();
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES, { embeddingProvider: provider });

    await resolver.match('Quilpué');

    expect(provider.calls).toHaveLength(1);
  });

  it('should continue with fuzzy matching when the semantic score is low', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES, {
      embeddingProvider: semanticProvider(),
    });

    const result = await resolver.match('kilpue');

    expect(result.method).toBe('fuzzy');
    expect(result.matchedCommune).toBe('Quilpué');
  });

  it('should degrade to the remaining strategies when the provider fails', async () => {
    const provider = semanticProvider();
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES, { embeddingProvider: provider });
    provider.failQueries = true;

    const result = await resolver.match('kilpue');

    expect(result.method).toBe('fuzzy');
    expect(result.matchedCommune).toBe('Quilpué');
    expect(result.suggestions).toEqual(KILPUE_ALTERNATIVES);
    expect(metrics.getMetrics().strategyFailures).toEqual({ embedding: { PROVIDER_ERROR: 1 } });
  });

  it('should run without embeddings when the index cannot be built', async () => {
    const broken: EmbeddingProvider = {
      name: 'broken',
      encode: async () => {
        throw new Error('invalid api key');
      },
    };
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES, { embeddingProvider: broken });

    expect(resolver.stats().embeddings).toBe('unavailable');
    expect((await resolver.match('kilpue')).matchedCommune).toBe('Quilpué');
  });

  it('should abort only the cancelled query', async () => {
    const provider = semanticProvider();
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES, { embeddingProvider: provider });
    const controller = new AbortController();
    provider.hold();

    const cancelled = resolver.match('kilpue', { signal: controller.signal });
    const other = resolver.match('kilpue');
    await vi.waitFor(() => expect(provider.querySignals).toHaveLength(2));

    controller.abort();
    expect(provider.querySignals[0].aborted).toBe(true);
    expect(provider.querySignals[1].aborted).toBe(false);

    const cancelledResult = await cancelled;
    provider.release();
    const otherResult = await other;

    expect(cancelledResult.matchedCommune).toBe('Quilpué');
    expect(otherResult.matchedCommune).toBe('Quilpué');
    expect(metrics.getMetrics().strategyFailures).toEqual({ embedding: { CANCELLED: 1 } });
  });
});

describe('CommuneResolver.suggestions', () => {
  it('should rank alternatives for a misspelling', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    expect(await resolver.suggestions('kilpue')).toEqual([
      'Quilpué',
      'Maipú',
      'Puente Alto',
      'Punta Arenas',
      'Puerto Montt',
    ]);
    expect(await resolver.suggestions('kilpue', { limit: 2 })).toEqual(['Quilpué', 'Maipú']);
  });

  it('should put an exact hit first', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    expect(await resolver.suggestions('Quilpué')).toEqual([
      'Quilpué',
      'Maipú',
      'Puente Alto',
      'Coquimbo',
      'Punta Arenas',
    ]);
  });

  it('should reduce sentences to their location phrase', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    expect(await resolver.suggestions('farmacias en kilpue')).toEqual(await resolver.suggestions('kilpue'));
  });

  it('should offer the most common communes for an empty query', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    expect(await resolver.suggestions('', { limit: 3 })).toEqual(['Santiago', 'Las Condes', 'Maipú']);
  });

  it('should return nothing for unrelated text', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    expect(await resolver.suggestions('xyz123')).toEqual([]);
  });

  it('should fall back to the default limit for invalid values', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    expect(await resolver.suggestions('kilpue', { limit: 0 })).toHaveLength(5);
  });

  it('should count provider failures and rank the remaining signals', async () => {
    const provider = semanticProvider();
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES, { embeddingProvider: provider });
    provider.failQueries = true;

    expect(await resolver.suggestions('kilpue')).toEqual([
      'Quilpué',
      'Maipú',
      'Puente Alto',
      'Punta Arenas',
      'Puerto Montt',
    ]);
    expect(metrics.getMetrics().strategyFailures).toEqual({ embedding: { PROVIDER_ERROR: 1 } });
    expect(logger.warn).toHaveBeenCalledWith(
      'Strategy skipped',
      expect.objectContaining({ strategy: 'embedding', code: 'PROVIDER_ERROR' })
    );
  });
});

describe('CommuneResolver.reload', () => {
  const SOUTH: CommuneInput[] = [
    { canonicalName: 'Punta Arenas', region: 'Magallanes' },
    { canonicalName: 'Puerto Natales', region: 'Magallanes' },
  ];
  const NORTH: CommuneInput[] = [
    { canonicalName: 'Arica', region: 'Arica y Parinacota' },
    { canonicalName: 'Putre', region: 'Arica y Parinacota' },
  ];

  it('should swap in the new reference data', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    await resolver.reload(SOUTH);

    expect(resolver.generationId).toBe(2);
    expect(resolver.listCommunes()).toEqual(['Punta Arenas', 'Puerto Natales']);
    expect((await resolver.match('puerto natales')).matchedCommune).toBe('Puerto Natales');
    expect(resolver.getCommune('Quilpué')).toBeUndefined();
    expect(metrics.getMetrics().reloads).toEqual({ success: 1 });
  });

  it('should keep the current generation when reload fails', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    await expect(resolver.reload([])).rejects.toThrow(DataUnavailableError);

    expect(resolver.generationId).toBe(1);
    expect((await resolver.match('Quilpué')).matchedCommune).toBe('Quilpué');
    expect(metrics.getMetrics().reloads).toEqual({ error: 1 });
  });

  it('should finish in-flight matches on the generation they started with', async () => {
    const provider = semanticProvider();
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES, { embeddingProvider: provider });
    provider.hold();

    const inFlight = resolver.match('kilpue');
    await vi.waitFor(() => expect(provider.querySignals).toHaveLength(1));

    await resolver.reload(NORTH);
    expect(resolver.getCommune('Quilpué')).toBeUndefined();
    provider.release();

    const result = await inFlight;
    expect(result.matchedCommune).toBe('Quilpué');
    expect(result.method).toBe('fuzzy');
  });

  it('should install the most recently started reload', async () => {
    const provider = semanticProvider();
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES, { embeddingProvider: provider });
    provider.buildDelays.push(50, 0);

    await Promise.all([resolver.reload(SOUTH), resolver.reload(NORTH)]);

    expect(resolver.generationId).toBe(3);
    expect(resolver.listCommunes()).toEqual(['Arica', 'Putre']);
    expect(logger.warn).toHaveBeenCalledWith('Discarding generation superseded by a newer reload', {
      generationId: 2,
      activeGenerationId: 3,
    });
  });
});

describe('CommuneResolver lookups', () => {
  it('should expose communes and regions of the active generation', async () => {
    const resolver = await CommuneResolver.create(FIXTURE_COMMUNES);

    expect(resolver.getCommune('vina del mar')?.region).toBe('Valparaíso');
    expect(resolver.listCommunes('Biobío')).toEqual(['Concepción', 'Talcahuano']);
    expect(resolver.regions()).toHaveLength(10);
  });
});
