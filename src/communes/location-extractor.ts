/**
 * Location extraction from full Spanish sentences
 *
 * An LLM is asked for the place named in the sentence; when it is not configured,
 * times out, or answers with something that fails validation, a deterministic
 * word-filtering extractor takes over.
 */

import { logger } from '../domain/logger.js';
import { callProvider } from '../domain/provider-call.js';
import { createMatcherError, createSignalUnavailableError } from '../domain/error-handler.js';
import type { MatcherError } from '../domain/types.js';
import type { LlmProvider, LlmRequest } from '../domain/openai-clients.js';
import { normalizeText, titleCase, tokenize } from './normalizer.js';
import { LocationIntentResponseSchema } from './schemas.js';
import type { IntentType, LocationIntent } from './types.js';

/** Words that mark a query as a sentence rather than a bare name */
const SENTENCE_CUES = new Set([
  'en',
  'buscar',
  'busco',
  'buscando',
  'encontrar',
  'necesito',
  'quiero',
  'hay',
  'donde',
  'farmacia',
  'farmacias',
  'turno',
  'cerca',
  'medicamento',
  'medicamentos',
  'abierta',
  'abiertas',
  'comuna',
]);

/**
 * Words that introduce the place ("farmacias en ...", "cerca de ..."). "de" is left out:
 * it also joins the words of a name ("Isla de Maipo").
 */
const LOCATION_PREPOSITIONS = new Set(['en', 'a', 'cerca']);

/** Filler removed from the edges of an extracted phrase */
const STOP_WORDS = new Set([
  'en',
  'de',
  'del',
  'a',
  'al',
  'para',
  'por',
  'con',
  'sin',
  'cerca',
  'buscar',
  'busco',
  'buscando',
  'encontrar',
  'necesito',
  'quiero',
  'hay',
  'donde',
  'que',
  'me',
  'mi',
  'un',
  'una',
  'farmacia',
  'farmacias',
  'turno',
  'abierta',
  'abiertas',
  'abierto',
  'abiertos',
  'medicamento',
  'medicamentos',
  'comuna',
  'hoy',
  'ahora',
  'favor',
]);

const ARTICLES = new Set(['la', 'las', 'el', 'los', 'lo']);

const PHARMACY_WORDS = new Set(['farmacia', 'farmacias', 'turno', 'medicamento', 'medicamentos']);

/**
 * A query is treated as a sentence when it carries a cue word or is longer than
 * any commune name
 */
export function looksLikeSentence(normalized: string, maxNameTokens = 5): boolean {
  const tokens = tokenize(normalized);
  return tokens.length > maxNameTokens || tokens.some(token => SENTENCE_CUES.has(token));
}

function trimStopWords(words: Array<{ raw: string; norm: string }>): string {
  let start = 0;
  let end = words.length;
  while (start < end && STOP_WORDS.has(words[start].norm)) {
    start++;
  }
  while (end > start && STOP_WORDS.has(words[end - 1].norm)) {
    end--;
  }

  const kept = words.slice(start, end);
  if (kept.every(word => ARTICLES.has(word.norm))) {
    return '';
  }
  return titleCase(kept.map(word => word.raw).join(' '));
}

/**
 * Best-effort extraction without an LLM. Takes the words after the first location
 * preposition when there is one, otherwise the whole query; drops filler from both
 * edges and title-cases the rest. Connectors inside the phrase are kept.
 * Never throws; returns '' when nothing is left.
 *
 * "necesito farmacias en la florida" -> "La Florida"
 * "buscar farmacia san pedro de la paz" -> "San Pedro De La Paz"
 */
export function fallbackExtraction(query: string): string {
  const words = query
    .toLowerCase()
    .replace(/['’`´.]/g, '')
    .replace(/[^\p{L}\p{N}\p{M}\s]/gu, ' ')
    .split(/\s+/)
    .filter(Boolean)
    .map(raw => ({ raw, norm: normalizeText(raw) }))
    .filter(word => word.norm);

  const prepositionAt = words.findIndex(word => LOCATION_PREPOSITIONS.has(word.norm));
  if (prepositionAt >= 0) {
    const afterPreposition = trimStopWords(words.slice(prepositionAt + 1));
    if (afterPreposition) {
      return afterPreposition;
    }
  }

  return trimStopWords(words);
}

function classifyIntent(query: string, extractedLocation: string): IntentType {
  const tokens = tokenize(normalizeText(query));
  if (tokens.some(token => PHARMACY_WORDS.has(token))) {
    return 'pharmacy_search';
  }
  return extractedLocation ? 'location_query' : 'general';
}

/**
 * Intent built by the word-filtering extractor
 */
export function fallbackIntent(query: string, reason: string): LocationIntent {
  const extractedLocation = fallbackExtraction(query);
  return {
    originalQuery: query,
    extractedLocation,
    intentType: classifyIntent(query, extractedLocation),
    confidence: 0,
    reasoning: `fallback extraction: ${reason}`,
    source: 'fallback',
  };
}

/**
 * Prompt asking for a JSON object describing the location in the query
 */
export function buildExtractionPrompt(query: string, knownCommunes: readonly string[]): LlmRequest {
  const system =
    'Eres un asistente que extrae ubicaciones de consultas sobre farmacias en Chile. ' +
    'Respondes solo con un objeto JSON.';

  const prompt = `Consulta: "${query}"

Comunas conocidas (muestra): ${knownCommunes.join(', ')}...

Identifica la comuna o ciudad mencionada en la consulta y escribe su nombre con mayúsculas
y tildes (por ejemplo "la florida" -> "La Florida"). Si no se menciona ningún lugar,
deja extracted_location vacío.

Responde con este JSON:
{
  "extracted_location": "nombre de la comuna o cadena vacía",
  "intent_type": "pharmacy_search" | "location_query" | "general",
  "confidence": número entre 0 y 1,
  "reasoning": "explicación breve"
}`;

  return { system, prompt };
}

/**
 * Pull a JSON object out of a raw answer, accepting a fenced ```json block
 */
function parseJsonAnswer(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)```/);
    if (!fenced) {
      throw new Error(`Answer is not JSON: ${raw.slice(0, 120)}`);
    }
    return JSON.parse(fenced[1]);
  }
}

export interface LocationExtractorOptions {
  llm?: LlmProvider;
  timeoutMs: number;
  /** How many known commune names to include in the prompt */
  sampleSize?: number;
}

export interface ExtractionResult {
  intent: LocationIntent;
  /** Set when the LLM could not be used and the fallback answered instead */
  error?: MatcherError;
}

export class LocationExtractor {
  private readonly llm?: LlmProvider;
  private readonly timeoutMs: number;
  readonly sampleSize: number;

  constructor(options: LocationExtractorOptions) {
    this.llm = options.llm;
    this.timeoutMs = options.timeoutMs;
    this.sampleSize = options.sampleSize ?? 20;
  }

  get enabled(): boolean {
    return this.llm !== undefined;
  }

  /**
   * Extract the location and intent of a sentence. Never rejects.
   */
  async extract(
    query: string,
    knownCommunes: readonly string[],
    signal?: AbortSignal
  ): Promise<ExtractionResult> {
    if (!this.llm) {
      const error = createSignalUnavailableError('llm', 'no LLM provider configured');
      return { intent: fallbackIntent(query, error.message), error };
    }

    const llm = this.llm;
    const request = buildExtractionPrompt(query, knownCommunes.slice(0, this.sampleSize));
    const answer = await callProvider(
      { provider: llm.name, timeoutMs: this.timeoutMs, signal },
      callSignal => llm.complete(request, callSignal)
    );

    if (!answer.ok) {
      return { intent: fallbackIntent(query, answer.error.message), error: answer.error };
    }

    let parsed: unknown;
    try {
      parsed = parseJsonAnswer(answer.value);
    } catch (error) {
      const invalid = createMatcherError(
        'INVALID_RESPONSE',
        error instanceof Error ? error.message : String(error),
        { provider: llm.name }
      );
      logger.warn('LLM answer is not valid JSON', { provider: llm.name });
      return { intent: fallbackIntent(query, invalid.message), error: invalid };
    }

    const validated = LocationIntentResponseSchema.safeParse(parsed);
    if (!validated.success) {
      const invalid = createMatcherError('INVALID_RESPONSE', 'LLM answer failed schema validation', {
        provider: llm.name,
        issues: validated.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
      logger.warn('LLM answer failed schema validation', { provider: llm.name });
      return { intent: fallbackIntent(query, invalid.message), error: invalid };
    }

    const intent: LocationIntent = {
      originalQuery: query,
      extractedLocation: validated.data.extracted_location.trim(),
      intentType: validated.data.intent_type,
      confidence: validated.data.confidence,
      reasoning: validated.data.reasoning,
      source: 'llm',
    };

    logger.debug('LLM extracted location', {
      extractedLocation: intent.extractedLocation,
      intentType: intent.intentType,
      confidence: intent.confidence,
      reasoning: intent.reasoning,
    });

    return { intent };
  }
}
