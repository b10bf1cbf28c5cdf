/**
 * Types for the communes domain (Chilean commune name resolution)
 */

/** Reference record as supplied by a loader, before alias derivation */
export interface CommuneInput {
  canonicalName: string;
  region: string;
  aliases?: string[];
  pharmacyCount?: number;
}

/** Canonical commune held by the gazetteer */
export interface CommuneRecord {
  readonly canonicalName: string;
  readonly region: string;
  /** Every known spelling, including the canonical name */
  readonly aliases: ReadonlySet<string>;
  /** Distinct normalized forms of the aliases, used by the indexes */
  readonly normalizedAliases: readonly string[];
  readonly pharmacyCount?: number;
  /** Position in the reference data, used as the final tie-break */
  readonly order: number;
}

export interface NormalizedQuery {
  readonly original: string;
  readonly normalized: string;
}

export type IntentType = 'pharmacy_search' | 'location_query' | 'general';

export interface LocationIntent {
  originalQuery: string;
  extractedLocation: string;
  intentType: IntentType;
  confidence: number;
  /** Human-readable, for logs only */
  reasoning: string;
  source: 'llm' | 'fallback';
}

/** A commune proposed by one strategy, with that strategy's score */
export interface ScoredCandidate {
  commune: string;
  score: number;
}

export type MatchMethod = 'exact' | 'trigram' | 'fuzzy' | 'embedding' | 'nl_extracted' | 'none';

interface MatchResultBase {
  originalQuery: string;
  normalizedQuery: string;
  confidence: number;
  suggestions: string[];
  locationIntent?: LocationIntent;
}

export interface ResolvedMatch extends MatchResultBase {
  method: Exclude<MatchMethod, 'none'>;
  matchedCommune: string;
}

export interface NoMatch extends MatchResultBase {
  method: 'none';
  matchedCommune: null;
}

/** Outcome of one cascade run, discriminated on `method` */
export type MatchResult = ResolvedMatch | NoMatch;

export interface MatchOptions {
  /** Acceptance floor for trigram and relaxed fuzzy winners (default from config) */
  confidenceThreshold?: number;
  /** Aborts in-flight provider calls for this query only */
  signal?: AbortSignal;
}

export interface SuggestionOptions {
  limit?: number;
  signal?: AbortSignal;
}

/** Description of the active gazetteer generation */
export interface GenerationStats {
  generationId: number;
  builtAt: string;
  communes: number;
  aliases: number;
  shingles: number;
  regions: number;
  embeddings: 'ready' | 'disabled' | 'unavailable';
  llm: 'enabled' | 'disabled';
}
