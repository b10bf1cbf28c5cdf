/**
 * Gazetteer - immutable in-memory reference of canonical communes and their aliases
 */

import { logger } from '../domain/logger.js';
import { DataUnavailableError } from '../domain/error-handler.js';
import { normalizeText, stripAccents } from './normalizer.js';
import type { CommuneInput, CommuneRecord } from './types.js';

/** Leading words dropped to form a short alias ("Las Condes" -> "Condes") */
const LEADING_ARTICLES = new Set(['la', 'las', 'el', 'los', 'de', 'del']);

/** Trailing words dropped to form a short alias ("Puente Alto" -> "Puente") */
const TRAILING_QUALIFIERS = new Set(['norte', 'sur', 'este', 'oeste', 'alto', 'bajo']);

export interface AliasEntry {
  commune: string;
  alias: string;
}

/**
 * Generate the spellings a commune is commonly written with
 */
export function deriveAliases(name: string, extra: readonly string[] = []): Set<string> {
  const trimmed = name.trim();
  const aliases = new Set<string>([
    trimmed,
    normalizeText(trimmed),
    stripAccents(trimmed),
    trimmed.toUpperCase(),
    trimmed.toLowerCase(),
  ]);

  const words = trimmed.split(/\s+/);
  if (words.length > 1) {
    if (LEADING_ARTICLES.has(normalizeText(words[0]))) {
      aliases.add(words.slice(1).join(' '));
    }
    if (TRAILING_QUALIFIERS.has(normalizeText(words[words.length - 1]))) {
      aliases.add(words.slice(0, -1).join(' '));
    }
  }

  for (const alias of extra) {
    if (alias.trim()) {
      aliases.add(alias.trim());
    }
  }

  return aliases;
}

export class Gazetteer {
  private readonly communes: ReadonlyMap<string, CommuneRecord>;
  private readonly aliasIndex: ReadonlyMap<string, string>;
  private readonly entries: readonly AliasEntry[];

  private constructor(
    communes: Map<string, CommuneRecord>,
    aliasIndex: Map<string, string>,
    entries: AliasEntry[]
  ) {
    this.communes = communes;
    this.aliasIndex = aliasIndex;
    this.entries = Object.freeze(entries);
  }

  /**
   * Build a gazetteer from reference records. Construction is the only mutation point.
   *
   * @throws DataUnavailableError when no usable record is supplied
   */
  static build(inputs: readonly CommuneInput[]): Gazetteer {
    if (inputs.length === 0) {
      throw new DataUnavailableError('Commune reference data is empty');
    }

    const merged = new Map<string, { input: CommuneInput; aliases: Set<string> }>();
    for (const input of inputs) {
      const canonicalName = input.canonicalName.trim();
      if (!canonicalName || !normalizeText(canonicalName)) {
        logger.warn('Skipping commune record without a usable name', {
          canonicalName: input.canonicalName,
          region: input.region,
        });
        continue;
      }

      const existing = merged.get(canonicalName);
      if (existing) {
        logger.warn('Duplicate commune in reference data, merging aliases', { canonicalName });
        for (const alias of deriveAliases(canonicalName, input.aliases)) {
          existing.aliases.add(alias);
        }
        continue;
      }

      merged.set(canonicalName, {
        input: { ...input, canonicalName },
        aliases: deriveAliases(canonicalName, input.aliases),
      });
    }

    if (merged.size === 0) {
      throw new DataUnavailableError('Commune reference data has no usable records', {
        received: inputs.length,
      });
    }

    // Canonical names claim their normalized form first so a derived alias of
    // another commune can never shadow a canonical name.
    const aliasIndex = new Map<string, string>();
    for (const canonicalName of merged.keys()) {
      claimAlias(aliasIndex, normalizeText(canonicalName), canonicalName);
    }

    const communes = new Map<string, CommuneRecord>();
    const entries: AliasEntry[] = [];
    let order = 0;

    for (const [canonicalName, { input, aliases }] of merged) {
      const normalizedAliases: string[] = [];
      for (const alias of aliases) {
        const key = normalizeText(alias);
        if (!key || normalizedAliases.includes(key)) {
          continue;
        }
        if (claimAlias(aliasIndex, key, canonicalName)) {
          normalizedAliases.push(key);
          entries.push({ commune: canonicalName, alias: key });
        }
      }

      communes.set(
        canonicalName,
        Object.freeze({
          canonicalName,
          region: input.region.trim(),
          aliases: aliases,
          normalizedAliases: Object.freeze(normalizedAliases),
          pharmacyCount: input.pharmacyCount,
          order: order++,
        })
      );
    }

    logger.info('Gazetteer built', {
      communes: communes.size,
      aliases: entries.length,
    });

    return new Gazetteer(communes, aliasIndex, entries);
  }

  get size(): number {
    return this.communes.size;
  }

  get aliasCount(): number {
    return this.entries.length;
  }

  /**
   * Exact lookup of an already-normalized string
   */
  exactLookup(normalized: string): string | undefined {
    if (!normalized) {
      return undefined;
    }
    return this.aliasIndex.get(normalized);
  }

  /**
   * Every (commune, normalized alias) pair, for index builders
   */
  allAliases(): readonly AliasEntry[] {
    return this.entries;
  }

  records(): CommuneRecord[] {
    return [...this.communes.values()];
  }

  /**
   * Find a commune by canonical name or by any of its spellings
   */
  getCommune(name: string): CommuneRecord | undefined {
    const direct = this.communes.get(name);
    if (direct) {
      return direct;
    }
    const canonical = this.exactLookup(normalizeText(name));
    return canonical ? this.communes.get(canonical) : undefined;
  }

  /**
   * Position of a commune in the reference data (used to break score ties)
   */
  orderOf(commune: string): number {
    return this.communes.get(commune)?.order ?? Number.MAX_SAFE_INTEGER;
  }

  /**
   * Canonical names, optionally restricted to one region (accent and case insensitive)
   */
  listCommunes(region?: string): string[] {
    const wanted = region ? normalizeText(region) : undefined;
    return this.records()
      .filter(record => !wanted || normalizeText(record.region) === wanted)
      .map(record => record.canonicalName);
  }

  regions(): string[] {
    return [...new Set(this.records().map(record => record.region))];
  }

  /**
   * Communes with the most pharmacies first; reference order breaks ties
   */
  mostCommon(limit: number): string[] {
    return this.records()
      .sort((a, b) => (b.pharmacyCount ?? 0) - (a.pharmacyCount ?? 0) || a.order - b.order)
      .slice(0, limit)
      .map(record => record.canonicalName);
  }

  /**
   * First names in reference order, used to ground LLM prompts
   */
  sample(limit: number): string[] {
    return this.records()
      .slice(0, limit)
      .map(record => record.canonicalName);
  }
}

function claimAlias(index: Map<string, string>, key: string, canonicalName: string): boolean {
  const owner = index.get(key);
  if (owner === undefined) {
    index.set(key, canonicalName);
    return true;
  }
  if (owner !== canonicalName) {
    logger.warn('Alias already belongs to another commune', {
      alias: key,
      owner,
      rejected: canonicalName,
    });
    return false;
  }
  return true;
}

