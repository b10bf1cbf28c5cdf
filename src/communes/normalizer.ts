/**
 * Text normalization shared by every matching strategy
 */

import type { NormalizedQuery } from './types.js';

/**
 * Fold Spanish text to its matching form: no diacritics, lower case,
 * apostrophes and periods dropped, other punctuation turned into spaces.
 * "O'Higgins" -> "ohiggins", "Viña del Mar" -> "vina del mar".
 */
export function normalizeText(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/['’`´.]/g, '')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Normalize a raw query. Total: empty or blank input yields an empty normalized string.
 */
export function normalize(text: string): NormalizedQuery {
  return Object.freeze({
    original: text,
    normalized: normalizeText(text),
  });
}

/**
 * Split normalized text into tokens
 */
export function tokenize(normalized: string): string[] {
  return normalized ? normalized.split(' ') : [];
}

/**
 * Remove diacritics but keep case, e.g. "Quilpué" -> "Quilpue"
 */
export function stripAccents(text: string): string {
  return text.normalize('NFD').replace(/\p{M}/gu, '');
}

/**
 * Capitalize the first letter of every word
 */
export function titleCase(text: string): string {
  return text
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
