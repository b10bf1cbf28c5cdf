/**
 * Zod schemas for reference data, LLM answers and caller options
 */

import { z } from 'zod';

/** One commune in the reference data file */
export const CommuneRecordSchema = z.object({
  canonical_name: z
    .string()
    .trim()
    .min(1, 'canonical_name must not be empty')
    .describe('Official commune name, e.g. "Quilpué"'),

  region: z.string().trim().min(1, 'region must not be empty').describe('Region the commune belongs to'),

  aliases: z
    .array(z.string())
    .optional()
    .describe('Extra spellings seen in the wild, on top of the derived ones'),

  pharmacy_count: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .describe('Pharmacies registered in the commune; orders cold-start suggestions'),
});

export type CommuneRecordInput = z.infer<typeof CommuneRecordSchema>;

/** Reference data file layout */
export const CommuneFileSchema = z.object({
  communes: z.array(CommuneRecordSchema).min(1, 'communes must not be empty'),
});

export type CommuneFile = z.infer<typeof CommuneFileSchema>;

/** Structured answer expected from the LLM location extractor */
export const LocationIntentResponseSchema = z.object({
  extracted_location: z
    .string()
    .describe('Commune or city named in the query, empty when there is none'),

  intent_type: z
    .enum(['pharmacy_search', 'location_query', 'general'])
    .describe('What the user is trying to do'),

  confidence: z.number().min(0).max(1).describe('Model confidence in the extraction'),

  reasoning: z.string().default('').describe('Short explanation, logged only'),
});

export type LocationIntentResponse = z.infer<typeof LocationIntentResponseSchema>;

export const ConfidenceThresholdSchema = z.number().min(0).max(1);

export const SuggestionLimitSchema = z.number().int().min(1).max(50);
