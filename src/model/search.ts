/**
 * Search query and result model
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { RoleSchema, type Conversation, type Role } from './schemas.js';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

const DateOnlySchema = z
  .string()
  .regex(DATE_ONLY, 'Expected a date in YYYY-MM-DD format')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
  }, 'Not a valid calendar date');

const TermListSchema = z
  .array(z.string())
  .default([])
  .transform((terms) => terms.map((t) => t.trim()).filter((t) => t.length > 0));

export const MatchModeSchema = z.enum(['all', 'any']);
export type MatchMode = z.infer<typeof MatchModeSchema>;

export const SortFieldSchema = z.enum(['score', 'date', 'title', 'messages']);
export type SortField = z.infer<typeof SortFieldSchema>;

export const SortOrderSchema = z.enum(['asc', 'desc']);
export type SortOrder = z.infer<typeof SortOrderSchema>;

export const SearchQuerySchema = z
  .object({
    keywords: TermListSchema,
    phrases: TermListSchema,
    excludeKeywords: TermListSchema,
    titleFilter: z
      .string()
      .optional()
      .transform((value) => (value && value.trim().length > 0 ? value : undefined)),
    fromDate: DateOnlySchema.optional(),
    toDate: DateOnlySchema.optional(),
    minMessages: z.number().int().min(0).optional(),
    maxMessages: z.number().int().min(0).optional(),
    roleFilter: RoleSchema.optional(),
    matchMode: MatchModeSchema.default('any'),
    sortBy: SortFieldSchema.default('score'),
    sortOrder: SortOrderSchema.default('desc'),
    limit: z.number().int().positive().optional(),
  })
  .strict()
  .superRefine((query, ctx) => {
    if (query.fromDate && query.toDate && query.fromDate > query.toDate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['fromDate'],
        message: `fromDate (${query.fromDate}) is after toDate (${query.toDate})`,
      });
    }
    if (
      query.minMessages !== undefined &&
      query.maxMessages !== undefined &&
      query.minMessages > query.maxMessages
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minMessages'],
        message: `minMessages (${query.minMessages}) is greater than maxMessages (${query.maxMessages})`,
      });
    }
  });

export type SearchQueryInput = z.input<typeof SearchQuerySchema>;

/**
 * Validated, immutable search query
 */
export interface SearchQuery {
  readonly keywords: readonly string[];
  readonly phrases: readonly string[];
  readonly excludeKeywords: readonly string[];
  readonly titleFilter?: string;
  /** Inclusive, YYYY-MM-DD, compared against the UTC creation date */
  readonly fromDate?: string;
  readonly toDate?: string;
  readonly minMessages?: number;
  readonly maxMessages?: number;
  /** Restrict keyword matching and scoring to messages of this role */
  readonly roleFilter?: Role;
  readonly matchMode: MatchMode;
  readonly sortBy: SortField;
  readonly sortOrder: SortOrder;
  readonly limit?: number;
}

/**
 * Validate and freeze a search query
 * @throws ValidationError for out-of-range or contradictory bounds
 */
export function createSearchQuery(input: SearchQueryInput = {}): SearchQuery {
  return parseSearchQuery(input);
}

/**
 * Validate an untyped value (e.g. assembled from CLI flags) as a search query
 */
export function parseSearchQuery(input: unknown): SearchQuery {
  const result = SearchQuerySchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, 'Search query');
  }
  const query = result.data;
  Object.freeze(query.keywords);
  Object.freeze(query.phrases);
  Object.freeze(query.excludeKeywords);
  return Object.freeze(query);
}

export function hasKeywords(query: SearchQuery): boolean {
  return query.keywords.length > 0;
}

export function hasPhrases(query: SearchQuery): boolean {
  return query.phrases.length > 0;
}

/**
 * One ranked hit. Caller-owned once yielded.
 */
export interface SearchResult {
  readonly conversation: Conversation;
  /** Normalized relevance in [0, 1) */
  readonly score: number;
  readonly matchedMessageIds: readonly string[];
  readonly snippet: string;
}
