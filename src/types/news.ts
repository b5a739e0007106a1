/**
 * NewsRelay — News Item Types
 *
 * Persisted records are validated per item on load; defaults for fields
 * missing from older records are applied here and nowhere else.
 */

import { z } from 'zod';
import { normalizePortalUrl } from '../feeds/url';

const IsoTimestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid timestamp' });

const nowIso = (): string => new Date().toISOString();

// ============================================================
// PORTAL (REFERENCE) ITEMS
// ============================================================

export const PortalArticleSchema = z.object({
  url: z.string().min(1),
  title: z.string().min(1),
  snippet: z
    .string()
    .nullish()
    .transform((v) => (v ? v : undefined)),
});
export type PortalArticle = z.infer<typeof PortalArticleSchema>;

export const ReferenceItemSchema = PortalArticleSchema.extend({
  url: z.string().min(1).transform(normalizePortalUrl),
  addedAt: IsoTimestampSchema.default(nowIso),
  /** Set once an aggregator item has been matched to this article. */
  inTargetFeed: z.boolean().default(false),
});
export type ReferenceItem = z.output<typeof ReferenceItemSchema>;

// ============================================================
// AGGREGATOR (CANDIDATE) ITEMS
// ============================================================

export const CandidateItemSchema = z.object({
  url: z.string().min(1),
  title: z.string().min(1),
});
export type CandidateItem = z.infer<typeof CandidateItemSchema>;

export const MatchTypeSchema = z.enum(['semantic', 'keyword']);
export type MatchType = z.infer<typeof MatchTypeSchema>;

export const MatchRecordSchema = z
  .object({
    url: z.string().min(1),
    title: z.string().min(1),
    addedAt: IsoTimestampSchema.default(nowIso),
    sourceUrl: z.string().min(1).optional(),
    sourceTitle: z.string().optional(),
    sourceSnippet: z
      .string()
      .nullish()
      .transform((v) => (v ? v : undefined)),
    matchType: MatchTypeSchema.optional(),
    similarityScore: z.number().min(0).max(1).optional(),
    commonWordCount: z.number().int().min(0).optional(),
    matchedKeywords: z.array(z.string()).default([]),
  })
  .transform((record) => {
    const matchType: MatchType = record.matchType ?? (record.sourceUrl ? 'semantic' : 'keyword');
    return { ...record, matchType };
  });
export type MatchRecord = z.output<typeof MatchRecordSchema>;
