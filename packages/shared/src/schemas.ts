// =============================================================================
// @daybrief/shared: Zod schemas for every record crossing a boundary
// =============================================================================
// Article service records, profile store lines, model responses, and trigger
// inputs are validated here so that downstream stages can trust their input.
// Model output gets a strict and a lenient schema: the lenient one fills
// defaults for fields the model tends to drop.
// =============================================================================

import { z } from "zod";

// ---------------------------------------------------------------------------
// Reusable field schemas
// ---------------------------------------------------------------------------

/** "HH:MM", hour 0-23 (one or two digits), minute 00-59 */
const briefingTimeSchema = z
  .string()
  .regex(
    /^([01]?\d|2[0-3]):[0-5]\d$/,
    "Briefing time must use HH:MM format",
  );

const relevanceSchema = z.number().min(0).max(1);

// ---------------------------------------------------------------------------
// Article service
// ---------------------------------------------------------------------------

export const ArticleRecordSchema = z.object({
  source: z.string().min(1),
  url: z.string().min(1),
  title: z.string().default(""),
  text: z.string().default(""),
  published_at: z.string().nullish(),
});
export type ArticleRecord = z.infer<typeof ArticleRecordSchema>;

/** The service answers either with a bare array or `{ articles: [...] }`. */
export const ArticleListResponseSchema = z.union([
  z.array(z.unknown()),
  z.object({ articles: z.array(z.unknown()) }).transform((r) => r.articles),
]);

// ---------------------------------------------------------------------------
// Profile store (JSONL, snake_case on disk)
// ---------------------------------------------------------------------------

export const UserProfileRecordSchema = z.object({
  version: z.string().default("1.0"),
  email: z.string().email(),
  name: z.string().nullish(),
  briefing_time: briefingTimeSchema,
  topics: z.array(z.string().min(1)).min(1, "At least one topic is required"),
  created_at: z.string().min(1),
});
export type UserProfileRecord = z.infer<typeof UserProfileRecordSchema>;

// ---------------------------------------------------------------------------
// Model responses
// ---------------------------------------------------------------------------

export const SiteSummaryItemSchema = z.object({
  title: z.string().min(1),
  url: z.string().min(1),
  summary: z.string().min(1),
  relevance: relevanceSchema,
  keywords: z.array(z.string()).min(1),
});
export type SiteSummaryItem = z.infer<typeof SiteSummaryItemSchema>;

export const SiteSummaryItemLenientSchema = z.object({
  title: z.string().default(""),
  url: z.string().default(""),
  summary: z.string().min(1),
  relevance: z.coerce
    .number()
    .catch(0.5)
    .transform((n) => Math.min(1, Math.max(0, n))),
  keywords: z.array(z.coerce.string()).catch([]),
});

export const Top5ItemSchema = z.object({
  rank: z.coerce.number().int().optional(),
  title: z.string().optional(),
  url: z.string().min(1),
  summary: z.string().optional(),
  why_selected: z.string().optional(),
});
export type Top5Item = z.infer<typeof Top5ItemSchema>;

export const Top5ResponseSchema = z.object({
  top_5: z.array(z.unknown()),
});

export const DeepDiveItemSchema = z.object({
  topic: z.string().min(1),
  hook: z.string().default(""),
  analysis: z.string().min(1),
  related_articles: z.array(z.string()).catch([]),
});
export type DeepDiveItem = z.infer<typeof DeepDiveItemSchema>;

export const DeepDivesResponseSchema = z.object({
  deep_dives: z.array(z.unknown()),
});

// ---------------------------------------------------------------------------
// Trigger inputs (HTTP body / MCP tool arguments)
// ---------------------------------------------------------------------------

export const GenerateRequestInput = z.object({
  email: z.string().email().optional(),
  send_email: z.boolean().default(true),
});
export type GenerateRequestInput = z.infer<typeof GenerateRequestInput>;

export const PreviewInput = z.object({
  email: z.string().email(),
});
export type PreviewInput = z.infer<typeof PreviewInput>;
