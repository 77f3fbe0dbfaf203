// =============================================================================
// @daybrief/shared: LLM processing stages for a briefing
// =============================================================================
// Per-source summarization fan-out, then three synthesis calls over the
// merged result: landscape, top 5, deep dives. Every call runs under a
// timeout. Model output goes through two-layer Zod validation and is checked
// against the processed article set before it is used:
//   - top 5 picks must reference processed URLs and distinct stories
//   - deep-dive citations outside the processed URL set are removed
// Synthesis stages degrade to an empty or backfilled result instead of
// throwing; summarization throws only when every source failed.
// =============================================================================

import { z } from "zod";
import { mapSettledWithLimit } from "../concurrency.js";
import { normalizeUrl } from "../articles/fetcher.js";
import {
  LLMResponseParseError,
  LLMTimeoutError,
  SummarizationError,
  errorMessage,
} from "../errors.js";
import {
  DeepDiveItemSchema,
  DeepDivesResponseSchema,
  SiteSummaryItemLenientSchema,
  SiteSummaryItemSchema,
  Top5ItemSchema,
  Top5ResponseSchema,
} from "../schemas.js";
import type {
  Article,
  ArticlesBySource,
  DeepDive,
  Landscape,
  ProcessedArticle,
  ProcessedBySource,
} from "../types.js";
import type { ChatPrompt, LlmClient } from "./client.js";
import { parseJsonResponse } from "./json.js";
import {
  LANDSCAPE_ARTICLES_PER_SOURCE,
  buildDeepDivePrompt,
  buildLandscapePrompt,
  buildSiteSummaryPrompt,
  buildTop5Prompt,
} from "./prompts.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProcessorLogger {
  debug(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
}

export interface LlmProcessorOptions {
  timeoutMs: number;
  /** Max summarization requests in flight */
  concurrency: number;
  /** Requested deep dives; capped at MAX_DEEP_DIVES */
  deepDiveCount: number;
  logger: ProcessorLogger;
}

export interface LlmProcessor {
  processAllSitesParallel(
    articlesBySource: ArticlesBySource,
    topics: string[],
  ): Promise<ProcessedArticle[]>;
  generateLandscape(
    processedBySource: ProcessedBySource,
    topics: string[],
    totalCount: number,
  ): Promise<Landscape>;
  selectTop5(
    processed: ProcessedArticle[],
    topics: string[],
  ): Promise<ProcessedArticle[]>;
  generateDeepDives(
    processed: ProcessedArticle[],
    topics: string[],
  ): Promise<DeepDive[]>;
}

export const TOP_N = 5;
export const MAX_DEEP_DIVES = 3;
const MAX_KEYWORDS = 5;

// ---------------------------------------------------------------------------
// Story keys (top 5 diversity)
// ---------------------------------------------------------------------------

const STOPWORDS = new Set([
  "the", "and", "for", "with", "from", "that", "this", "into", "over",
  "after", "about", "its", "new", "how", "why", "what", "are", "was",
  "has", "have", "will", "says", "said", "than", "amid", "just", "now",
]);

/** Significant lower-cased title words, used to compare stories. */
export function storyTokens(title: string): Set<string> {
  return new Set(
    title
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]/gu, " ")
      .split(/\s+/)
      .filter((w) => w.length > 2 && !STOPWORDS.has(w)),
  );
}

const SAME_STORY_THRESHOLD = 0.6;

/**
 * Two articles tell the same story when their URLs normalize to the same
 * value or their title token sets overlap by at least 60% (Jaccard).
 */
export function isSameStory(
  a: Pick<ProcessedArticle, "url" | "title">,
  b: Pick<ProcessedArticle, "url" | "title">,
): boolean {
  if (normalizeUrl(a.url) === normalizeUrl(b.url)) return true;
  const ta = storyTokens(a.title);
  const tb = storyTokens(b.title);
  if (ta.size === 0 || tb.size === 0) return false;
  let shared = 0;
  for (const t of ta) if (tb.has(t)) shared++;
  return shared / (ta.size + tb.size - shared) >= SAME_STORY_THRESHOLD;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function groupProcessedBySource(
  processed: ProcessedArticle[],
): ProcessedBySource {
  const groups: ProcessedBySource = new Map();
  for (const article of processed) {
    const group = groups.get(article.source);
    if (group) group.push(article);
    else groups.set(article.source, [article]);
  }
  return groups;
}

/** Highest relevance first; equal relevance keeps input order. */
function byRelevance(articles: ProcessedArticle[]): ProcessedArticle[] {
  return articles
    .map((article, index) => ({ article, index }))
    .sort((a, b) => b.article.relevance - a.article.relevance || a.index - b.index)
    .map(({ article }) => article);
}

function distinctKeywords(keywords: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of keywords) {
    const keyword = raw.trim();
    const key = keyword.toLowerCase();
    if (!keyword || seen.has(key)) continue;
    seen.add(key);
    result.push(keyword);
  }
  return result.slice(0, MAX_KEYWORDS);
}

function expectShape<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  raw: string,
  what: string,
): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new LLMResponseParseError(
      `${what} response has an unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      raw,
    );
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createLlmProcessor(
  llm: LlmClient,
  options: LlmProcessorOptions,
): LlmProcessor {
  const { logger } = options;
  const deepDiveLimit = Math.min(MAX_DEEP_DIVES, options.deepDiveCount);

  async function complete(prompt: ChatPrompt): Promise<string> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new LLMTimeoutError(options.timeoutMs));
      }, options.timeoutMs);
    });

    try {
      return await Promise.race([
        llm.complete(prompt, { signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  // -------------------------------------------------------------------------
  // Per-source summarization
  // -------------------------------------------------------------------------

  async function processSource(
    source: string,
    articles: Article[],
    topics: string[],
  ): Promise<ProcessedArticle[]> {
    const raw = await complete(buildSiteSummaryPrompt(source, topics, articles));
    const items = expectShape(z.array(z.unknown()), parseJsonResponse(raw), raw, source);

    const byUrl = new Map(articles.map((a) => [normalizeUrl(a.url), a] as const));
    const byTitle = new Map(
      articles
        .filter((a) => a.title.trim() !== "")
        .map((a) => [a.title.trim().toLowerCase(), a] as const),
    );
    const emitted = new Set<string>();
    const processed: ProcessedArticle[] = [];

    items.forEach((item, i) => {
      const strict = SiteSummaryItemSchema.safeParse(item);
      const parsed = strict.success
        ? strict.data
        : SiteSummaryItemLenientSchema.safeParse(item).data;
      if (!parsed) {
        logger.warn("Skipping summary item that failed validation", { source, index: i });
        return;
      }

      const urlKey = normalizeUrl(parsed.url);
      const titleKey = parsed.title.trim().toLowerCase();
      const article =
        (urlKey ? byUrl.get(urlKey) : undefined) ??
        (titleKey ? byTitle.get(titleKey) : undefined);
      if (!article) {
        logger.warn("Skipping summary item that matches no fetched article", {
          source,
          index: i,
          url: parsed.url,
        });
        return;
      }

      const key = normalizeUrl(article.url);
      if (emitted.has(key)) return;
      emitted.add(key);

      processed.push({
        source,
        url: article.url,
        title: article.title || parsed.title,
        summary: parsed.summary.trim(),
        relevance: Math.min(1, Math.max(0, parsed.relevance)),
        keywords: distinctKeywords(parsed.keywords),
      });
    });

    return processed;
  }

  return {
    async processAllSitesParallel(articlesBySource, topics) {
      const entries = [...articlesBySource.entries()];
      if (entries.length === 0) return [];

      const settled = await mapSettledWithLimit(
        entries,
        options.concurrency,
        ([source, articles]) => processSource(source, articles, topics),
      );

      const processed: ProcessedArticle[] = [];
      const failures: Array<{ source: string; error: string }> = [];

      settled.forEach((result, i) => {
        const source = entries[i][0];
        if (result.status === "fulfilled") {
          logger.debug("Source summarized", { source, articles: result.value.length });
          processed.push(...result.value);
        } else {
          const error = errorMessage(result.reason);
          logger.warn("Source summarization failed; skipping source", { source, error });
          failures.push({ source, error });
        }
      });

      if (failures.length === entries.length) {
        throw new SummarizationError(failures);
      }
      return processed;
    },

    async generateLandscape(processedBySource, topics, totalCount) {
      if (processedBySource.size === 0) return { content: "" };

      const top: ProcessedBySource = new Map();
      for (const [source, articles] of processedBySource) {
        top.set(source, byRelevance(articles).slice(0, LANDSCAPE_ARTICLES_PER_SOURCE));
      }

      try {
        const raw = await complete(buildLandscapePrompt(topics, top, totalCount));
        return { content: raw.trim() };
      } catch (err) {
        logger.warn("Landscape generation failed", { error: errorMessage(err) });
        return { content: "" };
      }
    },

    async selectTop5(processed, topics) {
      const target = Math.min(TOP_N, processed.length);
      if (target === 0) return [];

      const byUrl = new Map<string, ProcessedArticle>();
      for (const a of processed) {
        const key = normalizeUrl(a.url);
        if (!byUrl.has(key)) byUrl.set(key, a);
      }

      // Model picks, in the model's order, restricted to processed URLs
      const picks: ProcessedArticle[] = [];
      try {
        const raw = await complete(buildTop5Prompt(topics, processed));
        const response = expectShape(Top5ResponseSchema, parseJsonResponse(raw), raw, "Top 5");
        for (const item of response.top_5) {
          const parsed = Top5ItemSchema.safeParse(item);
          if (!parsed.success) continue;
          const article = byUrl.get(normalizeUrl(parsed.data.url));
          if (!article) {
            logger.warn("Top 5 pick references an unknown URL", { url: parsed.data.url });
            continue;
          }
          picks.push({ ...article, whySelected: parsed.data.why_selected });
        }
      } catch (err) {
        logger.warn("Top 5 selection failed; ranking by relevance", {
          error: errorMessage(err),
        });
      }

      const selected: ProcessedArticle[] = [];
      const isTaken = (a: ProcessedArticle) =>
        selected.some((s) => normalizeUrl(s.url) === normalizeUrl(a.url));
      const isRepeat = (a: ProcessedArticle) => selected.some((s) => isSameStory(s, a));

      for (const pick of picks) {
        if (selected.length === target) break;
        if (isRepeat(pick)) {
          logger.debug("Dropping near-duplicate top 5 pick", { url: pick.url });
          continue;
        }
        selected.push(pick);
      }

      // Backfill by relevance: distinct stories first, then anything left
      const pool = byRelevance(processed);
      for (const candidate of pool) {
        if (selected.length === target) break;
        if (!isRepeat(candidate)) selected.push(candidate);
      }
      for (const candidate of pool) {
        if (selected.length === target) break;
        if (!isTaken(candidate)) selected.push(candidate);
      }

      return selected.map((a, i) => ({ ...a, rank: i + 1 }));
    },

    async generateDeepDives(processed, topics) {
      if (processed.length === 0) return [];

      const knownUrls = new Map<string, string>();
      for (const a of processed) {
        const key = normalizeUrl(a.url);
        if (!knownUrls.has(key)) knownUrls.set(key, a.url);
      }

      let items: unknown[];
      try {
        const raw = await complete(buildDeepDivePrompt(topics, processed, deepDiveLimit));
        items = expectShape(
          DeepDivesResponseSchema,
          parseJsonResponse(raw),
          raw,
          "Deep dive",
        ).deep_dives;
      } catch (err) {
        logger.warn("Deep dive generation failed", { error: errorMessage(err) });
        return [];
      }

      const dives: DeepDive[] = [];
      for (const item of items) {
        if (dives.length === deepDiveLimit) break;
        const parsed = DeepDiveItemSchema.safeParse(item);
        if (!parsed.success) continue;

        const related: string[] = [];
        for (const cited of parsed.data.related_articles) {
          const url = knownUrls.get(normalizeUrl(cited));
          if (url === undefined) {
            logger.warn("Removing deep-dive citation outside the processed set", {
              topic: parsed.data.topic,
              url: cited,
            });
            continue;
          }
          if (!related.includes(url)) related.push(url);
        }

        dives.push({
          topic: parsed.data.topic,
          hook: parsed.data.hook,
          analysis: parsed.data.analysis,
          relatedArticles: related,
        });
      }
      return dives;
    },
  };
}
