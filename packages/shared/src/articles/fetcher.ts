// =============================================================================
// @daybrief/shared: Article fetching, deduplication, filtering, grouping
// =============================================================================
// Talks to the external article service over HTTP and prepares its output for
// the LLM stages. The network client is a factory returning an interface; the
// list transforms are pure functions so both the orchestrator and the tests
// can call them directly.
// =============================================================================

import { FetchError } from "../errors.js";
import { ArticleListResponseSchema, ArticleRecordSchema } from "../schemas.js";
import type { Article, ArticlesBySource, HealthCheckResult } from "../types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ArticleFetcher {
  /** Retrieve every article published since the given day. */
  fetchArticles(since: Date): Promise<Article[]>;
  healthCheck(): Promise<HealthCheckResult>;
}

export interface ArticleFetcherOptions {
  baseUrl: string;
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
  /** Called once per record the service sent that failed validation. */
  onInvalidRecord?: (index: number, reason: string) => void;
}

const DEFAULT_TIMEOUT_MS = 30_000;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Day granularity the service expects for `?since=`: YYYY-MM-DD in UTC. */
export function formatSinceDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Dedup key: trimmed, lower-cased, trailing slashes removed. */
export function normalizeUrl(url: string): string {
  return url.trim().toLowerCase().replace(/\/+$/, "");
}

function parsePublishedAt(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Run a request and `read` its response under one deadline. The timer covers
 * the body as well as the headers, so a service that stalls mid-body still
 * settles with a FetchError.
 */
async function requestWithTimeout<T>(
  fetchImpl: typeof fetch,
  url: string,
  timeoutMs: number,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timedOut = () =>
    new FetchError(`Request to ${url} timed out after ${timeoutMs}ms`);

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(timedOut());
    }, timeoutMs);
  });

  async function attempt(): Promise<T> {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });
    } catch (err) {
      if (controller.signal.aborted) throw timedOut();
      throw new FetchError(
        `Article service unreachable: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
    return read(response);
  }

  try {
    return await Promise.race([attempt(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

async function readArticleList(response: Response, url: string): Promise<unknown> {
  if (!response.ok) {
    throw new FetchError(
      `Article service returned ${response.status} for ${url}`,
      { status: response.status },
    );
  }
  try {
    return await response.json();
  } catch (err) {
    throw new FetchError("Article service returned a non-JSON body", {
      status: response.status,
      cause: err,
    });
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createArticleFetcher(
  options: ArticleFetcherOptions,
): ArticleFetcher {
  const baseUrl = options.baseUrl.replace(/\/+$/, "");
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl = options.fetchImpl ?? fetch;

  return {
    async fetchArticles(since: Date): Promise<Article[]> {
      const url = `${baseUrl}/articles?since=${encodeURIComponent(formatSinceDate(since))}`;
      const body = await requestWithTimeout(fetchImpl, url, timeoutMs, (response) =>
        readArticleList(response, url),
      );

      const list = ArticleListResponseSchema.safeParse(body);
      if (!list.success) {
        throw new FetchError("Article service returned an unexpected shape", {
          cause: list.error,
        });
      }

      const articles: Article[] = [];
      list.data.forEach((raw, index) => {
        const record = ArticleRecordSchema.safeParse(raw);
        if (!record.success) {
          options.onInvalidRecord?.(index, record.error.message);
          return;
        }
        articles.push({
          source: record.data.source,
          url: record.data.url,
          title: record.data.title,
          text: record.data.text,
          publishedAt: parsePublishedAt(record.data.published_at),
        });
      });
      return articles;
    },

    async healthCheck(): Promise<HealthCheckResult> {
      const start = performance.now();
      try {
        const response = await requestWithTimeout(
          fetchImpl,
          `${baseUrl}/health`,
          Math.min(timeoutMs, 10_000),
          async (res) => res,
        );
        const latencyMs = performance.now() - start;
        if (!response.ok) {
          return {
            ok: false,
            latencyMs,
            error: `Article service returned ${response.status}`,
          };
        }
        return { ok: true, latencyMs };
      } catch (err) {
        return {
          ok: false,
          latencyMs: performance.now() - start,
          error: err instanceof Error ? err.message : String(err),
        };
      }
    },
  };
}

// ---------------------------------------------------------------------------
// List transforms
// ---------------------------------------------------------------------------

/**
 * Drop articles whose normalized URL was already seen. The first occurrence
 * wins and input order is kept.
 */
export function deduplicate(articles: Article[]): Article[] {
  const seen = new Set<string>();
  const result: Article[] = [];
  for (const article of articles) {
    const key = normalizeUrl(article.url);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(article);
  }
  return result;
}

/**
 * Keep articles published within `[now - hours, now]`, both ends inclusive.
 * Articles without a usable timestamp are dropped.
 */
export function filterRecent(
  articles: Article[],
  hours: number,
  now: Date = new Date(),
): Article[] {
  const end = now.getTime();
  const start = end - hours * 60 * 60 * 1000;
  return articles.filter((article) => {
    if (article.publishedAt === null) return false;
    const t = article.publishedAt.getTime();
    return t >= start && t <= end;
  });
}

/** Partition articles by source; sources keep order of first appearance. */
export function groupBySource(articles: Article[]): ArticlesBySource {
  const groups: ArticlesBySource = new Map();
  for (const article of articles) {
    const group = groups.get(article.source);
    if (group) {
      group.push(article);
    } else {
      groups.set(article.source, [article]);
    }
  }
  return groups;
}
