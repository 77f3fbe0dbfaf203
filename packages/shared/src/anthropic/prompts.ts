// =============================================================================
// @daybrief/shared: Prompt builders for the briefing stages
// =============================================================================
// One system/user pair per stage. The JSON shapes requested here are the
// contract the processor validates against (see schemas.ts).
// =============================================================================

import type { Article, ProcessedArticle } from "../types.js";
import type { ChatPrompt } from "./client.js";

/** Article body characters sent per article to the summarization stage. */
export const MAX_ARTICLE_TEXT_CHARS = 1500;

/** Processed articles per source fed to the landscape stage. */
export const LANDSCAPE_ARTICLES_PER_SOURCE = 3;

export function formatTopics(topics: string[]): string {
  return topics.join(", ");
}

// ---------------------------------------------------------------------------
// Per-source summarization
// ---------------------------------------------------------------------------

export function buildSiteSummaryPrompt(
  source: string,
  topics: string[],
  articles: Article[],
): ChatPrompt {
  const system = [
    `You are a news analyst working through today's articles from ${source}.`,
    "",
    `The reader follows these topics: ${formatTopics(topics)}`,
    "",
    "For every article:",
    "1. Summarize it in 2-3 sentences: what happened and why it matters.",
    "2. Score its relevance to the reader's topics from 0.0 to 1.0.",
    "3. Extract 3-5 keywords.",
    "",
    "Stick to facts and implications. Respond with JSON only.",
  ].join("\n");

  const payload = articles.map((a) => ({
    title: a.title,
    url: a.url,
    text: a.text.slice(0, MAX_ARTICLE_TEXT_CHARS),
  }));

  const user = [
    `Articles from ${source}:`,
    "",
    JSON.stringify(payload, null, 2),
    "",
    "Return a JSON array with one entry per article, copying title and url exactly:",
    '[{"title": "...", "url": "...", "summary": "2-3 sentences", "relevance": 0.85, "keywords": ["...", "...", "..."]}]',
  ].join("\n");

  return { system, user };
}

// ---------------------------------------------------------------------------
// Landscape
// ---------------------------------------------------------------------------

export function buildLandscapePrompt(
  topics: string[],
  bySource: Map<string, ProcessedArticle[]>,
  totalArticles: number,
): ChatPrompt {
  const system = [
    "You write the daily landscape section of a personal news briefing.",
    "",
    `The reader cares about: ${formatTopics(topics)}`,
    "",
    "Synthesize what is happening across today's sources into a short overview an executive can scan over coffee.",
    "Direct voice, present tense, no preamble.",
  ].join("\n");

  const sections: string[] = [];
  for (const [source, articles] of bySource) {
    sections.push(`## ${source}`);
    for (const a of articles) {
      sections.push(`- ${a.title}: ${a.summary}`);
    }
    sections.push("");
  }

  const user = [
    `Today's coverage from ${bySource.size} sources (${totalArticles} articles in total):`,
    "",
    ...sections,
    "Write 3-4 paragraphs of flowing prose, under 250 words:",
    "1. The biggest story or theme of the day.",
    "2. Other developments worth knowing.",
    "3. One emerging trend or undercurrent.",
    "No bullet points.",
  ].join("\n");

  return { system, user };
}

// ---------------------------------------------------------------------------
// Top 5
// ---------------------------------------------------------------------------

export function buildTop5Prompt(
  topics: string[],
  articles: ProcessedArticle[],
): ChatPrompt {
  const system = [
    "You pick the five most important articles of the day for one reader.",
    "",
    `The reader's interests: ${formatTopics(topics)}`,
    "",
    "Every pick must cover a DIFFERENT story. Never pick two articles about the same event, product or announcement.",
    "",
    "Rank by:",
    "1. Story diversity",
    "2. Relevance to the reader's topics",
    "3. Significance of the news",
    "4. Actionability for the reader",
    "5. Recency",
  ].join("\n");

  const list = articles
    .map(
      (a, i) =>
        `[${i + 1}] ${a.title} (relevance: ${a.relevance.toFixed(2)})\n    ${a.summary}\n    URL: ${a.url}`,
    )
    .join("\n");

  const user = [
    `Select the top 5 of these ${articles.length} articles:`,
    "",
    list,
    "",
    "Use the exact URLs listed above. Return JSON:",
    '{"top_5": [{"rank": 1, "title": "...", "url": "...", "summary": "...", "why_selected": "One sentence on why it matters to this reader"}]}',
  ].join("\n");

  return { system, user };
}

// ---------------------------------------------------------------------------
// Deep dives
// ---------------------------------------------------------------------------

export function buildDeepDivePrompt(
  topics: string[],
  articles: ProcessedArticle[],
  count: number,
): ChatPrompt {
  const system = [
    "You write deep-dive analysis on the hottest themes in today's news.",
    "",
    `The reader's interests: ${formatTopics(topics)}`,
    "",
    `Identify ${count} themes that are hot right now and connect to those interests.`,
    "Analyze rather than summarize: what it means, what to watch, what follows.",
  ].join("\n");

  const list = articles
    .map(
      (a) =>
        `- ${a.title}: ${a.summary} (keywords: ${a.keywords.join(", ")}) URL: ${a.url}`,
    )
    .join("\n");

  const user = [
    `Today's ${articles.length} articles:`,
    "",
    list,
    "",
    `Write ${count} deep dives. related_articles MUST contain only exact URLs from the list above.`,
    "Return JSON:",
    '{"deep_dives": [{"topic": "2-4 words", "hook": "One sentence that draws the reader in", "analysis": "150-200 words", "related_articles": ["exact URL"]}]}',
  ].join("\n");

  return { system, user };
}
