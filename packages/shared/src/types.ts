// =============================================================================
// @daybrief/shared: Record types for the briefing pipeline
// =============================================================================
// Covers the records passed between pipeline stages (articles, processed
// articles, synthesis artifacts), the read-only user profile, and the
// per-user / per-run result types.
// =============================================================================

// ---------------------------------------------------------------------------
// Enums & Union Types
// ---------------------------------------------------------------------------

/** Stages of the per-user pipeline, in execution order */
export type PipelineStage =
  | "fetch"
  | "dedupe"
  | "filter"
  | "group"
  | "process"
  | "synthesize"
  | "compose"
  | "send";

/** Terminal state of one user's pipeline */
export type RunStatus = "success" | "failure";

// ---------------------------------------------------------------------------
// Articles
// ---------------------------------------------------------------------------

/** Raw article as delivered by the article service. Never persisted. */
export interface Article {
  source: string;
  url: string;
  title: string;
  text: string;
  /** null when the service sent no timestamp or one that does not parse */
  publishedAt: Date | null;
}

/** Articles keyed by source name, in order of first appearance. */
export type ArticlesBySource = Map<string, Article[]>;

/** Output of the per-source summarization stage. */
export interface ProcessedArticle {
  source: string;
  url: string;
  title: string;
  summary: string;
  /** Topic relevance, clamped to [0, 1] */
  relevance: number;
  /** Distinct keywords, in the order the model gave them */
  keywords: string[];
  whySelected?: string;
  /** 1-based position in the top 5 */
  rank?: number;
}

export type ProcessedBySource = Map<string, ProcessedArticle[]>;

// ---------------------------------------------------------------------------
// Synthesis artifacts
// ---------------------------------------------------------------------------

export interface Landscape {
  content: string;
}

export interface DeepDive {
  topic: string;
  hook: string;
  analysis: string;
  /** URLs of processed articles backing the analysis, in cited order */
  relatedArticles: string[];
}

export interface Briefing {
  landscape: Landscape;
  top5: ProcessedArticle[];
  deepDives: DeepDive[];
  articlesAnalyzed: number;
  sourcesCount: number;
}

// ---------------------------------------------------------------------------
// Users
// ---------------------------------------------------------------------------

export interface UserProfile {
  version: string;
  email: string;
  name?: string;
  /** Preferred delivery time, "HH:MM" */
  briefingTime: string;
  topics: string[];
  /** ISO-8601 */
  createdAt: string;
}

// ---------------------------------------------------------------------------
// Run results
// ---------------------------------------------------------------------------

export interface RunResult {
  userEmail: string;
  status: RunStatus;
  error?: string;
  failedStage?: PipelineStage;
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  usersProcessed: number;
  successful: number;
  failed: number;
  results: RunResult[];
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface HealthCheckResult {
  ok: boolean;
  latencyMs: number;
  error?: string;
}
