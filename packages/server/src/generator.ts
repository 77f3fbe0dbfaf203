// =============================================================================
// @daybrief/server: Briefing generator (per-user pipeline orchestration)
// =============================================================================
// Runs every registered user through:
//   fetch → dedupe → filter → group → process → synthesize → compose → send
// One user's failure is captured in its RunResult and never stops the users
// after it. A run holds the process-wide RunLock for its whole duration; the
// article fetch is made once per run and shared by all of its users.
// =============================================================================

import {
  type Article,
  type ArticleFetcher,
  type Briefing,
  type LlmProcessor,
  type PipelineStage,
  type ProfileStore,
  type RunResult,
  type RunSummary,
  type UserProfile,
  BriefingError,
  UserNotFoundError,
  UserPipelineError,
  deduplicate,
  errorMessage,
  filterRecent,
  groupBySource,
  groupProcessedBySource,
} from "@daybrief/shared";
import { composeBriefingEmail, type EmailDocument } from "./email/composer.js";
import type { EmailSender } from "./email/sender.js";
import {
  type Logger,
  createRunId,
  hashEmail,
  logExternalCall,
  logStage,
} from "./logger.js";
import { RunLock } from "./run-lock.js";
import type { TemplateEngine } from "./templates.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const BRIEFING_TEMPLATE = "briefing";

export interface GeneratorDependencies {
  fetcher: ArticleFetcher;
  profiles: ProfileStore;
  processor: LlmProcessor;
  sender: EmailSender;
  templates: TemplateEngine;
  logger: Logger;
  lookbackHours: number;
  lock?: RunLock;
  /** Clock; injected by tests */
  now?: () => Date;
}

export interface RunOptions {
  /** Restrict the run to this user */
  email?: string;
  /** Compose without sending when false. Default true. */
  sendEmail?: boolean;
}

export interface BriefingOutput {
  user: UserProfile;
  briefing: Briefing;
  document: EmailDocument;
}

export interface GeneratorStatus {
  running: boolean;
  runningSince: string | null;
  lastRun: RunSummary | null;
}

export interface BriefingGenerator {
  run(options?: RunOptions): Promise<RunSummary>;
  /** Build and compose without sending. Fetches when `articles` is omitted. */
  buildBriefing(user: UserProfile, articles?: Article[]): Promise<BriefingOutput>;
  preview(email: string): Promise<BriefingOutput>;
  status(): GeneratorStatus;
}

interface RunContext {
  runId: string;
  now: Date;
  articles(): Promise<Article[]>;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createBriefingGenerator(
  deps: GeneratorDependencies,
): BriefingGenerator {
  const { fetcher, profiles, processor, sender, templates, logger } = deps;
  const lock = deps.lock ?? new RunLock();
  const clock = deps.now ?? (() => new Date());
  let lastRun: RunSummary | null = null;

  function createRunContext(preloaded?: Article[]): RunContext {
    const runId = createRunId();
    const now = clock();
    let articles: Promise<Article[]> | undefined = preloaded
      ? Promise.resolve(preloaded)
      : undefined;

    async function fetchOnce(): Promise<Article[]> {
      const since = new Date(now.getTime() - deps.lookbackHours * 60 * 60 * 1000);
      const start = performance.now();
      try {
        const result = await fetcher.fetchArticles(since);
        logExternalCall(logger, "article-source", "fetch_articles", performance.now() - start);
        return result;
      } catch (err) {
        logExternalCall(
          logger,
          "article-source",
          "fetch_articles",
          performance.now() - start,
          errorMessage(err),
        );
        throw err;
      }
    }

    return {
      runId,
      now,
      articles() {
        articles ??= fetchOnce();
        return articles;
      },
    };
  }

  async function runPipeline(
    user: UserProfile,
    ctx: RunContext,
    send: boolean,
    log: Logger,
  ): Promise<BriefingOutput> {
    let stage: PipelineStage = "fetch";
    let stageStart = performance.now();
    const enter = (next: PipelineStage, data?: Record<string, unknown>) => {
      logStage(log, stage, performance.now() - stageStart, data);
      stage = next;
      stageStart = performance.now();
    };

    try {
      const fetched = await ctx.articles();
      enter("dedupe", { articles: fetched.length });

      const unique = deduplicate(fetched);
      enter("filter", { articles: unique.length });

      const recent = filterRecent(unique, deps.lookbackHours, ctx.now);
      enter("group", { articles: recent.length });

      const bySource = groupBySource(recent);
      enter("process", { sources: bySource.size });

      const processed = await processor.processAllSitesParallel(bySource, user.topics);
      if (processed.length === 0) {
        throw new BriefingError("No articles could be processed");
      }
      enter("synthesize", { processed: processed.length });

      const [landscape, top5, deepDives] = await Promise.all([
        processor.generateLandscape(
          groupProcessedBySource(processed),
          user.topics,
          recent.length,
        ),
        processor.selectTop5(processed, user.topics),
        processor.generateDeepDives(processed, user.topics),
      ]);
      const briefing: Briefing = {
        landscape,
        top5,
        deepDives,
        articlesAnalyzed: processed.length,
        sourcesCount: bySource.size,
      };
      enter("compose", { top5: top5.length, deepDives: deepDives.length });

      const document = composeBriefingEmail(
        templates.get(BRIEFING_TEMPLATE),
        user,
        briefing,
        ctx.now,
      );

      if (send) {
        enter("send");
        const start = performance.now();
        const result = await sender.send(user, document);
        logExternalCall(log, "resend", "send", performance.now() - start, result.error);
        if (!result.ok) {
          throw new BriefingError(`Email delivery failed: ${result.error ?? "unknown error"}`);
        }
      }
      logStage(log, stage, performance.now() - stageStart);

      return { user, briefing, document };
    } catch (err) {
      throw new UserPipelineError(user.email, stage, err);
    }
  }

  function buildBriefing(user: UserProfile, articles?: Article[]): Promise<BriefingOutput> {
    const ctx = createRunContext(articles);
    const log = logger.child({ runId: ctx.runId, user: hashEmail(user.email), preview: true });
    return runPipeline(user, ctx, false, log);
  }

  return {
    buildBriefing,

    async run(options: RunOptions = {}): Promise<RunSummary> {
      const send = options.sendEmail ?? true;

      return lock.runExclusive(async () => {
        const ctx = createRunContext();
        const log = logger.child({ runId: ctx.runId });
        const startedAt = new Date().toISOString();

        let users = await profiles.loadProfiles();
        if (options.email !== undefined) {
          const key = options.email.trim().toLowerCase();
          users = users.filter((u) => u.email.trim().toLowerCase() === key);
          if (users.length === 0) throw new UserNotFoundError(options.email);
        }

        log.info("Briefing run started", { users: users.length, sendEmail: send });

        const results: RunResult[] = [];
        for (const user of users) {
          const userLog = log.child({ user: hashEmail(user.email) });
          try {
            await runPipeline(user, ctx, send, userLog);
            results.push({ userEmail: user.email, status: "success" });
            userLog.info("Briefing generated", { sent: send });
          } catch (err) {
            const failedStage = err instanceof UserPipelineError ? err.stage : undefined;
            results.push({
              userEmail: user.email,
              status: "failure",
              error: errorMessage(err),
              failedStage,
            });
            userLog.error("Briefing failed", { stage: failedStage, error: errorMessage(err) });
          }
        }

        const successful = results.filter((r) => r.status === "success").length;
        const summary: RunSummary = {
          startedAt,
          finishedAt: new Date().toISOString(),
          usersProcessed: results.length,
          successful,
          failed: results.length - successful,
          results,
        };
        lastRun = summary;

        log.info("Briefing run finished", {
          users: summary.usersProcessed,
          successful: summary.successful,
          failed: summary.failed,
        });
        return summary;
      });
    },

    async preview(email: string): Promise<BriefingOutput> {
      const user = await profiles.findByEmail(email);
      if (!user) throw new UserNotFoundError(email);
      return buildBriefing(user);
    },

    status(): GeneratorStatus {
      return {
        running: lock.isLocked,
        runningSince: lock.lockedSince?.toISOString() ?? null,
        lastRun,
      };
    },
  };
}
