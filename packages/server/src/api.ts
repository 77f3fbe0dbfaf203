// =============================================================================
// @daybrief/server: Briefing REST API routes
// =============================================================================
// Express Router for triggering runs, previewing a user's briefing and
// listing registered users. Mounted behind auth + rate limiting for
// /generate; the read-only routes share the same auth.
// =============================================================================

import { Router, type Request, type Response } from "express";
import {
  type RunSummary,
  type UserProfile,
  FetchError,
  GenerateRequestInput,
  RunConflictError,
  UserNotFoundError,
  UserPipelineError,
  errorMessage,
} from "@daybrief/shared";
import type { AppDependencies } from "./server.js";

// ---------------------------------------------------------------------------
// Shared response shapes (also used by the MCP tools)
// ---------------------------------------------------------------------------

export interface UserView {
  email: string;
  name: string | null;
  topics: string[];
  briefing_time: string;
}

export function toUserView(user: UserProfile): UserView {
  return {
    email: user.email,
    name: user.name ?? null,
    topics: user.topics,
    briefing_time: user.briefingTime,
  };
}

export function summarizeRun(summary: RunSummary) {
  return {
    status: "completed" as const,
    message: `Generated briefings for ${summary.usersProcessed} users`,
    users_processed: summary.usersProcessed,
    successful: summary.successful,
    failed: summary.failed,
  };
}

/** True when there were users and every one of them failed fetching articles. */
export function allFailedOnFetch(summary: RunSummary): boolean {
  return (
    summary.results.length > 0 &&
    summary.results.every((r) => r.failedStage === "fetch")
  );
}

/** HTTP status for an error raised while building a single preview. */
export function previewErrorStatus(err: unknown): number {
  if (err instanceof UserNotFoundError) return 404;
  if (err instanceof UserPipelineError) {
    if (err.cause instanceof FetchError) return 502;
    if (err.stage === "process") return 422;
  }
  return 500;
}

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

export function createBriefingRouter(deps: AppDependencies): Router {
  const router = Router();
  const { generator, profiles, logger } = deps;

  // -------------------------------------------------------------------------
  // POST /generate: run the pipeline for every user (or one)
  // -------------------------------------------------------------------------
  router.post("/generate", async (req: Request, res: Response) => {
    const parsed = GenerateRequestInput.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({
        error: parsed.error.issues[0]?.message ?? "Invalid request body",
      });
      return;
    }

    try {
      const summary = await generator.run({
        email: parsed.data.email,
        sendEmail: parsed.data.send_email,
      });

      if (allFailedOnFetch(summary)) {
        res.status(503).json({
          error: "Article source unavailable",
          ...summarizeRun(summary),
        });
        return;
      }
      res.json(summarizeRun(summary));
    } catch (err) {
      if (err instanceof RunConflictError) {
        res.status(409).json({ error: err.message });
        return;
      }
      if (err instanceof UserNotFoundError) {
        res.status(404).json({ error: err.message });
        return;
      }
      logger.error("Briefing run failed", { error: errorMessage(err) });
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  // -------------------------------------------------------------------------
  // GET /preview/:email: rendered HTML briefing, nothing is sent
  // -------------------------------------------------------------------------
  router.get("/preview/:email", async (req: Request, res: Response) => {
    try {
      const { document } = await generator.preview(req.params.email ?? "");
      res.type("html").send(document.html);
    } catch (err) {
      const status = previewErrorStatus(err);
      if (status === 500) {
        logger.error("Preview failed", { error: errorMessage(err) });
      }
      res.status(status).json({ error: errorMessage(err) });
    }
  });

  // -------------------------------------------------------------------------
  // GET /users: registered profiles
  // -------------------------------------------------------------------------
  router.get("/users", async (_req: Request, res: Response) => {
    try {
      const users = await profiles.loadProfiles();
      res.json({ count: users.length, users: users.map(toUserView) });
    } catch (err) {
      logger.error("Loading profiles failed", { error: errorMessage(err) });
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  return router;
}
