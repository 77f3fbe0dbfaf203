// =============================================================================
// @daybrief/server: Cron scheduler for briefing runs
// =============================================================================
// Wraps node-cron to run the briefing pipeline on CRON_GENERATE. CRON_ENABLED
// is the kill switch. A tick that finds a run already in progress is logged
// and skipped. Returns a handle with stop() for graceful shutdown.
// =============================================================================

import cron, { type ScheduledTask } from "node-cron";
import { RunConflictError, errorMessage } from "@daybrief/shared";
import type { AppDependencies } from "./server.js";

export interface SchedulerHandle {
  stop(): void;
}

export function startScheduler(
  deps: Pick<AppDependencies, "config" | "logger" | "generator">,
): SchedulerHandle {
  const { config, logger, generator } = deps;
  const tasks: ScheduledTask[] = [];

  if (!config.CRON_ENABLED) {
    logger.info("Cron scheduler disabled (CRON_ENABLED=false)");
    return { stop() {} };
  }

  if (!cron.validate(config.CRON_GENERATE)) {
    throw new Error(`Invalid CRON_GENERATE expression: ${config.CRON_GENERATE}`);
  }

  function scheduleJob(
    name: string,
    schedule: string,
    job: () => Promise<Record<string, unknown>>,
  ): void {
    const task = cron.schedule(schedule, async () => {
      const start = performance.now();
      logger.info(`Cron job starting: ${name}`);
      try {
        const result = await job();
        const durationMs = Math.round(performance.now() - start);
        logger.info(`Cron job completed: ${name}`, { durationMs, ...result });
      } catch (err) {
        const durationMs = Math.round(performance.now() - start);
        if (err instanceof RunConflictError) {
          logger.warn(`Cron job skipped: ${name}`, { durationMs, reason: err.message });
          return;
        }
        logger.error(`Cron job failed: ${name}`, {
          durationMs,
          error: errorMessage(err),
        });
      }
    });
    tasks.push(task);
  }

  scheduleJob("generate_briefings", config.CRON_GENERATE, async () => {
    const summary = await generator.run();
    return {
      usersProcessed: summary.usersProcessed,
      successful: summary.successful,
      failed: summary.failed,
    };
  });

  logger.info("Cron scheduler started", {
    schedules: { generate_briefings: config.CRON_GENERATE },
  });

  return {
    stop() {
      for (const t of tasks) t.stop();
      logger.info("Cron scheduler stopped");
    },
  };
}
