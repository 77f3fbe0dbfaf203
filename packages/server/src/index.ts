// =============================================================================
// @daybrief/server: Entry point
// =============================================================================
// Loads config, creates the Express + MCP server, starts the cron scheduler,
// and starts listening.
// =============================================================================

import { errorMessage } from "@daybrief/shared";
import { createApp } from "./server.js";
import { registerBriefingTools } from "./tools/briefing.js";
import { startScheduler } from "./scheduler.js";

const instance = createApp();
const { httpServer, deps, shutdown } = instance;

instance.addToolRegistrar(registerBriefingTools);
const { config, logger } = deps;

const scheduler = startScheduler(deps);

httpServer.keepAliveTimeout = 120_000;
httpServer.headersTimeout = 120_000;

httpServer.listen(config.PORT, "0.0.0.0", () => {
  logger.info("Daybrief server started", {
    port: config.PORT,
    host: "0.0.0.0",
    logLevel: config.LOG_LEVEL,
    corsOrigins: config.CORS_ORIGINS,
    rateLimitPerMin: config.RATE_LIMIT_PER_MIN,
    templates: deps.templates.names(),
  });
});

// Signal handlers registered here (not in createApp) so tests that create
// several apps do not accumulate listeners.
function handleShutdown() {
  scheduler.stop();
  shutdown()
    .then(() => process.exit(0))
    .catch((err) => {
      logger.error("Shutdown error", { error: errorMessage(err) });
      process.exit(1);
    });
}

process.once("SIGTERM", handleShutdown);
process.once("SIGINT", handleShutdown);

export type { ToolRegistrar, AppDependencies, AppInstance } from "./server.js";
export { createApp } from "./server.js";
