// =============================================================================
// @daybrief/server: App factory with Express routes + MCP Streamable HTTP
// =============================================================================
// Creates an Express application with a health check, the briefing REST API,
// authentication, rate limiting, and a stateless MCP Streamable HTTP
// endpoint. Every collaborator is built from config unless the caller passes
// it in, so tests can swap the article source, LLM and email sender for fakes.
// =============================================================================

import { createServer, type Server as HttpServer } from "node:http";
import express, {
  type Express,
  type Request,
  type Response,
  type RequestHandler,
} from "express";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
  type ArticleFetcher,
  type Config,
  type LlmClient,
  type LlmProcessor,
  type ProfileStore,
  createAnthropicClient,
  createArticleFetcher,
  createLlmClient,
  createLlmProcessor,
  createProfileStore,
  errorMessage,
  loadConfig,
} from "@daybrief/shared";
import { createLogger, type Logger } from "./logger.js";
import { createAuthMiddleware, createRateLimiter } from "./auth.js";
import { createBriefingRouter } from "./api.js";
import { createEmailSender, type EmailSender } from "./email/sender.js";
import {
  createBriefingGenerator,
  type BriefingGenerator,
} from "./generator.js";
import { createTemplateEngine, type TemplateEngine } from "./templates.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Callback that registers MCP tools on a per-request McpServer instance.
 */
export type ToolRegistrar = (server: McpServer, deps: AppDependencies) => void;

/**
 * Shared dependencies for routes, tools, the scheduler and the CLI.
 */
export interface AppDependencies {
  config: Config;
  logger: Logger;
  fetcher: ArticleFetcher;
  profiles: ProfileStore;
  llm: LlmClient;
  processor: LlmProcessor;
  sender: EmailSender;
  templates: TemplateEngine;
  generator: BriefingGenerator;
}

/**
 * Return value of createApp: gives callers access to the HTTP server,
 * Express app, dependencies, and a shutdown function.
 */
export interface AppInstance {
  app: Express;
  httpServer: HttpServer;
  deps: AppDependencies;
  /** Register a tool registrar that will be called for every MCP request. */
  addToolRegistrar: (registrar: ToolRegistrar) => void;
  /** Graceful shutdown: stop the rate limiter and close the HTTP server. */
  shutdown: () => Promise<void>;
}

// ---------------------------------------------------------------------------
// Dependency wiring
// ---------------------------------------------------------------------------

export function createDependencies(
  env?: Record<string, string | undefined>,
  overrides: Partial<AppDependencies> = {},
): AppDependencies {
  const config = overrides.config ?? loadConfig(env);
  const logger = overrides.logger ?? createLogger({ level: config.LOG_LEVEL });

  const fetcher =
    overrides.fetcher ??
    createArticleFetcher({
      baseUrl: config.ARTICLE_SERVICE_URL,
      timeoutMs: config.FETCH_TIMEOUT_MS,
      onInvalidRecord: (index, reason) =>
        logger.warn("Skipping invalid article record", { index, reason }),
    });

  const profiles =
    overrides.profiles ??
    createProfileStore(config.PROFILES_PATH, {
      onInvalidLine: (line, reason) =>
        logger.warn("Skipping invalid profile line", { line, reason }),
    });

  const llm =
    overrides.llm ??
    createLlmClient(createAnthropicClient(config.ANTHROPIC_API_KEY), {
      model: config.LLM_MODEL,
      maxTokens: config.LLM_MAX_TOKENS,
      timeoutMs: config.LLM_TIMEOUT_MS,
    });

  const processor =
    overrides.processor ??
    createLlmProcessor(llm, {
      timeoutMs: config.LLM_TIMEOUT_MS,
      concurrency: config.LLM_CONCURRENCY,
      deepDiveCount: config.DEEP_DIVE_COUNT,
      logger: logger.child({ component: "llm" }),
    });

  const sender =
    overrides.sender ??
    createEmailSender({ apiKey: config.RESEND_API_KEY, from: config.EMAIL_FROM });

  const templates = overrides.templates ?? createTemplateEngine(config.TEMPLATE_DIR);

  const generator =
    overrides.generator ??
    createBriefingGenerator({
      fetcher,
      profiles,
      processor,
      sender,
      templates,
      logger,
      lookbackHours: config.LOOKBACK_HOURS,
    });

  return {
    config,
    logger,
    fetcher,
    profiles,
    llm,
    processor,
    sender,
    templates,
    generator,
  };
}

// ---------------------------------------------------------------------------
// CORS middleware (inline, no external dependency)
// ---------------------------------------------------------------------------

function createCorsMiddleware(origins: string): RequestHandler {
  return (req: Request, res: Response, next) => {
    res.setHeader("Access-Control-Allow-Origin", origins);
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader(
      "Access-Control-Allow-Headers",
      "Content-Type, Authorization",
    );

    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }

    next();
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createApp(
  env?: Record<string, string | undefined>,
  overrides?: Partial<AppDependencies>,
): AppInstance {
  const deps = createDependencies(env, overrides);
  const { config, logger, fetcher, generator } = deps;

  const toolRegistrars: ToolRegistrar[] = [];

  // --- Express app ---
  const app = express();
  app.use(express.json());
  app.use(createCorsMiddleware(config.CORS_ORIGINS));

  // --- Health endpoint (unauthenticated) ---
  app.get("/health", async (_req: Request, res: Response) => {
    const { running, lastRun } = generator.status();
    const articleSource = await fetcher.healthCheck().catch((err: unknown) => ({
      ok: false,
      latencyMs: 0,
      error: errorMessage(err),
    }));

    res.json({
      status: articleSource.ok ? "ok" : "degraded",
      service: "daybrief",
      job_running: running,
      last_run: lastRun?.finishedAt ?? null,
      last_result: lastRun
        ? {
            users_processed: lastRun.usersProcessed,
            successful: lastRun.successful,
            failed: lastRun.failed,
          }
        : null,
      article_source: articleSource,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  // --- Auth + Rate limiter ---
  const authMiddleware = createAuthMiddleware(config.API_KEYS);
  const rateLimiter = createRateLimiter(config.RATE_LIMIT_PER_MIN);

  app.use(["/generate", "/preview", "/users"], authMiddleware);
  app.use("/generate", rateLimiter);
  app.use(createBriefingRouter(deps));

  // --- MCP Streamable HTTP transport (stateless, per-request) ---
  app.post(
    "/mcp",
    authMiddleware,
    rateLimiter,
    async (req: Request, res: Response) => {
      try {
        const server = new McpServer({ name: "daybrief", version: "0.1.0" });

        for (const registrar of toolRegistrars) {
          registrar(server, deps);
        }

        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: undefined, // stateless
        });

        res.on("close", () => {
          transport.close().catch((err: unknown) =>
            logger.warn("MCP transport close failed", { error: errorMessage(err) }),
          );
        });

        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } catch (err) {
        logger.error("MCP request failed", { error: errorMessage(err) });
        if (!res.headersSent) {
          res.status(500).json({ error: "Internal server error" });
        }
      }
    },
  );

  // Reject GET and DELETE for stateless server
  app.get("/mcp", (_req: Request, res: Response) => {
    res.status(405).json({ error: "Method not allowed for stateless server" });
  });

  app.delete("/mcp", (_req: Request, res: Response) => {
    res.status(405).json({ error: "Method not allowed for stateless server" });
  });

  // --- HTTP server ---
  const httpServer = createServer(app);

  // --- Graceful shutdown ---
  let shuttingDown = false;

  async function shutdown(): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info("Shutting down gracefully...");

    rateLimiter.shutdown();

    if (httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    }

    logger.info("Shutdown complete");
  }

  return {
    app,
    httpServer,
    deps,
    addToolRegistrar: (registrar: ToolRegistrar) => {
      toolRegistrars.push(registrar);
    },
    shutdown,
  };
}
