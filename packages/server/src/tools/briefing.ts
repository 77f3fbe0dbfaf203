// =============================================================================
// @daybrief/server: MCP briefing tools (generate_briefings, preview_briefing,
// list_users)
// =============================================================================
// MCP counterparts of the REST routes. Failures come back as `isError`
// results carrying the error message; a run conflict is reported the same way.
// =============================================================================

import { type McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  GenerateRequestInput,
  PreviewInput,
  errorMessage,
} from "@daybrief/shared";
import type { ToolRegistrar, AppDependencies } from "../server.js";
import { logToolCall } from "../logger.js";
import { summarizeRun, toUserView } from "../api.js";

function textResult(value: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: typeof value === "string" ? value : JSON.stringify(value, null, 2),
      },
    ],
  };
}

function errorResult(message: string) {
  return { ...textResult(message), isError: true };
}

// ---------------------------------------------------------------------------
// Tool registrar
// ---------------------------------------------------------------------------

export const registerBriefingTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { generator, profiles, logger } = deps;

  // -------------------------------------------------------------------------
  // generate_briefings: full run for every user, or just one
  // -------------------------------------------------------------------------
  server.tool(
    "generate_briefings",
    GenerateRequestInput.shape,
    async (input) => {
      const start = performance.now();
      try {
        const summary = await generator.run({
          email: input.email,
          sendEmail: input.send_email,
        });
        logToolCall(logger, "generate_briefings", { ...input }, performance.now() - start);
        return textResult({ ...summarizeRun(summary), results: summary.results });
      } catch (err) {
        const msg = errorMessage(err);
        logToolCall(logger, "generate_briefings", { ...input }, performance.now() - start, msg);
        return errorResult(`Briefing run failed: ${msg}`);
      }
    },
  );

  // -------------------------------------------------------------------------
  // preview_briefing: compose one user's briefing without sending
  // -------------------------------------------------------------------------
  server.tool("preview_briefing", PreviewInput.shape, async (input) => {
    const start = performance.now();
    try {
      const { document, briefing } = await generator.preview(input.email);
      logToolCall(logger, "preview_briefing", { ...input }, performance.now() - start);
      return textResult({
        subject: document.subject,
        articles_analyzed: briefing.articlesAnalyzed,
        sources_count: briefing.sourcesCount,
        text: document.text,
      });
    } catch (err) {
      const msg = errorMessage(err);
      logToolCall(logger, "preview_briefing", { ...input }, performance.now() - start, msg);
      return errorResult(`Preview failed: ${msg}`);
    }
  });

  // -------------------------------------------------------------------------
  // list_users: registered profiles
  // -------------------------------------------------------------------------
  server.tool("list_users", {}, async () => {
    const start = performance.now();
    try {
      const users = await profiles.loadProfiles();
      logToolCall(logger, "list_users", {}, performance.now() - start);
      return textResult({ count: users.length, users: users.map(toUserView) });
    } catch (err) {
      const msg = errorMessage(err);
      logToolCall(logger, "list_users", {}, performance.now() - start, msg);
      return errorResult(`Listing users failed: ${msg}`);
    }
  });
};
