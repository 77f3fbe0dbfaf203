#!/usr/bin/env node
// =============================================================================
// @daybrief/server: CLI harness
// =============================================================================
// Manual checks against a configured environment, without starting the HTTP
// server.
//
// Usage:
//   npm run cli -- check             # article service health + profile count
//   npm run cli -- preview [email]   # plain-text briefing for one user
//   npm run cli -- send              # full run, prints per-user results
//
// Logs go to stderr so command output stays readable.
// =============================================================================

import { pathToFileURL } from "node:url";
import { errorMessage, loadConfig } from "@daybrief/shared";
import { createLogger } from "./logger.js";
import { createDependencies, type AppDependencies } from "./server.js";

export type Print = (line: string) => void;

const USAGE = "Usage: daybrief <check | preview [email] | send>";

/** Runs one command and returns the process exit code. */
export async function runCommand(
  argv: string[],
  deps: Pick<AppDependencies, "fetcher" | "profiles" | "generator">,
  print: Print,
): Promise<number> {
  const [command, arg] = argv;

  switch (command) {
    case "check": {
      const health = await deps.fetcher.healthCheck();
      const users = await deps.profiles.loadProfiles();
      print(
        health.ok
          ? `Article service: ok (${health.latencyMs}ms)`
          : `Article service: unavailable (${health.error ?? "unknown error"})`,
      );
      print(`Profiles: ${users.length}`);
      return health.ok ? 0 : 1;
    }

    case "preview": {
      const email = arg ?? (await deps.profiles.loadProfiles())[0]?.email;
      if (!email) {
        print("No profiles registered.");
        return 1;
      }
      const { document } = await deps.generator.preview(email);
      print(`Subject: ${document.subject}`);
      print("");
      print(document.text);
      return 0;
    }

    case "send": {
      const summary = await deps.generator.run();
      for (const r of summary.results) {
        print(
          r.status === "success"
            ? `ok      ${r.userEmail}`
            : `failed  ${r.userEmail} [${r.failedStage ?? "unknown"}] ${r.error ?? ""}`,
        );
      }
      print(
        `${summary.usersProcessed} users, ${summary.successful} successful, ${summary.failed} failed`,
      );
      return summary.failed === 0 ? 0 : 1;
    }

    default:
      print(USAGE);
      return 2;
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({
    level: config.LOG_LEVEL,
    write: (line) => process.stderr.write(line + "\n"),
  });
  const deps = createDependencies(undefined, { config, logger });

  try {
    process.exitCode = await runCommand(process.argv.slice(2), deps, (line) =>
      console.log(line),
    );
  } catch (err) {
    console.error("Command failed:", errorMessage(err));
    process.exitCode = 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  await main();
}
