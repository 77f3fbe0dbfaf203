// =============================================================================
// HTTP tests for the Express app
// =============================================================================
// The app listens on an ephemeral port with the article source, LLM stages
// and email delivery replaced by in-process fakes.
// =============================================================================

import { describe, it, expect, afterEach } from "vitest";
import {
  FetchError,
  RunConflictError,
  type Article,
  type HealthCheckResult,
} from "@daybrief/shared";
import { createApp, type AppDependencies, type AppInstance } from "../server.js";
import { createBriefingGenerator, type BriefingGenerator } from "../generator.js";
import {
  NOW,
  fakeFetcher,
  fakeProcessor,
  fakeProfiles,
  fakeSender,
  fakeTemplates,
  memoryLogger,
  sampleArticles,
  user,
} from "./fakes.js";

const AUTH = { Authorization: "Bearer test-key-1" };

const users = [
  user("ada@example.com", ["chips"], "Ada"),
  user("cy@example.com", ["energy", "nothing"]),
];

const instances: AppInstance[] = [];

async function start(
  options: {
    env?: Record<string, string>;
    articles?: Article[] | Error;
    health?: HealthCheckResult;
    overrides?: Partial<AppDependencies>;
  } = {},
) {
  const { fetcher } = fakeFetcher(options.articles ?? sampleArticles(), options.health);
  const profiles = fakeProfiles(users);
  const processor = fakeProcessor();
  const { sender } = fakeSender();
  const templates = fakeTemplates();
  const { logger } = memoryLogger();
  const generator = createBriefingGenerator({
    fetcher,
    profiles,
    processor,
    sender,
    templates,
    logger,
    lookbackHours: 48,
    now: () => NOW,
  });

  const instance = createApp(
    {
      ANTHROPIC_API_KEY: "test-key",
      API_KEYS: JSON.stringify({ "test-key-1": "tests" }),
      ...options.env,
    },
    { fetcher, profiles, processor, sender, templates, logger, generator, ...options.overrides },
  );
  instances.push(instance);

  await new Promise<void>((resolve) => instance.httpServer.listen(0, "127.0.0.1", resolve));
  const address = instance.httpServer.address();
  if (address === null || typeof address === "string") {
    throw new Error("Expected a TCP address");
  }
  return `http://127.0.0.1:${address.port}`;
}

function post(url: string, body: unknown, headers: Record<string, string> = AUTH) {
  return fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
  });
}

interface HealthBody {
  status: string;
  last_run: string | null;
  last_result: Record<string, number> | null;
  article_source: HealthCheckResult;
}

async function readJson<T = unknown>(res: Response): Promise<T> {
  return (await res.json()) as T;
}

afterEach(async () => {
  await Promise.all(instances.splice(0).map((i) => i.shutdown()));
});

// ---------------------------------------------------------------------------
// GET /health
// ---------------------------------------------------------------------------

describe("GET /health", () => {
  it("reports ok with no previous run", async () => {
    const base = await start();

    const res = await fetch(`${base}/health`);
    const body = await readJson(res);

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      status: "ok",
      service: "daybrief",
      job_running: false,
      last_run: null,
      last_result: null,
      article_source: { ok: true, latencyMs: 3 },
    });
  });

  it("reports degraded when the article source is down", async () => {
    const base = await start({
      health: { ok: false, latencyMs: 1, error: "Article service returned 500" },
    });

    const res = await fetch(`${base}/health`);
    const body = await readJson<HealthBody>(res);

    expect(res.status).toBe(200);
    expect(body.status).toBe("degraded");
    expect(body.article_source.error).toBe("Article service returned 500");
  });

  it("includes the last run once one has finished", async () => {
    const base = await start();
    await post(`${base}/generate`, {});

    const body = await readJson<HealthBody>(await fetch(`${base}/health`));

    expect(body.last_result).toEqual({ users_processed: 2, successful: 1, failed: 1 });
    expect(typeof body.last_run).toBe("string");
  });
});

// ---------------------------------------------------------------------------
// POST /generate
// ---------------------------------------------------------------------------

describe("POST /generate", () => {
  it("requires an API key", async () => {
    const base = await start();

    const res = await post(`${base}/generate`, {}, {});

    expect(res.status).toBe(401);
    expect(await readJson(res)).toEqual({ error: "Missing Authorization header" });
  });

  it("rejects an unknown API key", async () => {
    const base = await start();

    const res = await post(`${base}/generate`, {}, { Authorization: "Bearer wrong" });

    expect(res.status).toBe(401);
    expect(await readJson(res)).toEqual({ error: "Invalid API key" });
  });

  it("is open when no API keys are configured", async () => {
    const base = await start({ env: { API_KEYS: "{}" } });

    const res = await post(`${base}/generate`, { send_email: false }, {});

    expect(res.status).toBe(200);
  });

  it("runs every user and reports the counts", async () => {
    const base = await start();

    const res = await post(`${base}/generate`, {});

    expect(res.status).toBe(200);
    expect(await readJson(res)).toEqual({
      status: "completed",
      message: "Generated briefings for 2 users",
      users_processed: 2,
      successful: 1,
      failed: 1,
    });
  });

  it("rejects an invalid body", async () => {
    const base = await start();

    const res = await post(`${base}/generate`, { send_email: "yes" });

    expect(res.status).toBe(400);
  });

  it("returns 404 for an unknown email", async () => {
    const base = await start();

    const res = await post(`${base}/generate`, { email: "nobody@example.com" });

    expect(res.status).toBe(404);
    expect(await readJson(res)).toEqual({ error: "User nobody@example.com not found" });
  });

  it("returns 409 while another run holds the lock", async () => {
    const generator: BriefingGenerator = {
      run: async () => {
        throw new RunConflictError();
      },
      preview: async () => {
        throw new Error("unused");
      },
      buildBriefing: async () => {
        throw new Error("unused");
      },
      status: () => ({ running: true, runningSince: NOW.toISOString(), lastRun: null }),
    };
    const base = await start({ overrides: { generator } });

    const res = await post(`${base}/generate`, {});

    expect(res.status).toBe(409);
    expect(await readJson(res)).toEqual({ error: "A briefing run is already in progress" });
  });

  it("returns 503 when every user failed on the article fetch", async () => {
    const base = await start({ articles: new Error("connect ECONNREFUSED") });

    const res = await post(`${base}/generate`, {});
    const body = await readJson(res);

    expect(res.status).toBe(503);
    expect(body).toMatchObject({ error: "Article source unavailable", failed: 2 });
  });

  it("rate limits per client", async () => {
    const base = await start({ env: { RATE_LIMIT_PER_MIN: "1" } });

    const first = await post(`${base}/generate`, { send_email: false });
    const second = await post(`${base}/generate`, { send_email: false });

    expect(first.status).toBe(200);
    expect(second.status).toBe(429);
  });
});

// ---------------------------------------------------------------------------
// GET /preview/:email
// ---------------------------------------------------------------------------

describe("GET /preview/:email", () => {
  it("renders the briefing as HTML", async () => {
    const base = await start();

    const res = await fetch(`${base}/preview/ada@example.com`, { headers: AUTH });

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("text/html");
    expect(await res.text()).toMatch(/^<h1>Hello Ada<\/h1><div class="story">/);
  });

  it("returns 404 for an unknown user", async () => {
    const base = await start();

    const res = await fetch(`${base}/preview/nobody@example.com`, { headers: AUTH });

    expect(res.status).toBe(404);
  });

  it("returns 422 when no article could be processed", async () => {
    const base = await start();

    const res = await fetch(`${base}/preview/cy@example.com`, { headers: AUTH });

    expect(res.status).toBe(422);
    expect(await readJson(res)).toEqual({
      error: 'Stage "process" failed: No articles could be processed',
    });
  });

  it("returns 502 when the article source is unreachable", async () => {
    const base = await start({ articles: new FetchError("Article service returned 500") });

    const res = await fetch(`${base}/preview/ada@example.com`, { headers: AUTH });

    expect(res.status).toBe(502);
  });
});

// ---------------------------------------------------------------------------
// GET /users
// ---------------------------------------------------------------------------

describe("GET /users", () => {
  it("lists registered users", async () => {
    const base = await start();

    const res = await fetch(`${base}/users`, { headers: AUTH });

    expect(await readJson(res)).toEqual({
      count: 2,
      users: [
        { email: "ada@example.com", name: "Ada", topics: ["chips"], briefing_time: "07:00" },
        {
          email: "cy@example.com",
          name: null,
          topics: ["energy", "nothing"],
          briefing_time: "07:00",
        },
      ],
    });
  });
});
