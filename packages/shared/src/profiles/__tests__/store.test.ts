import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createProfileStore, parseProfiles } from "../store.js";

const ADA = {
  version: "1.0",
  email: "ada@example.com",
  name: "Ada",
  briefing_time: "07:30",
  topics: ["AI agents", "chips"],
  created_at: "2026-10-01T08:00:00Z",
};

const GRACE = {
  version: "1.0",
  email: "grace@example.com",
  briefing_time: "9:00",
  topics: ["compilers"],
  created_at: "2026-10-02T08:00:00Z",
};

describe("parseProfiles", () => {
  it("maps snake_case records to profiles in file order", () => {
    const content = [JSON.stringify(ADA), "", JSON.stringify(GRACE), ""].join("\n");

    const profiles = parseProfiles(content);

    expect(profiles).toEqual([
      {
        version: "1.0",
        email: "ada@example.com",
        name: "Ada",
        briefingTime: "07:30",
        topics: ["AI agents", "chips"],
        createdAt: "2026-10-01T08:00:00Z",
      },
      {
        version: "1.0",
        email: "grace@example.com",
        name: undefined,
        briefingTime: "9:00",
        topics: ["compilers"],
        createdAt: "2026-10-02T08:00:00Z",
      },
    ]);
  });

  it("skips malformed lines and reports their line numbers", () => {
    const onInvalidLine = vi.fn();
    const content = [
      "{not json",
      JSON.stringify({ ...ADA, topics: [] }),
      JSON.stringify({ ...ADA, briefing_time: "25:00" }),
      JSON.stringify(GRACE),
    ].join("\n");

    const profiles = parseProfiles(content, onInvalidLine);

    expect(profiles.map((p) => p.email)).toEqual(["grace@example.com"]);
    expect(onInvalidLine.mock.calls.map((c) => c[0])).toEqual([1, 2, 3]);
    expect(onInvalidLine.mock.calls[0]?.[1]).toBe("not valid JSON");
  });

  it("lets a later record for the same email replace the earlier one in place", () => {
    const content = [
      JSON.stringify(ADA),
      JSON.stringify(GRACE),
      JSON.stringify({ ...ADA, email: "ADA@example.com", topics: ["robotics"] }),
    ].join("\n");

    const profiles = parseProfiles(content);

    expect(profiles.map((p) => p.topics)).toEqual([["robotics"], ["compilers"]]);
  });
});

describe("createProfileStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "daybrief-profiles-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads profiles from a JSONL file", async () => {
    const path = join(dir, "profiles.jsonl");
    await writeFile(path, `${JSON.stringify(ADA)}\n${JSON.stringify(GRACE)}\n`);
    const store = createProfileStore(path);

    const profiles = await store.loadProfiles();

    expect(profiles.map((p) => p.email)).toEqual([
      "ada@example.com",
      "grace@example.com",
    ]);
  });

  it("finds a profile by email regardless of case", async () => {
    const path = join(dir, "profiles.jsonl");
    await writeFile(path, `${JSON.stringify(ADA)}\n`);
    const store = createProfileStore(path);

    expect((await store.findByEmail("Ada@Example.com"))?.name).toBe("Ada");
    expect(await store.findByEmail("nobody@example.com")).toBeUndefined();
  });

  it("treats a missing file as an empty store", async () => {
    const store = createProfileStore(join(dir, "absent.jsonl"));

    expect(await store.loadProfiles()).toEqual([]);
  });
});
