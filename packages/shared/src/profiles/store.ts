// =============================================================================
// @daybrief/shared: Read-only user profile store
// =============================================================================
// Profiles are written by the intake service as one JSON record per line.
// This module only reads them. Lines that fail validation are reported and
// skipped. When the same email appears more than once, the last record wins
// but keeps the position of the first one.
// =============================================================================

import { readFile } from "node:fs/promises";
import { UserProfileRecordSchema } from "../schemas.js";
import type { UserProfile } from "../types.js";

export interface ProfileStore {
  loadProfiles(): Promise<UserProfile[]>;
  findByEmail(email: string): Promise<UserProfile | undefined>;
}

export interface ProfileStoreOptions {
  onInvalidLine?: (lineNumber: number, reason: string) => void;
}

function emailKey(email: string): string {
  return email.trim().toLowerCase();
}

/** Parse JSONL profile content. Exported for reuse by the CLI and tests. */
export function parseProfiles(
  content: string,
  onInvalidLine?: (lineNumber: number, reason: string) => void,
): UserProfile[] {
  const byEmail = new Map<string, UserProfile>();

  content.split(/\r?\n/).forEach((line, index) => {
    if (!line.trim()) return;
    const lineNumber = index + 1;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      onInvalidLine?.(lineNumber, "not valid JSON");
      return;
    }

    const parsed = UserProfileRecordSchema.safeParse(raw);
    if (!parsed.success) {
      onInvalidLine?.(lineNumber, parsed.error.issues[0]?.message ?? "invalid");
      return;
    }

    const record = parsed.data;
    byEmail.set(emailKey(record.email), {
      version: record.version,
      email: record.email,
      name: record.name ?? undefined,
      briefingTime: record.briefing_time,
      topics: record.topics,
      createdAt: record.created_at,
    });
  });

  return [...byEmail.values()];
}

export function createProfileStore(
  path: string,
  options: ProfileStoreOptions = {},
): ProfileStore {
  async function loadProfiles(): Promise<UserProfile[]> {
    let content: string;
    try {
      content = await readFile(path, "utf-8");
    } catch (err) {
      if (
        typeof err === "object" &&
        err !== null &&
        "code" in err &&
        err.code === "ENOENT"
      ) {
        return [];
      }
      throw err;
    }
    return parseProfiles(content, options.onInvalidLine);
  }

  return {
    loadProfiles,
    async findByEmail(email: string): Promise<UserProfile | undefined> {
      const key = emailKey(email);
      const profiles = await loadProfiles();
      return profiles.find((p) => emailKey(p.email) === key);
    },
  };
}
