// =============================================================================
// @daybrief/server: Email template loader
// =============================================================================
// Loads and caches HTML email templates from the filesystem. A template is
// addressed by its filename without the .html extension ("briefing").
// =============================================================================

import { readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TemplateEngine {
  /** Returns the cached template source; throws when it does not exist. */
  get(name: string): string;
  /** Names of every loaded template. */
  names(): string[];
  /** Re-reads all templates from disk (for hot reloading). */
  reloadTemplates(): void;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createTemplateEngine(templateDir: string): TemplateEngine {
  const cache = new Map<string, string>();

  function loadTemplates(): void {
    cache.clear();

    let files: string[];
    try {
      files = readdirSync(templateDir).filter((f) => f.endsWith(".html"));
    } catch {
      files = [];
    }

    for (const file of files) {
      cache.set(
        file.replace(/\.html$/, ""),
        readFileSync(join(templateDir, file), "utf-8"),
      );
    }
  }

  loadTemplates();

  return {
    get(name: string): string {
      const template = cache.get(name);
      if (template === undefined) {
        throw new Error(`Email template "${name}" not found in ${templateDir}`);
      }
      return template;
    },

    names(): string[] {
      return [...cache.keys()];
    },

    reloadTemplates(): void {
      loadTemplates();
    },
  };
}
