// =============================================================================
// @daybrief/shared: Error taxonomy
// =============================================================================
// Stage-local errors (FetchError, LLM*) are recovered where they occur or at
// the per-user boundary. Only RunConflictError and UserNotFoundError are
// meant to reach an API caller.
// =============================================================================

import type { PipelineStage } from "./types.js";

export class BriefingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Article service unreachable, timed out, or answered with an error. */
export class FetchError extends BriefingError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
  }
}

/** Model output was not JSON or did not match the expected shape. */
export class LLMResponseParseError extends BriefingError {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.raw = raw;
  }
}

export class LLMTimeoutError extends BriefingError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`LLM request timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/** Every per-source summarization request failed. */
export class SummarizationError extends BriefingError {
  readonly failures: Array<{ source: string; error: string }>;

  constructor(failures: Array<{ source: string; error: string }>) {
    super(
      `All ${failures.length} sources failed summarization: ` +
        failures.map((f) => `${f.source} (${f.error})`).join("; "),
    );
    this.failures = failures;
  }
}

/** Any uncaught failure inside one user's pipeline. */
export class UserPipelineError extends BriefingError {
  readonly userEmail: string;
  readonly stage: PipelineStage;

  constructor(userEmail: string, stage: PipelineStage, cause: unknown) {
    super(
      `Stage "${stage}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.userEmail = userEmail;
    this.stage = stage;
  }
}

export class RunConflictError extends BriefingError {
  constructor() {
    super("A briefing run is already in progress");
  }
}

export class UserNotFoundError extends BriefingError {
  readonly email: string;

  constructor(email: string) {
    super(`User ${email} not found`);
    this.email = email;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
