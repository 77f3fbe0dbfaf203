import { RunConflictError } from "@daybrief/shared";

/**
 * Process-wide "run in progress" flag. The only way to hold it is
 * `runExclusive`, which releases on every exit path.
 */
export class RunLock {
  private activeSince: Date | null = null;

  get isLocked(): boolean {
    return this.activeSince !== null;
  }

  get lockedSince(): Date | null {
    return this.activeSince;
  }

  /**
   * Run `fn` while holding the lock. Rejects with RunConflictError without
   * calling `fn` when another run holds it.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    if (this.activeSince !== null) {
      throw new RunConflictError();
    }
    this.activeSince = new Date();
    try {
      return await fn();
    } finally {
      this.activeSince = null;
    }
  }
}
