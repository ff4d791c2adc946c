import { JobCompletionError } from '../errors';

interface PendingRun {
  resolve: () => void;
  timer: NodeJS.Timeout;
  registeredAt: string;
}

export interface PendingRunSummary {
  runId: string;
  registeredAt: string;
}

/**
 * Matches completion reports from the robot to the executor calls waiting on them.
 */
export class CompletionStore {
  private readonly pending = new Map<string, PendingRun>();

  /**
   * Registers `runId` and returns a promise settled by `markComplete`, or rejected with
   * `JobCompletionError` after `timeoutMs`. Register before streaming the program so a fast
   * report cannot arrive first.
   */
  expect(runId: string, timeoutMs: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(runId);
        reject(new JobCompletionError(runId, timeoutMs));
      }, timeoutMs);
      this.pending.set(runId, { resolve, timer, registeredAt: new Date().toISOString() });
    });
  }

  /** @returns `false` when nothing was waiting on `runId`. */
  markComplete(runId: string): boolean {
    const entry = this.pending.get(runId);
    if (!entry) {
      return false;
    }
    clearTimeout(entry.timer);
    this.pending.delete(runId);
    entry.resolve();
    return true;
  }

  /** Stops waiting on `runId` without settling its promise. */
  cancel(runId: string): void {
    const entry = this.pending.get(runId);
    if (entry) {
      clearTimeout(entry.timer);
      this.pending.delete(runId);
    }
  }

  list(): PendingRunSummary[] {
    return [...this.pending.entries()].map(([runId, entry]) => ({ runId, registeredAt: entry.registeredAt }));
  }
}
