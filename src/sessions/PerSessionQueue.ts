/**
 * PerSessionQueue
 *
 * Per-session execution queue. Tasks for one session run strictly one after
 * another in submission order; sessions run independently.
 */

export class PerSessionQueue {
  private tails: Map<string, Promise<void>> = new Map();
  private pending: Map<string, number> = new Map();
  private maxPendingPerSession: number;

  constructor(maxPendingPerSession: number = 100) {
    this.maxPendingPerSession = maxPendingPerSession;
  }

  /**
   * Run a task after every earlier task for the same session has settled.
   * The task's own result or rejection is returned to the caller.
   */
  run<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const count = this.pending.get(sessionId) ?? 0;
    if (count >= this.maxPendingPerSession) {
      return Promise.reject(new Error(`Too many pending tasks for session ${sessionId}`));
    }
    this.pending.set(sessionId, count + 1);

    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    const result = previous.then(task);

    // The chain only orders tasks; outcomes reach callers through `result`.
    const tail: Promise<void> = result.then(
      () => this.release(sessionId, tail),
      () => this.release(sessionId, tail)
    );
    this.tails.set(sessionId, tail);

    return result;
  }

  /**
   * Check if a session has a task running or waiting.
   */
  isProcessing(sessionId: string): boolean {
    return (this.pending.get(sessionId) ?? 0) > 0;
  }

  /**
   * Number of tasks running or waiting for a session.
   */
  size(sessionId: string): number {
    return this.pending.get(sessionId) ?? 0;
  }

  /**
   * Resolves once every task queued so far for the session has settled.
   */
  async drain(sessionId: string): Promise<void> {
    await this.tails.get(sessionId);
  }

  getStats(): { sessions: number; totalTasks: number } {
    let totalTasks = 0;
    for (const count of this.pending.values()) {
      totalTasks += count;
    }
    return { sessions: this.pending.size, totalTasks };
  }

  private release(sessionId: string, tail: Promise<void>): void {
    const count = (this.pending.get(sessionId) ?? 1) - 1;
    if (count <= 0) {
      this.pending.delete(sessionId);
    } else {
      this.pending.set(sessionId, count);
    }
    if (this.tails.get(sessionId) === tail) {
      this.tails.delete(sessionId);
    }
  }
}
