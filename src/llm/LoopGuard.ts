// Per-turn bound on completion calls

import { LoopLimitExceeded } from "../utils/errors.js";

/**
 * Counts completion calls within one turn. A fresh guard is created for
 * every turn; the counter never carries over.
 */
export class LoopGuard {
  private calls = 0;

  constructor(
    private readonly maxCalls: number,
    private readonly owner: string
  ) {}

  /**
   * Call before each completion request.
   */
  beforeCall(): void {
    if (this.calls >= this.maxCalls) {
      throw new LoopLimitExceeded(this.owner, this.maxCalls);
    }
    this.calls++;
  }

  get count(): number {
    return this.calls;
  }
}
