/**
 * HistoryWindow
 *
 * Bounded conversation history for one handler. Appending past the bound
 * evicts the oldest non-pinned turns. A pinned turn stays until unpinned.
 */

import type { ConversationRole, ConversationTurn } from "../types/index.js";

export interface AppendTurn {
  role: ConversationRole;
  content: string;
  pinned?: boolean;
}

export class HistoryWindow {
  private turns: ConversationTurn[] = [];
  private nextOrdinal = 0;
  private readonly bound: number;

  constructor(bound: number) {
    if (!Number.isInteger(bound) || bound < 1) {
      throw new RangeError(`History bound must be a positive integer, got ${bound}`);
    }
    this.bound = bound;
  }

  /**
   * Rebuild a window from persisted turns. Ordinals continue after the
   * highest restored one.
   */
  static restore(bound: number, turns: readonly ConversationTurn[]): HistoryWindow {
    const window = new HistoryWindow(bound);
    const sorted = [...turns].sort((a, b) => a.ordinal - b.ordinal);
    window.turns = sorted.map((turn) => ({ ...turn }));
    window.nextOrdinal = sorted.length > 0 ? sorted[sorted.length - 1].ordinal + 1 : 0;
    window.evict();
    return window;
  }

  append(turn: AppendTurn): ConversationTurn {
    const entry: ConversationTurn = {
      ordinal: this.nextOrdinal++,
      role: turn.role,
      content: turn.content,
      timestamp: Date.now(),
    };
    if (turn.pinned) {
      entry.pinned = true;
    }
    this.turns.push(entry);
    this.evict();
    return entry;
  }

  /**
   * Pin a turn so eviction skips it. Returns false if the turn is gone.
   */
  pin(ordinal: number): boolean {
    const turn = this.turns.find((t) => t.ordinal === ordinal);
    if (!turn) {
      return false;
    }
    turn.pinned = true;
    return true;
  }

  unpin(ordinal: number): boolean {
    const turn = this.turns.find((t) => t.ordinal === ordinal);
    if (!turn) {
      return false;
    }
    delete turn.pinned;
    this.evict();
    return true;
  }

  /**
   * The most recent turn with the given role.
   */
  lastOf(role: ConversationRole): ConversationTurn | undefined {
    for (let i = this.turns.length - 1; i >= 0; i--) {
      if (this.turns[i].role === role) {
        return this.turns[i];
      }
    }
    return undefined;
  }

  list(): readonly ConversationTurn[] {
    return this.turns;
  }

  clear(): void {
    this.turns = [];
  }

  get size(): number {
    return this.turns.length;
  }

  get capacity(): number {
    return this.bound;
  }

  toJSON(): ConversationTurn[] {
    return this.turns.map((turn) => ({ ...turn }));
  }

  private evict(): void {
    while (this.turns.length > this.bound) {
      const index = this.turns.findIndex((t) => !t.pinned);
      if (index === -1) {
        // Every retained turn is pinned; nothing may go.
        return;
      }
      this.turns.splice(index, 1);
    }
  }
}
