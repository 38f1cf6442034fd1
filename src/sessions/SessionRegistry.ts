/**
 * SessionRegistry
 *
 * Explicit map of live sessions (sessionId → dispatcher and its workers).
 * Owns the persistence boundary for opening sessions and runs the turns of
 * one session strictly one at a time.
 */

import type { ContextBag } from "../context/ContextBag.js";
import { Dispatcher } from "../dispatcher/Dispatcher.js";
import type { DispatchResponse, DispatcherDeps } from "../dispatcher/types.js";
import { SessionCorrupt } from "../utils/errors.js";
import type { LayerLogger } from "../utils/logger.js";
import { PerSessionQueue } from "./PerSessionQueue.js";
import { createSession, generateSessionId, isValidSessionId, type SessionPersistence } from "./SessionStore.js";

export interface SessionRegistryDeps extends Omit<DispatcherDeps, "store"> {
  store: SessionPersistence;
}

export interface OpenOptions {
  /** Resume this session when it exists; otherwise start it under this id */
  sessionId?: string;
  /** Prefix for newly generated ids */
  prefix?: string;
}

export interface OpenResult {
  sessionId: string;
  resumed: boolean;
  /** Set when a saved session could not be read and a new one was started */
  notice?: string;
}

export class SessionRegistry {
  private dispatchers: Map<string, Dispatcher> = new Map();
  private queue = new PerSessionQueue();
  private deps: SessionRegistryDeps;
  private logger: LayerLogger;

  constructor(deps: SessionRegistryDeps) {
    this.deps = deps;
    this.logger = deps.logger.forLayer("session");
  }

  async open(options: OpenOptions = {}): Promise<OpenResult> {
    const requested = options.sessionId;
    if (requested === undefined) {
      return { sessionId: this.start(generateSessionId(options.prefix, this.now())), resumed: false };
    }

    if (!isValidSessionId(requested)) {
      throw new Error(`Invalid session id: ${requested}`);
    }
    if (this.dispatchers.has(requested)) {
      return { sessionId: requested, resumed: true };
    }

    try {
      const record = await this.deps.store.load(requested);
      if (!record) {
        return { sessionId: this.start(requested), resumed: false };
      }
      this.dispatchers.set(requested, Dispatcher.restore(this.deps, record));
      this.logger.info(`Session resumed: ${requested}`);
      return { sessionId: requested, resumed: true };
    } catch (error) {
      if (!(error instanceof SessionCorrupt)) {
        throw error;
      }
      this.logger.error(`Session file unreadable: ${requested}`, { error: error.internalMessage });
      const fresh = this.start(generateSessionId(options.prefix, this.now()));
      return { sessionId: fresh, resumed: false, notice: error.userMessage };
    }
  }

  handle(sessionId: string, input: string, context?: ContextBag): Promise<DispatchResponse> {
    return this.queue.run(sessionId, () => this.require(sessionId).handle(input, context));
  }

  identify(sessionId: string, requesterId: string): Promise<DispatchResponse> {
    return this.queue.run(sessionId, () => this.require(sessionId).identify(requesterId));
  }

  resume(sessionId: string, context?: ContextBag): Promise<DispatchResponse | null> {
    return this.queue.run(sessionId, () => this.require(sessionId).resume(context));
  }

  get(sessionId: string): Dispatcher | undefined {
    return this.dispatchers.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.dispatchers.has(sessionId);
  }

  /**
   * Wait for queued turns, then forget the session. The saved file stays.
   */
  async close(sessionId: string): Promise<void> {
    await this.queue.drain(sessionId);
    this.dispatchers.delete(sessionId);
  }

  get size(): number {
    return this.dispatchers.size;
  }

  private start(sessionId: string): string {
    const session = createSession(sessionId, this.now());
    this.dispatchers.set(sessionId, Dispatcher.create(this.deps, session));
    this.logger.info(`Session created: ${sessionId}`);
    return sessionId;
  }

  private require(sessionId: string): Dispatcher {
    const dispatcher = this.dispatchers.get(sessionId);
    if (!dispatcher) {
      throw new Error(`Session not open: ${sessionId}`);
    }
    return dispatcher;
  }

  private now(): Date {
    return this.deps.now?.() ?? new Date();
  }
}
