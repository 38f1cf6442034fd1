// Session Store: one JSON file per session, written atomically

import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import { randomUUID } from "crypto";
import type { Session, SessionRecord, SessionSummary } from "../types/index.js";
import { SessionCorrupt } from "../utils/errors.js";
import type { LayerLogger, Logger } from "../utils/logger.js";
import { formatCompactTimestamp, toIsoDate } from "../utils/time.js";
import { PerSessionQueue } from "./PerSessionQueue.js";
import { SessionRecordSchema } from "./schema.js";

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const SESSION_FILE_PATTERN = /^session_([A-Za-z0-9_-]+)\.json$/;

/**
 * Persistence boundary used by the dispatcher and registry.
 */
export interface SessionPersistence {
  save(record: SessionRecord): Promise<void>;
  load(sessionId: string): Promise<SessionRecord | null>;
  list(): Promise<SessionSummary[]>;
  delete(sessionId: string): Promise<boolean>;
}

/**
 * `[prefix_]YYYYMMDD_HHMMSS_<8 hex>`, local time.
 */
export function generateSessionId(prefix?: string, now: Date = new Date()): string {
  const id = `${formatCompactTimestamp(now)}_${randomUUID().replace(/-/g, "").slice(0, 8)}`;
  return prefix ? `${prefix}_${id}` : id;
}

export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_PATTERN.test(sessionId);
}

export function createSession(id: string, now: Date = new Date()): Session {
  return {
    id,
    applicationDate: toIsoDate(now),
    createdAt: now.getTime(),
    updatedAt: now.getTime(),
  };
}

export function summarize(record: SessionRecord): SessionSummary {
  const { session } = record;
  const active = session.activeWorker ? record.workers[session.activeWorker] : undefined;
  return {
    id: session.id,
    requesterId: session.requesterId,
    activeWorker: session.activeWorker,
    workerState: active?.state.state,
    updatedAt: session.updatedAt,
  };
}

export class SessionStore implements SessionPersistence {
  private dir: string;
  private logger: LayerLogger;
  private queue = new PerSessionQueue();

  constructor(dir: string, logger: Logger) {
    this.dir = dir;
    this.logger = logger.forLayer("session");
  }

  getSessionPath(sessionId: string): string {
    if (!isValidSessionId(sessionId)) {
      throw new Error(`Invalid session id: ${sessionId}`);
    }
    return path.join(this.dir, `session_${sessionId}.json`);
  }

  /**
   * Validate and write the record. Writes for one id never interleave.
   */
  async save(record: SessionRecord): Promise<void> {
    const parsed = SessionRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new Error(`Refusing to save invalid session ${record.session.id}: ${parsed.error.message}`);
    }
    const filePath = this.getSessionPath(record.session.id);
    const content = JSON.stringify(parsed.data, null, 2);

    await this.queue.run(record.session.id, async () => {
      await fsp.mkdir(this.dir, { recursive: true });
      // Atomic write: write to temp file then rename
      const tempPath = `${filePath}.tmp.${Date.now()}`;
      try {
        await fsp.writeFile(tempPath, content, "utf-8");
        await fsp.rename(tempPath, filePath);
      } catch (error) {
        await fsp.rm(tempPath, { force: true });
        this.logger.logError(`save ${record.session.id}`, error);
        throw error;
      }
    });
    this.logger.debug(`Session saved: ${record.session.id}`);
  }

  /**
   * Returns null when the session does not exist.
   */
  async load(sessionId: string): Promise<SessionRecord | null> {
    const filePath = this.getSessionPath(sessionId);
    return this.queue.run(sessionId, async () => {
      if (!fs.existsSync(filePath)) {
        return null;
      }

      const content = await fsp.readFile(filePath, "utf-8");
      let data: unknown;
      try {
        data = JSON.parse(content);
      } catch (error) {
        throw new SessionCorrupt(sessionId, "file is not valid JSON", error);
      }

      const parsed = SessionRecordSchema.safeParse(data);
      if (!parsed.success) {
        const issues = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
        throw new SessionCorrupt(sessionId, issues);
      }
      return parsed.data;
    });
  }

  /**
   * Summaries of all readable sessions, most recently updated first.
   * Unreadable files are skipped with a warning.
   */
  async list(): Promise<SessionSummary[]> {
    if (!fs.existsSync(this.dir)) {
      return [];
    }

    const summaries: SessionSummary[] = [];
    for (const name of await fsp.readdir(this.dir)) {
      const match = SESSION_FILE_PATTERN.exec(name);
      if (!match) {
        continue;
      }
      try {
        const record = await this.load(match[1]);
        if (record) {
          summaries.push(summarize(record));
        }
      } catch (error) {
        if (!(error instanceof SessionCorrupt)) {
          throw error;
        }
        this.logger.warn(`Skipping unreadable session file: ${name}`, { error: error.internalMessage });
      }
    }
    return summaries.sort((a, b) => b.updatedAt - a.updatedAt);
  }

  /**
   * Returns false when there was nothing to delete.
   */
  async delete(sessionId: string): Promise<boolean> {
    const filePath = this.getSessionPath(sessionId);
    return this.queue.run(sessionId, async () => {
      if (!fs.existsSync(filePath)) {
        return false;
      }
      await fsp.unlink(filePath);
      this.logger.info(`Session deleted: ${sessionId}`);
      return true;
    });
  }
}
