/**
 * Sessions commands - inspect and remove saved sessions
 */

import { loadConfig } from "../../config/index.js";
import { SessionStore } from "../../sessions/SessionStore.js";
import type { SessionRecord, SessionSummary } from "../../types/index.js";
import { ErrorSanitizer } from "../../utils/error-sanitizer.js";
import { Logger } from "../../utils/logger.js";
import type { CliOptions, SessionRow } from "../types.js";
import { formatAsTable, formatOutput, printError, printHeader, printInfo, printSuccess } from "../utils/output.js";

function openStore(options: CliOptions): SessionStore {
  const config = loadConfig(options.config);
  const logger = new Logger(config, "cli", { console: options.verbose ?? false });
  return new SessionStore(config.storage.sessionsPath, logger);
}

export function toSessionRow(summary: SessionSummary): SessionRow {
  return {
    id: summary.id,
    requester: summary.requesterId ?? "-",
    worker: summary.activeWorker ?? "-",
    state: summary.workerState ?? "-",
    updated: new Date(summary.updatedAt).toISOString(),
  };
}

/** Key facts of a saved session, one row each */
export function describeSession(record: SessionRecord): Record<string, unknown> {
  const { session } = record;
  const details: Record<string, unknown> = {
    requester: session.requesterId,
    applicationDate: session.applicationDate,
    activeWorker: session.activeWorker,
    created: new Date(session.createdAt).toISOString(),
    updated: new Date(session.updatedAt).toISOString(),
    turns: record.dispatcher.history.length,
  };
  for (const [type, worker] of Object.entries(record.workers)) {
    if (!worker) continue;
    const pending = worker.state.pendingAction ? ` (pending ${worker.state.pendingAction.actionId})` : "";
    details[`${type}.state`] = `${worker.state.state}${pending}`;
    details[`${type}.fields`] = worker.state.fields;
    details[`${type}.items`] = worker.state.items.length;
  }
  return details;
}

/** List saved sessions */
export async function sessionsList(options: CliOptions): Promise<void> {
  try {
    const summaries = await openStore(options).list();
    if (options.json) {
      console.log(formatOutput(summaries.map((s) => ({ ...s })), "json"));
      return;
    }
    if (summaries.length === 0) {
      printInfo("No saved sessions");
      return;
    }
    printHeader(`Sessions (${summaries.length})`);
    console.log(formatAsTable(summaries.map((s) => ({ ...toSessionRow(s) }))));
  } catch (error) {
    printError(`Failed to list sessions: ${ErrorSanitizer.sanitize(error).message}`);
    process.exitCode = 1;
  }
}

/** Show one saved session */
export async function sessionsShow(sessionId: string, options: CliOptions): Promise<void> {
  try {
    const record = await openStore(options).load(sessionId);
    if (!record) {
      printError(`Session not found: ${sessionId}`);
      process.exitCode = 1;
      return;
    }
    if (options.json) {
      console.log(JSON.stringify(record, null, 2));
      return;
    }
    printHeader(`Session ${sessionId}`);
    console.log(formatAsTable(describeSession(record)));
  } catch (error) {
    printError(ErrorSanitizer.sanitize(error).message);
    process.exitCode = 1;
  }
}

/** Delete one saved session */
export async function sessionsDelete(sessionId: string, options: CliOptions): Promise<void> {
  try {
    if (await openStore(options).delete(sessionId)) {
      printSuccess(`Deleted session ${sessionId}`);
    } else {
      printError(`Session not found: ${sessionId}`);
      process.exitCode = 1;
    }
  } catch (error) {
    printError(ErrorSanitizer.sanitize(error).message);
    process.exitCode = 1;
  }
}
