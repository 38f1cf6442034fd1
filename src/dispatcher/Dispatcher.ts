/**
 * Dispatcher
 *
 * Front of one session. Handles control commands and identity, keeps the
 * active worker, classifies new requests, and saves the session after
 * every turn. Errors become user-facing replies except for the hard
 * failures, which propagate.
 */

import { ContextBag, ContextKeys, propagate } from "../context/ContextBag.js";
import { HistoryWindow } from "../history/HistoryWindow.js";
import { LoopGuard } from "../llm/LoopGuard.js";
import { SystemPromptBuilder } from "../llm/SystemPromptBuilder.js";
import { ToolIds } from "../tools/ids.js";
import { runSettingsUpdate } from "../tools/settings/SettingsTool.js";
import type { SettingsUpdate } from "../tools/schemas/TypeBoxSchemas.js";
import {
  WORKER_TYPES,
  type Session,
  type SessionRecord,
  type WorkerType,
} from "../types/index.js";
import { ErrorSanitizer } from "../utils/error-sanitizer.js";
import { ClassificationAmbiguous, isHardFailure, toAgentError } from "../utils/errors.js";
import { runWithTraceAsync, type LayerLogger } from "../utils/logger.js";
import { toIsoDate } from "../utils/time.js";
import { createWorker, describeWorkers, isWorkerType } from "../workers/WorkerRegistry.js";
import type { Worker, WorkerDeps, WorkerOutcome } from "../workers/types.js";
import type { ControlCommand, DispatchResponse, DispatcherDeps } from "./types.js";

const CONTROL_COMMANDS: Record<string, ControlCommand> = {
  exit: "exit",
  quit: "exit",
  終了: "exit",
  reset: "reset",
  リセット: "reset",
  最初から: "reset",
};

const Messages = {
  IDENTITY_REQUIRED: "Please tell me your name to get started.",
  RESET: "Everything was cleared. Please tell me your name to start again.",
  EXIT: "Goodbye.",
  CLARIFY: (candidates: string[]) =>
    `Is this about ${candidates.length > 0 ? candidates.join(" or ") : "a travel or a receipt expense"}?`,
  OFF_ROUTE: (type: string) => `Action '${type}' is not available here. Route the request or reply in plain text.`,
} as const;

export function parseControlCommand(input: string): ControlCommand | undefined {
  const key = input.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(CONTROL_COMMANDS, key) ? CONTROL_COMMANDS[key] : undefined;
}

export class Dispatcher {
  readonly history: HistoryWindow;
  private session: Session;
  private workers: Map<WorkerType, Worker> = new Map();
  private deps: DispatcherDeps;
  private logger: LayerLogger;

  private constructor(deps: DispatcherDeps, session: Session, history: HistoryWindow) {
    this.deps = deps;
    this.session = session;
    this.history = history;
    this.logger = deps.logger.forLayer("dispatcher");
  }

  static create(deps: DispatcherDeps, session: Session): Dispatcher {
    return new Dispatcher(deps, { ...session }, new HistoryWindow(deps.config.history.dispatcher));
  }

  static restore(deps: DispatcherDeps, record: SessionRecord): Dispatcher {
    const dispatcher = new Dispatcher(
      deps,
      { ...record.session },
      HistoryWindow.restore(deps.config.history.dispatcher, record.dispatcher.history)
    );
    for (const type of WORKER_TYPES) {
      const persisted = record.workers[type];
      if (persisted) {
        dispatcher.workers.set(type, createWorker(type, dispatcher.workerDeps(), persisted));
      }
    }
    return dispatcher;
  }

  get sessionId(): string {
    return this.session.id;
  }

  getSession(): Readonly<Session> {
    return this.session;
  }

  getWorker(type: WorkerType): Worker | undefined {
    return this.workers.get(type);
  }

  /**
   * Attach the requester's identity to the session.
   */
  async identify(requesterId: string): Promise<DispatchResponse> {
    const name = requesterId.trim();
    if (!name) {
      return this.respond("identity_required", Messages.IDENTITY_REQUIRED);
    }
    this.session.requesterId = name;
    await this.persist();
    this.logger.info("Requester identified", { sessionId: this.session.id });
    return this.respond("reply", "Thanks. What would you like to claim?");
  }

  async handle(input: string, context?: ContextBag): Promise<DispatchResponse> {
    return runWithTraceAsync("dispatcher", async () => {
      const text = input.trim();
      const command = parseControlCommand(text);

      if (command === "exit") {
        await this.persist();
        return this.respond("exit", Messages.EXIT);
      }

      if (command === "reset") {
        this.reset();
        await this.persist();
        return this.respond("identity_required", Messages.RESET);
      }

      const ctx = this.contextFor(context);
      if (!ctx.has(ContextKeys.requesterId)) {
        return this.respond("identity_required", Messages.IDENTITY_REQUIRED);
      }

      let response: DispatchResponse;
      try {
        response = await this.route(text, ctx);
      } catch (error) {
        if (isHardFailure(error)) {
          throw error;
        }
        response = this.errorResponse(error);
      }

      await this.persist();
      return response;
    });
  }

  /**
   * Re-present an approval that was pending when the session was saved.
   * Returns null when nothing is pending.
   */
  async resume(context?: ContextBag): Promise<DispatchResponse | null> {
    return runWithTraceAsync("dispatcher", async () => {
      const type = this.session.activeWorker;
      const worker = type ? this.workers.get(type) : undefined;
      if (!worker || worker.getState().state !== "AwaitingApproval") {
        return null;
      }

      let response: DispatchResponse;
      try {
        const outcome = await worker.resume(this.contextFor(context));
        if (!outcome) {
          return null;
        }
        response = this.afterOutcome(worker, outcome);
      } catch (error) {
        if (isHardFailure(error)) {
          throw error;
        }
        response = this.errorResponse(error);
      }

      await this.persist();
      return response;
    });
  }

  toRecord(): SessionRecord {
    const workers: SessionRecord["workers"] = {};
    for (const [type, worker] of this.workers) {
      workers[type] = worker.toJSON();
    }
    return {
      version: 1,
      session: { ...this.session },
      dispatcher: { history: this.history.toJSON() },
      workers,
    };
  }

  // ==========================================================================
  // Routing
  // ==========================================================================

  private async route(text: string, turnContext: ContextBag): Promise<DispatchResponse> {
    let context = turnContext;
    this.history.append({ role: "user", content: text });

    // An unfinished worker gets all input without classification.
    const active = this.session.activeWorker ? this.workers.get(this.session.activeWorker) : undefined;
    if (active?.isActive()) {
      return this.forward(active, text, context);
    }

    const guard = new LoopGuard(this.deps.config.loopLimits.dispatcher, "dispatcher");

    for (;;) {
      guard.beforeCall();
      const result = await this.deps.completion.complete({
        purpose: "dispatcher",
        systemPrompt: this.buildPrompt(),
        history: this.history.list(),
      });
      const action = result.structuredAction;

      if (action?.type === "route") {
        if (!isWorkerType(action.workerType)) {
          throw new ClassificationAmbiguous(Messages.CLARIFY([...WORKER_TYPES]), {
            internalMessage: `Unknown worker type: ${action.workerType}`,
          });
        }
        this.logger.info(`Routing to ${action.workerType}`, { sessionId: this.session.id });
        const worker = this.workerFor(action.workerType);
        if (!worker.isActive()) {
          worker.reset();
        }
        this.session.activeWorker = action.workerType;
        return this.forward(worker, text, context);
      }

      if (action?.type === "clarify") {
        const candidates = (action.candidates ?? []).filter(isWorkerType);
        throw new ClassificationAmbiguous(result.responseText || Messages.CLARIFY(candidates));
      }

      if (action?.type === "tool" && action.toolId === ToolIds.configUpdate) {
        if (result.responseText) {
          this.history.append({ role: "agent", content: result.responseText });
        }
        const updated = await runSettingsUpdate(this.deps, action.input, context, (update) =>
          this.applySettings(update)
        );
        this.history.append({ role: "tool", content: updated.turn });
        context = updated.context;
        continue;
      }

      if (action) {
        // Worker-level actions are not valid here; ask again.
        this.history.append({ role: "tool", content: Messages.OFF_ROUTE(action.type) });
        continue;
      }

      this.history.append({ role: "agent", content: result.responseText });
      return this.respond("reply", result.responseText);
    }
  }

  private async forward(worker: Worker, text: string, context: ContextBag): Promise<DispatchResponse> {
    const outcome = await worker.advance(text, context);
    return this.afterOutcome(worker, outcome);
  }

  private afterOutcome(worker: Worker, outcome: WorkerOutcome): DispatchResponse {
    this.history.append({ role: "agent", content: outcome.text });
    if (outcome.kind === "completed" || outcome.kind === "cancelled") {
      this.session.activeWorker = undefined;
    }
    return {
      ...this.respond(outcome.kind, outcome.text),
      workerType: worker.type,
      workerState: outcome.state,
      artifactLocation: outcome.artifactLocation,
    };
  }

  private errorResponse(error: unknown): DispatchResponse {
    const agentError = toAgentError(error, "turn");
    this.logger.logError("handle", agentError.cause ?? agentError);
    const sanitized = ErrorSanitizer.sanitize(agentError);

    if (agentError instanceof ClassificationAmbiguous) {
      this.history.append({ role: "agent", content: sanitized.message });
      return this.respond("clarify", sanitized.message);
    }
    return { ...this.respond("error", sanitized.message), errorCode: sanitized.code };
  }

  // ==========================================================================
  // Session state
  // ==========================================================================

  /**
   * Clears every worker, the history and the requester's identity.
   */
  private reset(): void {
    for (const worker of this.workers.values()) {
      worker.reset();
    }
    this.history.clear();
    this.session.requesterId = undefined;
    this.session.activeWorker = undefined;
    this.session.outputDirectory = undefined;
    this.logger.info("Session reset", { sessionId: this.session.id });
  }

  private applySettings(update: SettingsUpdate): void {
    if (update.setting === "applicantName") {
      this.session.requesterId = update.value;
    } else {
      this.session.outputDirectory = update.value;
    }
    this.logger.info(`Setting updated: ${update.setting}`, { sessionId: this.session.id });
  }

  private workerFor(type: WorkerType): Worker {
    let worker = this.workers.get(type);
    if (!worker) {
      worker = createWorker(type, this.workerDeps());
      this.workers.set(type, worker);
    }
    return worker;
  }

  private workerDeps(): WorkerDeps {
    return {
      completion: this.deps.completion,
      gate: this.deps.gate,
      tools: this.deps.tools,
      validator: this.deps.validator,
      logger: this.deps.logger,
      config: this.deps.config,
      now: this.deps.now,
      checkpoint: () => this.persist(),
      updateSettings: (update) => this.applySettings(update),
    };
  }

  /**
   * Session values first, then whatever the caller passed in.
   */
  private contextFor(parent: ContextBag | undefined): ContextBag {
    const base = ContextBag.from({
      [ContextKeys.sessionId]: this.session.id,
      [ContextKeys.applicationDate]: this.session.applicationDate,
      [ContextKeys.requesterId]: this.session.requesterId,
      [ContextKeys.outputDirectory]: this.session.outputDirectory,
    });
    return propagate(base, parent?.toJSON() ?? {});
  }

  private async persist(): Promise<void> {
    this.session.updatedAt = (this.deps.now?.() ?? new Date()).getTime();
    await this.deps.store.save(this.toRecord());
  }

  private buildPrompt(): string {
    const now = this.deps.now?.() ?? new Date();
    return new SystemPromptBuilder({
      identity: {
        name: "the expense intake desk",
        description: "the front desk that sends each expense request to the right assistant.",
      },
      role: "dispatcher",
      workers: describeWorkers(this.deps.config.rules),
      tools: this.settingsTools(),
      today: toIsoDate(now),
    }).build();
  }

  private settingsTools(): Array<{ id: string; description: string; schema: object }> {
    const spec = this.deps.tools.get(ToolIds.configUpdate);
    return spec ? [{ id: spec.id, description: spec.description, schema: spec.schema }] : [];
  }

  private respond(kind: DispatchResponse["kind"], text: string): DispatchResponse {
    return { kind, text, sessionId: this.session.id };
  }
}
