/**
 * BaseWorker
 *
 * State machine shared by all workers:
 *
 *   Idle → CollectingFields → ReadyForAction → AwaitingApproval
 *        → Completed | CollectingFields (revise) | Cancelled
 *
 * Error is entered on a failed turn and immediately returns to Idle with
 * the collected fields kept. A failed render returns to ReadyForAction so
 * the next input submits a fresh PendingAction.
 */

import { propagate, type ContextBag } from "../context/ContextBag.js";
import { HistoryWindow } from "../history/HistoryWindow.js";
import { LoopGuard } from "../llm/LoopGuard.js";
import { SystemPromptBuilder } from "../llm/SystemPromptBuilder.js";
import type { CollectAction, ToolAction } from "../llm/types.js";
import { createPendingAction, restorePendingAction } from "../tools/approval/PendingAction.js";
import { formatAmount } from "../tools/approval/handlers/formatUtils.js";
import { ToolIds } from "../tools/ids.js";
import { ToolResultBuilder } from "../tools/runtime/ToolResultBuilder.js";
import { runSettingsUpdate } from "../tools/settings/SettingsTool.js";
import type {
  ActionParams,
  FieldError,
  FieldMap,
  PersistedWorker,
  ToolResult,
  WorkerMachineState,
  WorkerState,
  WorkerType,
} from "../types/index.js";
import { FieldValidationFailed, GateProtocolViolation, RenderFailed } from "../utils/errors.js";
import type { LayerLogger } from "../utils/logger.js";
import { toIsoDate } from "../utils/time.js";
import type { Worker, WorkerDefinition, WorkerDeps, WorkerOutcome } from "./types.js";

const CORRECTION_PREFIX = "Some values could not be accepted:";

/** Accepted for every claim; required only above the approval threshold */
const SUPERVISOR_FIELD = "supervisorApproved";

function initialState(type: WorkerType): WorkerState {
  return {
    type,
    state: "Idle",
    fields: {},
    items: [],
    itemsClosed: false,
    lastErrors: [],
  };
}

export abstract class BaseWorker implements Worker {
  readonly history: HistoryWindow;
  protected state: WorkerState;
  protected readonly deps: WorkerDeps;
  protected readonly logger: LayerLogger;
  private readonly headerFields: Set<string>;
  private readonly itemFields: Set<string>;

  constructor(
    readonly definition: WorkerDefinition,
    deps: WorkerDeps,
    persisted?: PersistedWorker
  ) {
    this.deps = deps;
    this.logger = deps.logger.forLayer("worker");
    this.headerFields = new Set(
      definition.fields.filter((f) => f.scope === "header").map((f) => f.name).concat(SUPERVISOR_FIELD)
    );
    this.itemFields = new Set(definition.fields.filter((f) => f.scope === "item").map((f) => f.name));

    const bound = deps.config.history.worker;
    if (persisted) {
      const saved = structuredClone(persisted.state);
      this.state = {
        ...saved,
        pendingAction: saved.pendingAction ? restorePendingAction(saved.pendingAction) : undefined,
      };
      this.history = HistoryWindow.restore(bound, persisted.history);
    } else {
      this.state = initialState(definition.type);
      this.history = new HistoryWindow(bound);
    }
  }

  get type(): WorkerType {
    return this.definition.type;
  }

  /** Sum claimed by the current fields */
  protected abstract computeTotal(): number;

  /** Text shown to the decider */
  protected abstract buildSummary(params: Readonly<ActionParams>): string;

  /**
   * Cross-field checks on one item after its fields were merged. Errors
   * reject the whole update.
   */
  protected validateItem(_item: Readonly<FieldMap>, _index: number): FieldError[] {
    return [];
  }

  /**
   * Runs after an item update was stored; may fill derived fields.
   */
  protected async afterItemUpdate(
    _item: FieldMap,
    _changed: readonly string[],
    _context: ContextBag
  ): Promise<void> {}

  getState(): Readonly<WorkerState> {
    return this.state;
  }

  isActive(): boolean {
    if (this.state.state === "Completed" || this.state.state === "Cancelled") {
      return false;
    }
    return this.state.state !== "Idle" || this.history.size > 0 || this.hasData();
  }

  reset(): void {
    this.state = initialState(this.type);
    this.history.clear();
  }

  toJSON(): PersistedWorker {
    return { state: structuredClone(this.state), history: this.history.toJSON() };
  }

  async advance(input: string, context: ContextBag): Promise<WorkerOutcome> {
    const ctx = propagate(context, { workerType: this.type });
    const guard = new LoopGuard(this.deps.config.loopLimits.worker, `${this.type} worker`);

    try {
      switch (this.state.state) {
        case "AwaitingApproval":
          // Input arriving while a decision is outstanding re-presents the action.
          this.history.append({ role: "user", content: input });
          return await this.awaitDecision(ctx, guard);

        case "ReadyForAction":
          this.history.append({ role: "user", content: input });
          return await this.requestApproval(ctx, guard);

        case "Completed":
        case "Cancelled":
          this.reset();
          this.transition("CollectingFields");
          return await this.collect(input, ctx, guard);

        case "Idle":
        case "Error":
          this.transition("CollectingFields");
          return await this.collect(input, ctx, guard);

        case "CollectingFields":
          return await this.collect(input, ctx, guard);
      }
    } catch (error) {
      this.fail(error);
      throw error;
    }
  }

  async resume(context: ContextBag): Promise<WorkerOutcome | null> {
    const action = this.state.pendingAction;
    if (this.state.state !== "AwaitingApproval" || !action || action.status !== "requested") {
      return null;
    }
    const ctx = propagate(context, { workerType: this.type });
    const guard = new LoopGuard(this.deps.config.loopLimits.worker, `${this.type} worker`);
    this.logger.info(`Resuming pending action ${action.id}`, { workerType: this.type });
    try {
      return await this.awaitDecision(ctx, guard);
    } catch (error) {
      this.fail(error);
      throw error;
    }
  }

  // ==========================================================================
  // Collection loop
  // ==========================================================================

  private async collect(input: string, turnContext: ContextBag, guard: LoopGuard): Promise<WorkerOutcome> {
    this.history.append({ role: "user", content: input });
    let context = turnContext;

    for (;;) {
      guard.beforeCall();
      const result = await this.deps.completion.complete({
        purpose: `worker:${this.type}`,
        systemPrompt: this.buildPrompt(),
        history: this.history.list(),
      });
      const action = result.structuredAction;

      if (action?.type === "tool") {
        if (result.responseText) {
          this.history.append({ role: "agent", content: result.responseText });
        }
        context = await this.handleToolAction(action, context);
        continue;
      }

      if (action?.type === "collect") {
        return this.handleCollect(action, result.responseText, context, guard);
      }

      if (action) {
        this.logger.warn(`Ignoring ${action.type} action inside ${this.type} worker`);
      }
      return this.reply(result.responseText || this.missingPrompt());
    }
  }

  private async handleCollect(
    action: CollectAction,
    responseText: string,
    context: ContextBag,
    guard: LoopGuard
  ): Promise<WorkerOutcome> {
    const completedBefore = this.completedItemCount();
    const errors = await this.applyCollect(action, context);
    errors.push(...this.claimErrors());

    if (errors.length > 0) {
      this.state.lastErrors = errors;
      const failure = new FieldValidationFailed(errors);
      this.logger.info(`Validation failed for ${errors.length} field(s)`, { workerType: this.type, errors });
      return this.reply(`${CORRECTION_PREFIX}\n${failure.userMessage}`);
    }
    this.state.lastErrors = [];

    if (this.isComplete()) {
      if (responseText) {
        this.history.append({ role: "agent", content: responseText });
      }
      return this.requestApproval(context, guard);
    }

    let text = responseText || this.missingPrompt();
    const question = this.definition.anotherItemQuestion;
    if (
      question &&
      this.definition.multiItem &&
      !this.state.itemsClosed &&
      this.completedItemCount() > completedBefore
    ) {
      text = `${text}\n\n${question}`;
    }
    return this.reply(text);
  }

  private async applyCollect(action: CollectAction, context: ContextBag): Promise<FieldError[]> {
    const errors: FieldError[] = [];

    for (const [name, raw] of Object.entries(action.fields ?? {})) {
      if (!this.headerFields.has(name)) {
        errors.push({ field: name, message: "Unknown field" });
        continue;
      }
      const result = this.deps.validator.validate(name, raw);
      if (result.ok) {
        this.state.fields[name] = result.value;
      } else {
        errors.push({ field: name, message: result.error.message });
      }
    }

    for (const update of action.items ?? []) {
      if (!this.definition.multiItem) {
        errors.push({ field: "items", message: "This claim has no item list" });
        continue;
      }

      const index = this.resolveItemIndex(update.index);
      if (index === undefined) {
        errors.push({ field: "items", message: `There is no item ${update.index ?? ""}`.trim() });
        continue;
      }

      const candidate: FieldMap = { ...(this.state.items[index - 1] ?? {}) };
      const changed: string[] = [];
      for (const [name, raw] of Object.entries(update.fields)) {
        if (!this.itemFields.has(name)) {
          errors.push({ field: name, item: index, message: "Unknown field" });
          continue;
        }
        const result = this.deps.validator.validate(name, raw);
        if (result.ok) {
          candidate[name] = result.value;
          changed.push(name);
        } else {
          errors.push({ field: name, item: index, message: result.error.message });
        }
      }

      const itemErrors = this.validateItem(candidate, index);
      if (itemErrors.length > 0) {
        errors.push(...itemErrors);
        continue;
      }

      if (index > this.state.items.length) {
        this.state.items.push(candidate);
        // A new item reopens the list.
        this.state.itemsClosed = false;
      } else {
        this.state.items[index - 1] = candidate;
      }
      await this.afterItemUpdate(candidate, changed, context);
    }

    if (action.noMoreItems && this.definition.multiItem) {
      this.state.itemsClosed = true;
    }

    return errors;
  }

  /**
   * Explicit indexes may address an existing item or the next new one.
   * Without an index the item in progress is filled, or a new one started.
   */
  private resolveItemIndex(index: number | undefined): number | undefined {
    const count = this.state.items.length;
    if (index !== undefined) {
      return index >= 1 && index <= count + 1 ? index : undefined;
    }
    const last = this.state.items[count - 1];
    return last && !this.isItemComplete(last) ? count : count + 1;
  }

  /**
   * Returns the context for the rest of the turn; config.update may change it.
   */
  private async handleToolAction(action: ToolAction, context: ContextBag): Promise<ContextBag> {
    if (this.deps.gate.requiresApproval(action.toolId)) {
      // Side-effecting tools only run after the summary is approved.
      this.recordToolResult(action.toolId, ToolResultBuilder.approvalRequired(action.toolId));
      return context;
    }
    const updateSettings = this.deps.updateSettings;
    const available =
      this.definition.toolIds.includes(action.toolId) &&
      this.deps.tools.has(action.toolId) &&
      (action.toolId !== ToolIds.configUpdate || updateSettings !== undefined);
    if (!available) {
      this.recordToolResult(action.toolId, ToolResultBuilder.notFound("Tool", action.toolId));
      return context;
    }
    if (action.toolId === ToolIds.configUpdate && updateSettings) {
      const updated = await runSettingsUpdate(this.deps, action.input, context, updateSettings);
      this.history.append({ role: "tool", content: updated.turn });
      return updated.context;
    }
    await this.runTool(action.toolId, action.input, context);
    return context;
  }

  /**
   * Run a non-side-effecting tool through the gate's pass-through and
   * record its result as a tool turn.
   */
  protected async runTool(toolId: string, input: unknown, context: ContextBag): Promise<ToolResult> {
    const result = await this.deps.gate.run(toolId, input, (params) =>
      this.deps.tools.invoke(toolId, params, context)
    );
    this.recordToolResult(toolId, result);
    return result;
  }

  private recordToolResult(toolId: string, result: ToolResult): void {
    this.history.append({
      role: "tool",
      content: JSON.stringify({ toolId, ok: result.ok, data: result.data, error: result.error?.message }),
    });
  }

  // ==========================================================================
  // Approval
  // ==========================================================================

  private async requestApproval(context: ContextBag, guard: LoopGuard): Promise<WorkerOutcome> {
    this.transition("ReadyForAction");

    const params = this.buildParams();
    const origin = this.history.lastOf("user");
    const action = createPendingAction({
      actionId: this.definition.renderActionId,
      params,
      workerType: this.type,
      originState: "ReadyForAction",
      originOrdinal: origin?.ordinal,
      summary: this.buildSummary(params),
    });
    if (origin) {
      this.history.pin(origin.ordinal);
    }
    this.state.pendingAction = action;
    this.transition("AwaitingApproval");

    await this.deps.checkpoint?.();
    return this.awaitDecision(context, guard);
  }

  private async awaitDecision(context: ContextBag, guard: LoopGuard): Promise<WorkerOutcome> {
    const action = this.state.pendingAction;
    if (!action) {
      throw new GateProtocolViolation(`${this.type} worker is awaiting approval without a pending action`);
    }

    const decision = await this.deps.gate.submit(action);
    this.state.pendingAction = undefined;
    if (action.originOrdinal !== undefined) {
      this.history.unpin(action.originOrdinal);
    }

    switch (decision.kind) {
      case "approve":
        return this.execute(action.actionId, action.params, context);

      case "revise":
        this.transition("CollectingFields");
        return this.collect(`Revision requested: ${decision.feedback}`, context, guard);

      case "cancel":
        this.transition("Cancelled");
        return this.finish("cancelled", "The request was cancelled. No document was generated.");
    }
  }

  private async execute(actionId: string, params: Readonly<ActionParams>, context: ContextBag): Promise<WorkerOutcome> {
    const result = await this.deps.tools.invoke(actionId, params, context);
    const artifact = result.meta.artifacts?.[0];

    if (!result.ok || !artifact) {
      const failure = new RenderFailed(result.error?.message ?? "no artifact returned");
      this.logger.error(`Render failed for ${actionId}`, { workerType: this.type, error: failure.internalMessage });
      this.transition("ReadyForAction");
      this.history.append({ role: "agent", content: failure.userMessage });
      return { kind: "render_failed", text: failure.userMessage, state: this.state.state };
    }

    this.transition("Completed");
    return this.finish("completed", `Approved. The document was saved to ${artifact}`, artifact);
  }

  // ==========================================================================
  // Field state
  // ==========================================================================

  protected buildParams(): ActionParams {
    return {
      fields: { ...this.state.fields },
      items: this.state.items.map((item) => ({ ...item })),
      total: this.computeTotal(),
    };
  }

  private isItemComplete(item: Readonly<FieldMap>): boolean {
    return this.definition.fields
      .filter((f) => f.scope === "item" && f.required)
      .every((f) => item[f.name] !== undefined);
  }

  private completedItemCount(): number {
    return this.state.items.filter((item) => this.isItemComplete(item)).length;
  }

  private needsSupervisorApproval(): boolean {
    return this.computeTotal() > this.deps.config.rules.supervisorApprovalThreshold;
  }

  /**
   * Names of what is still missing, in the order the user should be asked.
   */
  protected missingFields(): string[] {
    const missing = this.definition.fields
      .filter((f) => f.scope === "header" && f.required && this.state.fields[f.name] === undefined)
      .map((f) => f.name);

    if (this.definition.multiItem) {
      if (this.state.items.length === 0) {
        missing.push("items");
      }
      this.state.items.forEach((item, i) => {
        for (const f of this.definition.fields) {
          if (f.scope === "item" && f.required && item[f.name] === undefined) {
            missing.push(`item ${i + 1} ${f.name}`);
          }
        }
      });
      if (this.state.items.length > 0 && !this.state.itemsClosed) {
        missing.push("noMoreItems");
      }
    }

    if (this.needsSupervisorApproval() && this.state.fields[SUPERVISOR_FIELD] === undefined) {
      missing.push(SUPERVISOR_FIELD);
    }
    return missing;
  }

  private claimErrors(): FieldError[] {
    if (this.needsSupervisorApproval() && this.state.fields[SUPERVISOR_FIELD] === false) {
      const threshold = formatAmount(this.deps.config.rules.supervisorApprovalThreshold);
      return [{ field: SUPERVISOR_FIELD, message: `Claims over ${threshold} need supervisor approval` }];
    }
    return [];
  }

  private isComplete(): boolean {
    return this.missingFields().length === 0 && this.claimErrors().length === 0;
  }

  private hasData(): boolean {
    return Object.keys(this.state.fields).length > 0 || this.state.items.length > 0;
  }

  private missingPrompt(): string {
    const missing = this.missingFields();
    return missing.length > 0 ? `Please provide: ${missing.join(", ")}` : "Is everything correct?";
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private buildPrompt(): string {
    const now = this.deps.now?.() ?? new Date();
    const tools = this.definition.toolIds.flatMap((id) => {
      const spec = this.deps.tools.get(id);
      return spec ? [{ id: spec.id, description: spec.description, schema: spec.schema }] : [];
    });
    const snapshot = {
      fields: this.state.fields,
      items: this.state.items,
      itemsClosed: this.state.itemsClosed,
      missing: this.missingFields(),
      errors: this.state.lastErrors,
    };

    return new SystemPromptBuilder({
      identity: { name: this.definition.displayName, description: `who collects ${this.definition.description}.` },
      role: "worker",
      fields: this.definition.fields,
      multiItem: this.definition.multiItem,
      rules: this.definition.promptRules,
      tools,
      today: toIsoDate(now),
      state: JSON.stringify(snapshot),
    }).build();
  }

  private reply(text: string): WorkerOutcome {
    this.history.append({ role: "agent", content: text });
    return { kind: "reply", text, state: this.state.state };
  }

  private finish(kind: "completed" | "cancelled", text: string, artifactLocation?: string): WorkerOutcome {
    this.history.append({ role: "agent", content: text });
    return { kind, text, state: this.state.state, artifactLocation };
  }

  protected transition(next: WorkerMachineState): void {
    const from = this.state.state;
    if (from !== next) {
      this.state.state = next;
      this.logger.info(`${this.type}: ${from} → ${next}`);
    }
  }

  /**
   * A failed turn passes through Error back to Idle, keeping the fields.
   * An outstanding approval stays outstanding so it can be resumed.
   */
  private fail(error: unknown): void {
    this.logger.logError(`${this.type} turn`, error);
    if (error instanceof GateProtocolViolation || this.state.state === "AwaitingApproval") {
      return;
    }
    this.transition("Error");
    this.transition("Idle");
  }
}
