// Approval gate between workers and side-effecting actions

import { EventEmitter } from "events";
import type { ApprovalDecision, PendingAction, PendingActionStatus } from "../../types/index.js";
import { GateProtocolViolation } from "../../utils/errors.js";
import type { LayerLogger, Logger } from "../../utils/logger.js";
import type { ApprovalDecider, ApprovalGateOptions } from "./types.js";

const DEFAULT_MAX_DECISION_ATTEMPTS = 5;

const RESOLVED_STATUS: Record<ApprovalDecision["kind"], PendingActionStatus> = {
  approve: "approved",
  revise: "revised",
  cancel: "cancelled",
};

/**
 * A revise without feedback gives the worker nothing to act on.
 */
export function isValidDecision(decision: ApprovalDecision): boolean {
  return decision.kind !== "revise" || decision.feedback.trim().length > 0;
}

/**
 * Intercepts side-effecting actions and holds them until a decider answers.
 *
 * Lifecycle of a PendingAction: requested → approved | revised | cancelled.
 * Each action resolves exactly once.
 */
export class ApprovalGate extends EventEmitter {
  private readonly decider: ApprovalDecider;
  private readonly sideEffecting: Set<string>;
  private readonly maxDecisionAttempts: number;
  private readonly logger: LayerLogger;

  constructor(options: ApprovalGateOptions, logger: Logger) {
    super();
    this.decider = options.decider;
    this.sideEffecting = new Set(options.sideEffecting);
    this.maxDecisionAttempts = options.maxDecisionAttempts ?? DEFAULT_MAX_DECISION_ATTEMPTS;
    this.logger = logger.forLayer("approval");
  }

  requiresApproval(actionId: string): boolean {
    return this.sideEffecting.has(actionId);
  }

  /**
   * Pass-through for actions that need no approval.
   */
  async run<P, T>(actionId: string, params: P, execute: (params: P) => Promise<T>): Promise<T> {
    if (this.requiresApproval(actionId)) {
      throw new GateProtocolViolation(`Action ${actionId} is side-effecting and must be submitted for approval`);
    }
    return execute(params);
  }

  /**
   * Present the action to the decider and wait for a valid decision.
   * There is no timeout.
   */
  async submit(action: PendingAction): Promise<ApprovalDecision> {
    if (!this.requiresApproval(action.actionId)) {
      throw new GateProtocolViolation(`Action ${action.actionId} is not gated`);
    }
    if (action.status !== "requested") {
      throw new GateProtocolViolation(`PendingAction ${action.id} was already ${action.status}`);
    }

    this.logger.info(`Approval requested: ${action.id} for ${action.actionId}`);
    this.emit("approval.requested", {
      actionId: action.actionId,
      pendingActionId: action.id,
      workerType: action.workerType,
    });

    for (let attempt = 1; attempt <= this.maxDecisionAttempts; attempt++) {
      const decision = await this.decider.decide(action.summary, action);
      if (isValidDecision(decision)) {
        const normalized: ApprovalDecision =
          decision.kind === "revise" ? { kind: "revise", feedback: decision.feedback.trim() } : decision;
        this.resolve(action, normalized);
        return normalized;
      }
      this.logger.warn("Revise decision without feedback, asking again", { attempt, pendingActionId: action.id });
    }

    throw new GateProtocolViolation(
      `No valid decision for ${action.id} after ${this.maxDecisionAttempts} attempts`
    );
  }

  /**
   * Record a decision. A second decision for the same action throws and
   * leaves the action untouched.
   */
  resolve(action: PendingAction, decision: ApprovalDecision): PendingAction {
    if (action.status !== "requested") {
      throw new GateProtocolViolation(`PendingAction ${action.id} was already ${action.status}`);
    }
    if (!isValidDecision(decision)) {
      throw new GateProtocolViolation(`Revise decision for ${action.id} has no feedback`);
    }

    action.status = RESOLVED_STATUS[decision.kind];
    action.resolvedAt = Date.now();

    this.logger.info(`Approval resolved: ${action.id} → ${action.status}`);
    this.emit("approval.resolved", {
      actionId: action.actionId,
      pendingActionId: action.id,
      status: action.status,
    });

    return action;
  }
}
