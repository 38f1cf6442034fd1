// Approval gate types

import type { ApprovalDecision, PendingAction } from "../../types/index.js";

/**
 * Source of human (or policy) decisions. Implementations may block for as
 * long as they like; the gate applies no timeout.
 */
export interface ApprovalDecider {
  decide(summary: string, action: Readonly<PendingAction>): Promise<ApprovalDecision>;
}

export interface ApprovalGateOptions {
  decider: ApprovalDecider;
  /** Action ids that must pass through `submit` */
  sideEffecting: Iterable<string>;
  maxDecisionAttempts?: number;
}

export interface ApprovalGateEvents {
  "approval.requested": (data: { actionId: string; pendingActionId: string; workerType: string }) => void;
  "approval.resolved": (data: { actionId: string; pendingActionId: string; status: PendingAction["status"] }) => void;
}
