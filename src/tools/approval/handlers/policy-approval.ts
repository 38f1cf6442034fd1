// Policy approval handler - unattended, rule-based decisions

import type { ApprovalDecision, PendingAction } from "../../../types/index.js";
import type { ApprovalDecider } from "../types.js";

export interface PolicyDeciderOptions {
  /** Approve when the claim total is at or below this; cancel above. Omit to approve everything. */
  maxTotal?: number;
}

export class PolicyApprovalDecider implements ApprovalDecider {
  readonly decisions: Array<{ actionId: string; decision: ApprovalDecision["kind"] }> = [];

  constructor(private options: PolicyDeciderOptions = {}) {}

  async decide(_summary: string, action: Readonly<PendingAction>): Promise<ApprovalDecision> {
    const { maxTotal } = this.options;
    const decision: ApprovalDecision =
      maxTotal === undefined || action.params.total <= maxTotal ? { kind: "approve" } : { kind: "cancel" };
    this.decisions.push({ actionId: action.id, decision: decision.kind });
    return decision;
  }
}
