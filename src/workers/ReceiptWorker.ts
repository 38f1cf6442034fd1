// Receipt expense worker: one receipt per claim

import { EXPENSE_CATEGORIES } from "../domain/validation.js";
import { formatAmount, formatFieldValue, formatSection } from "../tools/approval/handlers/formatUtils.js";
import { ToolIds } from "../tools/ids.js";
import type { ActionParams, PersistedWorker, RulesConfig } from "../types/index.js";
import { BaseWorker } from "./BaseWorker.js";
import type { WorkerDefinition, WorkerDeps } from "./types.js";

export function receiptDefinition(rules: RulesConfig): WorkerDefinition {
  return {
    type: "receipt",
    displayName: "the receipt expense assistant",
    description: "expense claims for purchases backed by a receipt",
    renderActionId: ToolIds.renderReceipt,
    multiItem: false,
    fields: [
      { name: "storeName", description: "store or vendor on the receipt", required: true, scope: "header" },
      { name: "amount", description: "amount paid in yen", required: true, scope: "header" },
      { name: "date", description: "receipt date, YYYY-MM-DD", required: true, scope: "header" },
      { name: "items", description: "list of purchased items", required: true, scope: "header" },
      {
        name: "expenseCategory",
        description: `one of ${EXPENSE_CATEGORIES.join(", ")}`,
        required: true,
        scope: "header",
      },
      { name: "purpose", description: "business purpose of the purchase", required: true, scope: "header" },
    ],
    toolIds: [ToolIds.configUpdate],
    promptRules: [
      `Only receipts from the last ${rules.claimWindowDays} days can be claimed, and never future dates`,
      `The amount must be a whole number of yen up to ${formatAmount(rules.maxAmount)}`,
      `When the amount exceeds ${formatAmount(rules.supervisorApprovalThreshold)}, ask whether a supervisor approved it and record \`supervisorApproved\` (true or false)`,
    ],
  };
}

export class ReceiptWorker extends BaseWorker {
  constructor(deps: WorkerDeps, persisted?: PersistedWorker) {
    super(receiptDefinition(deps.config.rules), deps, persisted);
  }

  protected computeTotal(): number {
    const amount = this.state.fields.amount;
    return typeof amount === "number" ? amount : 0;
  }

  protected buildSummary(params: Readonly<ActionParams>): string {
    const rows: Array<[string, string]> = [
      ["Store", formatFieldValue(params.fields.storeName)],
      ["Date", formatFieldValue(params.fields.date)],
      ["Items", formatFieldValue(params.fields.items)],
      ["Category", formatFieldValue(params.fields.expenseCategory)],
      ["Purpose", formatFieldValue(params.fields.purpose)],
      ["Amount", formatAmount(params.total)],
    ];
    if (params.fields.supervisorApproved !== undefined) {
      rows.push(["Supervisor approval", formatFieldValue(params.fields.supervisorApproved)]);
    }
    return formatSection("Receipt expense claim", rows);
  }
}
