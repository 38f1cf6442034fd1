// Travel expense worker: one claim, several route items

import type { ContextBag } from "../context/ContextBag.js";
import { isCommuterRoute } from "../domain/transport.js";
import { formatAmount, formatFieldValue, formatSection } from "../tools/approval/handlers/formatUtils.js";
import { ToolIds } from "../tools/ids.js";
import { SchemaValidator } from "../tools/runtime/SchemaValidator.js";
import { FareLookupOutputSchema } from "../tools/schemas/TypeBoxSchemas.js";
import type { ActionParams, FieldError, FieldMap, PersistedWorker, RulesConfig } from "../types/index.js";
import { BaseWorker } from "./BaseWorker.js";
import type { WorkerDefinition, WorkerDeps } from "./types.js";

const ROUTE_FIELDS = ["departure", "destination", "transportType"];

export function travelDefinition(rules: RulesConfig): WorkerDefinition {
  const commuter = rules.commuterRoutes.map(([a, b]) => `${a}–${b}`).join(", ");
  return {
    type: "travel",
    displayName: "the travel expense assistant",
    description: "transportation expense claims (train, bus, taxi, airplane), one route at a time",
    renderActionId: ToolIds.renderTravel,
    multiItem: true,
    fields: [
      { name: "purpose", description: "business purpose of the travel", required: true, scope: "header" },
      { name: "date", description: "travel date, YYYY-MM-DD", required: true, scope: "item" },
      { name: "departure", description: "departure station or place", required: true, scope: "item" },
      { name: "destination", description: "destination station or place", required: true, scope: "item" },
      { name: "transportType", description: "train, bus, taxi or airplane", required: true, scope: "item" },
      { name: "cost", description: "fare in yen; filled from the fare table when known", required: true, scope: "item" },
      { name: "notes", description: "optional remarks", required: false, scope: "item" },
    ],
    toolIds: [ToolIds.fareLookup, ToolIds.configUpdate],
    promptRules: [
      `Only travel within the last ${rules.claimWindowDays} days can be claimed, and never future dates`,
      `Each cost must be a whole number of yen up to ${formatAmount(rules.maxAmount)}`,
      `When the total exceeds ${formatAmount(rules.supervisorApprovalThreshold)}, ask whether a supervisor approved it and record \`supervisorApproved\` (true or false) as a header field`,
      `Train routes covered by the commuter pass cannot be claimed: ${commuter}`,
      "Leave `cost` out unless the user states it; the fare is looked up once departure, destination and transport are known",
    ],
    anotherItemQuestion: "Is there another route to add? If not, tell me there are no more.",
  };
}

export class TravelWorker extends BaseWorker {
  constructor(deps: WorkerDeps, persisted?: PersistedWorker) {
    super(travelDefinition(deps.config.rules), deps, persisted);
  }

  protected computeTotal(): number {
    return this.state.items.reduce((sum, item) => sum + (typeof item.cost === "number" ? item.cost : 0), 0);
  }

  protected validateItem(item: Readonly<FieldMap>, index: number): FieldError[] {
    const { departure, destination, transportType } = item;
    if (
      transportType === "train" &&
      typeof departure === "string" &&
      typeof destination === "string" &&
      isCommuterRoute(departure, destination, this.deps.config.rules.commuterRoutes)
    ) {
      return [
        {
          field: "departure",
          item: index,
          message: `${departure}–${destination} is covered by the commuter pass and cannot be claimed`,
        },
      ];
    }
    return [];
  }

  /**
   * Route edits drop a cost the user did not restate, then the fare is
   * looked up again.
   */
  protected async afterItemUpdate(item: FieldMap, changed: readonly string[], context: ContextBag): Promise<void> {
    if (changed.some((name) => ROUTE_FIELDS.includes(name)) && !changed.includes("cost")) {
      delete item.cost;
    }

    const { departure, destination, transportType } = item;
    if (
      item.cost !== undefined ||
      typeof departure !== "string" ||
      typeof destination !== "string" ||
      typeof transportType !== "string"
    ) {
      return;
    }

    const result = await this.runTool(ToolIds.fareLookup, { departure, destination, transportType }, context);
    const quote = SchemaValidator.validate(FareLookupOutputSchema, result.data);
    if (result.ok && quote.success) {
      item.cost = quote.data.fare;
    }
  }

  protected buildSummary(params: Readonly<ActionParams>): string {
    const rows: Array<[string, string]> = [["Purpose", formatFieldValue(params.fields.purpose)]];
    if (params.fields.supervisorApproved !== undefined) {
      rows.push(["Supervisor approval", formatFieldValue(params.fields.supervisorApproved)]);
    }

    const routes = params.items.map((item, i) => {
      const cost = typeof item.cost === "number" ? formatAmount(item.cost) : "-";
      const notes = item.notes ? `  (${formatFieldValue(item.notes)})` : "";
      return (
        `  ${i + 1}. ${formatFieldValue(item.date)}  ` +
        `${formatFieldValue(item.departure)} → ${formatFieldValue(item.destination)}  ` +
        `${formatFieldValue(item.transportType)}  ${cost}${notes}`
      );
    });

    return [formatSection("Travel expense claim", rows), "Routes", ...routes, `Total: ${formatAmount(params.total)}`].join("\n");
  }
}
