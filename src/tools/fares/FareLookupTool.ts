// Fare lookup tool (no side effects, passes the gate straight through)

import type { FareTable } from "../../domain/FareTable.js";
import { ToolIds } from "../ids.js";
import { defineTool } from "../runtime/ToolRegistry.js";
import { ToolResultBuilder } from "../runtime/ToolResultBuilder.js";
import { FareLookupInputSchema, type FareLookupOutput } from "../schemas/TypeBoxSchemas.js";
import type { ToolSpec } from "../types.js";

export function createFareLookupTool(fareTable: FareTable): ToolSpec {
  return defineTool({
    id: ToolIds.fareLookup,
    description: "Look up the fare for one route. Train fares come from the fare table; bus, taxi and airplane use fixed fares.",
    schema: FareLookupInputSchema,
    sideEffecting: false,
    async run(input) {
      const quote = fareTable.lookup(input.departure, input.destination, input.transportType);
      if (!quote.ok) {
        return ToolResultBuilder.failure("FARE_NOT_FOUND", quote.error);
      }
      const output: FareLookupOutput = quote.value;
      return ToolResultBuilder.success(output);
    },
  });
}
