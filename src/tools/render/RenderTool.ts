// Document render tools (side-effecting, always behind the approval gate)

import type { Renderer } from "../../render/types.js";
import { ToolIds } from "../ids.js";
import { defineTool } from "../runtime/ToolRegistry.js";
import { ToolResultBuilder } from "../runtime/ToolResultBuilder.js";
import { RenderInputSchema, type RenderOutput } from "../schemas/TypeBoxSchemas.js";
import type { ToolSpec } from "../types.js";

function createRenderTool(id: string, description: string, renderer: Renderer): ToolSpec {
  return defineTool({
    id,
    description,
    schema: RenderInputSchema,
    sideEffecting: true,
    async run(input, context) {
      const result = await renderer.render(id, input, context);
      if (!result.success || !result.artifactLocation) {
        return ToolResultBuilder.failure("RENDER_FAILED", result.errorMessage ?? "Renderer produced no document");
      }
      const output: RenderOutput = { artifactLocation: result.artifactLocation };
      return ToolResultBuilder.success(output, { artifacts: [result.artifactLocation] });
    },
  });
}

export function createRenderTools(renderer: Renderer): ToolSpec[] {
  return [
    createRenderTool(ToolIds.renderTravel, "Generate the travel expense document", renderer),
    createRenderTool(ToolIds.renderReceipt, "Generate the receipt expense document", renderer),
  ];
}
