// Tool Registry and Integration

import type { FareTable } from "../domain/FareTable.js";
import type { Renderer } from "../render/types.js";
import type { Logger } from "../utils/logger.js";
import { createFareLookupTool } from "./fares/FareLookupTool.js";
import { createRenderTools } from "./render/RenderTool.js";
import { ToolRegistry } from "./runtime/ToolRegistry.js";
import { createSettingsTool } from "./settings/SettingsTool.js";

export { ToolIds, type ToolId } from "./ids.js";
export { ToolRegistry, defineTool } from "./runtime/ToolRegistry.js";
export { runSettingsUpdate, type ApplySettings } from "./settings/SettingsTool.js";
export type { ToolSpec, ToolInfo } from "./types.js";

export interface ToolDependencies {
  fareTable: FareTable;
  renderer: Renderer;
  logger: Logger;
}

/**
 * Build the fixed tool table.
 */
export function createToolRegistry(deps: ToolDependencies): ToolRegistry {
  const registry = new ToolRegistry(deps.logger);
  registry.register(createFareLookupTool(deps.fareTable));
  registry.register(createSettingsTool());
  for (const tool of createRenderTools(deps.renderer)) {
    registry.register(tool);
  }
  return registry;
}
