// Session settings tool (no side effects, passes the gate straight through)

import path from "path";
import { ContextKeys, type ContextBag, type ContextValue } from "../../context/ContextBag.js";
import type { ToolResult } from "../../types/index.js";
import type { ApprovalGate } from "../approval/ApprovalGate.js";
import { ToolIds } from "../ids.js";
import { defineTool, type ToolRegistry } from "../runtime/ToolRegistry.js";
import { SchemaValidator } from "../runtime/SchemaValidator.js";
import { ToolResultBuilder } from "../runtime/ToolResultBuilder.js";
import { SettingsUpdateSchema, type SettingsUpdate } from "../schemas/TypeBoxSchemas.js";
import type { ToolSpec } from "../types.js";

/** Stores a validated update on the session */
export type ApplySettings = (update: SettingsUpdate) => void;

export function createSettingsTool(): ToolSpec {
  return defineTool({
    id: ToolIds.configUpdate,
    description:
      "Change a session setting when the user asks: the applicant name printed on documents, or the directory documents are written to.",
    schema: SettingsUpdateSchema,
    sideEffecting: false,
    async run(input) {
      const value = input.value.trim();
      if (!value) {
        return ToolResultBuilder.failure("INVALID_INPUT", `${input.setting} must not be blank`);
      }
      const output: SettingsUpdate = {
        setting: input.setting,
        value: input.setting === "outputDirectory" ? path.resolve(value) : value,
      };
      return ToolResultBuilder.success(output);
    },
  });
}

function contextEntries(update: SettingsUpdate): Record<string, ContextValue> {
  return update.setting === "applicantName"
    ? { [ContextKeys.requesterId]: update.value }
    : { [ContextKeys.outputDirectory]: update.value };
}

/**
 * Run config.update, store the result and derive the context for the rest
 * of the turn. The tool turn names the setting but never its value.
 */
export async function runSettingsUpdate(
  deps: { gate: ApprovalGate; tools: ToolRegistry },
  input: unknown,
  context: ContextBag,
  apply: ApplySettings
): Promise<{ turn: string; context: ContextBag }> {
  const result: ToolResult = await deps.gate.run(ToolIds.configUpdate, input, (params) =>
    deps.tools.invoke(ToolIds.configUpdate, params, context)
  );
  const update = SchemaValidator.validate(SettingsUpdateSchema, result.data);

  if (!result.ok || !update.success) {
    const error = result.error?.message ?? "Tool returned no settings";
    return { turn: JSON.stringify({ toolId: ToolIds.configUpdate, ok: false, error }), context };
  }

  apply(update.data);
  return {
    turn: JSON.stringify({ toolId: ToolIds.configUpdate, ok: true, data: { setting: update.data.setting } }),
    context: context.with(contextEntries(update.data)),
  };
}
