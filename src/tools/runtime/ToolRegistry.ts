/**
 * ToolRegistry
 *
 * Fixed table of actions workers may request. Single responsibility: tool
 * storage, lookup and validated invocation. The set of side-effecting ids
 * is what the approval gate intercepts.
 */

import type { TSchema } from "@sinclair/typebox";
import type { ContextBag } from "../../context/ContextBag.js";
import type { ToolResult } from "../../types/index.js";
import type { LayerLogger, Logger } from "../../utils/logger.js";
import type { ToolDefinition, ToolInfo, ToolSpec } from "../types.js";
import { SchemaValidator } from "./SchemaValidator.js";
import { ToolResultBuilder } from "./ToolResultBuilder.js";

/**
 * Wrap a typed definition into a ToolSpec whose input is checked against
 * its schema before `run` sees it.
 */
export function defineTool<T extends TSchema, O>(definition: ToolDefinition<T, O>): ToolSpec {
  return {
    id: definition.id,
    description: definition.description,
    schema: definition.schema,
    sideEffecting: definition.sideEffecting,
    async invoke(input: unknown, context: ContextBag): Promise<ToolResult> {
      const startTime = Date.now();
      const validation = SchemaValidator.validate(definition.schema, input);
      if (!validation.success) {
        return ToolResultBuilder.validationError(
          `Invalid input for ${definition.id}:\n${SchemaValidator.formatErrors(validation.errors)}`,
          validation.errors
        );
      }
      const result = await definition.run(validation.data, context);
      return { ...result, meta: { ...result.meta, durationMs: Date.now() - startTime } };
    },
  };
}

export class ToolRegistry {
  private tools = new Map<string, ToolSpec>();
  private logger: LayerLogger;

  constructor(logger: Logger) {
    this.logger = logger.forLayer("tools");
  }

  register(spec: ToolSpec): void {
    if (this.tools.has(spec.id)) {
      throw new Error(`Tool already registered: ${spec.id}`);
    }
    this.tools.set(spec.id, spec);
    this.logger.debug(`Tool registered: ${spec.id}`);
  }

  get(id: string): ToolSpec | undefined {
    return this.tools.get(id);
  }

  has(id: string): boolean {
    return this.tools.has(id);
  }

  list(): ToolInfo[] {
    return Array.from(this.tools.values()).map((tool) => ({
      id: tool.id,
      description: tool.description,
      schema: tool.schema,
      sideEffecting: tool.sideEffecting,
    }));
  }

  /**
   * Ids the approval gate must intercept.
   */
  sideEffectingIds(): string[] {
    return Array.from(this.tools.values())
      .filter((tool) => tool.sideEffecting)
      .map((tool) => tool.id);
  }

  /**
   * Run a tool. Unknown ids and thrown errors come back as failed results.
   */
  async invoke(id: string, input: unknown, context: ContextBag): Promise<ToolResult> {
    const tool = this.tools.get(id);
    if (!tool) {
      return ToolResultBuilder.notFound("Tool", id);
    }

    const startTime = Date.now();
    this.logger.logInput(id, input);
    try {
      const result = await tool.invoke(input, context);
      this.logger.logOutput(id, result, startTime);
      return result;
    } catch (error) {
      this.logger.logError(id, error, startTime);
      return ToolResultBuilder.failure(
        "TOOL_FAILED",
        error instanceof Error ? error.message : String(error)
      );
    }
  }

  get size(): number {
    return this.tools.size;
  }
}
