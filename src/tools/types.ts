// Tool specification types

import type { Static, TSchema } from "@sinclair/typebox";
import type { ContextBag } from "../context/ContextBag.js";
import type { ToolResult } from "../types/index.js";

/**
 * A registered action. `invoke` validates its input against `schema`
 * before running.
 */
export interface ToolSpec {
  id: string;
  description: string;
  schema: TSchema;
  /** Side-effecting tools are intercepted by the approval gate */
  sideEffecting: boolean;
  invoke(input: unknown, context: ContextBag): Promise<ToolResult>;
}

export interface ToolDefinition<T extends TSchema, O> {
  id: string;
  description: string;
  schema: T;
  sideEffecting: boolean;
  run(input: Static<T>, context: ContextBag): Promise<ToolResult<O>>;
}

export interface ToolInfo {
  id: string;
  description: string;
  schema: object;
  sideEffecting: boolean;
}
