// Tool Result Builder Helper
// Provides consistent result construction for all tools

import type { ToolResult, ToolMeta } from "../../types/index.js";

/**
 * Helper for building consistent ToolResult objects.
 *
 * @example
 * return ToolResultBuilder.success({ fare: 210 }, { durationMs: 3 });
 * return ToolResultBuilder.failure("FARE_NOT_FOUND", "No train fare found");
 */
export const ToolResultBuilder = {
  success<T>(data: T, meta?: Partial<ToolMeta>): ToolResult<T> {
    return {
      ok: true,
      data,
      meta: {
        durationMs: meta?.durationMs ?? 0,
        artifacts: meta?.artifacts,
      },
    };
  },

  /**
   * Build a failure result with error details.
   * Returns ToolResult<never> which is assignable to any ToolResult<T>.
   */
  failure(code: string, message: string, details?: unknown): ToolResult<never> {
    return {
      ok: false,
      error: { code, message, details },
      meta: { durationMs: 0 },
    };
  },

  validationError(message: string, validationErrors?: unknown): ToolResult<never> {
    return this.failure("VALIDATION_ERROR", message, validationErrors);
  },

  approvalRequired(toolId: string): ToolResult<never> {
    return this.failure(
      "APPROVAL_REQUIRED",
      `Tool '${toolId}' runs only after the user approves the final summary`,
      { toolId }
    );
  },

  notFound(resourceType: string, identifier: string): ToolResult<never> {
    return this.failure(
      "NOT_FOUND",
      `${resourceType} '${identifier}' not found`,
      { resourceType, identifier }
    );
  },
};

export default ToolResultBuilder;
