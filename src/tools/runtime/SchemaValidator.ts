// Schema validation for tool inputs using TypeBox

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export interface SchemaIssue {
  path: string;
  message: string;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: SchemaIssue[] };

export class SchemaValidator {
  /**
   * Validate input against a TypeBox schema. On success the data is typed
   * as the schema's static type.
   */
  static validate<T extends TSchema>(schema: T, input: unknown): ValidationResult<Static<T>> {
    if (Value.Check(schema, input)) {
      return { success: true, data: input };
    }
    const errors = [...Value.Errors(schema, input)].map((e) => ({
      path: e.path || "/",
      message: e.message,
    }));
    return { success: false, errors };
  }

  /**
   * One line per issue, suitable for a tool result the model reads back.
   */
  static formatErrors(errors: SchemaIssue[]): string {
    return errors.map((e) => `${e.path}: ${e.message}`).join("\n");
  }
}
