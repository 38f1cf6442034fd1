/**
 * SchemaValidator Unit Tests
 *
 * Tests for TypeBox-backed tool input validation.
 */

import { describe, it, expect } from "vitest";
import { SchemaValidator } from "./SchemaValidator.js";
import { FareLookupInputSchema, RenderInputSchema } from "../schemas/TypeBoxSchemas.js";

describe("SchemaValidator", () => {
  it("should return typed data for valid input", () => {
    const input = { departure: "東京", destination: "新宿", transportType: "train" };
    const result = SchemaValidator.validate(FareLookupInputSchema, input);

    expect(result).toEqual({ success: true, data: input });
  });

  it("should report the path of a missing property", () => {
    const result = SchemaValidator.validate(FareLookupInputSchema, { departure: "東京", transportType: "train" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map((e) => e.path)).toContain("/destination");
    }
  });

  it("should reject field values outside the allowed union", () => {
    const result = SchemaValidator.validate(RenderInputSchema, {
      fields: { purpose: { nested: true } },
      items: [],
      total: 0,
    });

    expect(result.success).toBe(false);
  });

  it("should format one line per issue", () => {
    expect(
      SchemaValidator.formatErrors([
        { path: "/a", message: "Expected string" },
        { path: "/b", message: "Expected number" },
      ])
    ).toBe("/a: Expected string\n/b: Expected number");
  });
});
