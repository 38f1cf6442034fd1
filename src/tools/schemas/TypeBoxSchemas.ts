// TypeBox Schema Definitions for Tool Input/Output
// Provides compile-time type safety and JSON Schema generation

import { Type, type Static } from "@sinclair/typebox";

export const FieldValueSchema = Type.Union([
  Type.String(),
  Type.Number(),
  Type.Boolean(),
  Type.Array(Type.String()),
]);

export const FieldMapSchema = Type.Record(Type.String(), FieldValueSchema);

// ============================================================================
// Fare lookup
// ============================================================================

/**
 * Input schema for fare.lookup tool
 */
export const FareLookupInputSchema = Type.Object({
  departure: Type.String({ minLength: 1, description: "Departure station or place" }),
  destination: Type.String({ minLength: 1, description: "Destination station or place" }),
  transportType: Type.String({ description: "train, bus, taxi or airplane" }),
});

export type FareLookupInput = Static<typeof FareLookupInputSchema>;

/**
 * Output schema for fare.lookup tool
 */
export const FareLookupOutputSchema = Type.Object({
  fare: Type.Integer({ minimum: 1 }),
  transportType: Type.String(),
  source: Type.Union([Type.Literal("route"), Type.Literal("fixed")]),
});

export type FareLookupOutput = Static<typeof FareLookupOutputSchema>;

// ============================================================================
// Session settings
// ============================================================================

/**
 * Input and output schema for the config.update tool
 */
export const SettingsUpdateSchema = Type.Object({
  setting: Type.Union([Type.Literal("applicantName"), Type.Literal("outputDirectory")], {
    description: "applicantName changes the name printed on documents; outputDirectory changes where they are written",
  }),
  value: Type.String({ minLength: 1 }),
});

export type SettingsUpdate = Static<typeof SettingsUpdateSchema>;

// ============================================================================
// Document rendering
// ============================================================================

/**
 * Input schema for render.* tools (the approved action params)
 */
export const RenderInputSchema = Type.Object({
  fields: FieldMapSchema,
  items: Type.Array(FieldMapSchema),
  total: Type.Integer({ minimum: 0 }),
});

export type RenderInput = Static<typeof RenderInputSchema>;

/**
 * Output schema for render.* tools
 */
export const RenderOutputSchema = Type.Object({
  artifactLocation: Type.String(),
});

export type RenderOutput = Static<typeof RenderOutputSchema>;
