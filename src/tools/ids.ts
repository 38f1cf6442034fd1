// Action identifiers known to the tool registry

export const ToolIds = {
  fareLookup: "fare.lookup",
  configUpdate: "config.update",
  renderTravel: "render.travel",
  renderReceipt: "render.receipt",
} as const;

export type ToolId = (typeof ToolIds)[keyof typeof ToolIds];
