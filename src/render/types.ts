// Render collaborator types

import type { ContextBag } from "../context/ContextBag.js";
import type { ActionParams } from "../types/index.js";

export interface RenderResult {
  success: boolean;
  artifactLocation?: string;
  errorMessage?: string;
}

/**
 * Produces the expense document for an approved action.
 * Requester identity comes from the context, never from params.
 */
export interface Renderer {
  render(actionId: string, params: Readonly<ActionParams>, context: ContextBag): Promise<RenderResult>;
}
