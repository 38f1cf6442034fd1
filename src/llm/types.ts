// LLM Provider and completion collaborator types

import { z } from "zod";
import type { ConversationTurn } from "../types/index.js";

export interface LLMProviderConfig {
  apiKey?: string;
  model?: string;
  baseURL?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ILLMProvider {
  isAvailable(): boolean;
  chatCompletion(params: ChatCompletionParams): Promise<ChatCompletionResponse>;
}

export interface ChatCompletionParams {
  model?: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
  /** Ask the provider for a JSON object response */
  jsonMode?: boolean;
}

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatCompletionResponse {
  content: string;
  model?: string;
}

// ============================================================================
// Structured actions
// ============================================================================

const FieldUpdatesSchema = z.record(z.unknown());

export const StructuredActionSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("route"),
    workerType: z.string().min(1),
  }),
  z.object({
    type: z.literal("clarify"),
    candidates: z.array(z.string()).optional(),
  }),
  z.object({
    type: z.literal("collect"),
    fields: FieldUpdatesSchema.optional(),
    items: z
      .array(
        z.object({
          index: z.number().int().positive().optional(),
          fields: FieldUpdatesSchema,
        })
      )
      .optional(),
    noMoreItems: z.boolean().optional(),
  }),
  z.object({
    type: z.literal("tool"),
    toolId: z.string().min(1),
    input: FieldUpdatesSchema.default({}),
  }),
]);

export type StructuredAction = z.infer<typeof StructuredActionSchema>;

export type CollectAction = Extract<StructuredAction, { type: "collect" }>;

export type ToolAction = Extract<StructuredAction, { type: "tool" }>;

export const ResponseEnvelopeSchema = z.object({
  reply: z.string(),
  action: z.unknown().optional(),
});

// ============================================================================
// Completion collaborator
// ============================================================================

export interface CompletionRequest {
  /** Who is asking; used for logging only */
  purpose: string;
  systemPrompt: string;
  /** Bounded history supplied by the caller on every call */
  history: readonly ConversationTurn[];
}

export interface CompletionResult {
  responseText: string;
  structuredAction?: StructuredAction;
}

/**
 * Stateless text completion. Implementations never keep conversation state.
 */
export interface CompletionCollaborator {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}
