// LLM Client - stateless completion collaborator

import type { ConversationTurn, LLMConfig } from "../types/index.js";
import { CollaboratorFailed } from "../utils/errors.js";
import type { LayerLogger, Logger } from "../utils/logger.js";
import { OpenAIProvider } from "./providers/index.js";
import {
  ResponseEnvelopeSchema,
  StructuredActionSchema,
  type ChatMessage,
  type CompletionCollaborator,
  type CompletionRequest,
  type CompletionResult,
  type ILLMProvider,
} from "./types.js";

const CODE_BLOCK = /```(?:json)?\s*\n?([\s\S]*?)\n?```/;

function extractJson(content: string): unknown {
  const match = content.match(CODE_BLOCK);
  const text = (match ? match[1] : content).trim();
  if (!text.startsWith("{")) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parse a raw model response into reply text and an optional action.
 * Text that is not a JSON envelope is taken as a plain reply; an envelope
 * whose action does not validate keeps its reply and drops the action.
 */
export function parseCompletion(content: string, logger?: LayerLogger): CompletionResult {
  const envelope = ResponseEnvelopeSchema.safeParse(extractJson(content));
  if (!envelope.success) {
    return { responseText: content.trim() };
  }

  const { reply, action } = envelope.data;
  if (action === undefined || action === null) {
    return { responseText: reply };
  }

  const parsed = StructuredActionSchema.safeParse(action);
  if (!parsed.success) {
    logger?.warn("Dropping malformed action from completion", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
    return { responseText: reply };
  }
  return { responseText: reply, structuredAction: parsed.data };
}

export function toChatMessages(systemPrompt: string, history: readonly ConversationTurn[]): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: "system", content: systemPrompt }];
  for (const turn of history) {
    switch (turn.role) {
      case "user":
        messages.push({ role: "user", content: turn.content });
        break;
      case "agent":
        messages.push({ role: "assistant", content: turn.content });
        break;
      case "tool":
        messages.push({ role: "user", content: `Tool result: ${turn.content}` });
        break;
    }
  }
  return messages;
}

export class LLMClient implements CompletionCollaborator {
  private provider: ILLMProvider;
  private logger: LayerLogger;

  constructor(logger: Logger, config: LLMConfig = {}, provider?: ILLMProvider) {
    this.logger = logger.forLayer("llm");
    this.provider = provider ?? new OpenAIProvider(config);

    if (this.provider.isAvailable()) {
      this.logger.info("LLM client initialized", { model: config.model });
    } else {
      this.logger.warn("LLM client not available (no API key configured)");
    }
  }

  isAvailable(): boolean {
    return this.provider.isAvailable();
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const startTime = Date.now();
    this.logger.logInput(`complete:${request.purpose}`, { turns: request.history.length });

    let content: string;
    try {
      const response = await this.provider.chatCompletion({
        messages: toChatMessages(request.systemPrompt, request.history),
        jsonMode: true,
      });
      content = response.content;
    } catch (error) {
      this.logger.logError(`complete:${request.purpose}`, error, startTime);
      throw new CollaboratorFailed("llm", error);
    }

    const result = parseCompletion(content, this.logger);
    this.logger.logOutput(`complete:${request.purpose}`, { action: result.structuredAction?.type }, startTime);
    return result;
  }
}
