// Base LLM Provider

import type { ILLMProvider, ChatCompletionParams, ChatCompletionResponse, LLMProviderConfig } from "../types.js";

export abstract class BaseLLMProvider implements ILLMProvider {
  protected config: LLMProviderConfig;

  constructor(config: LLMProviderConfig) {
    this.config = config;
  }

  abstract isAvailable(): boolean;
  abstract chatCompletion(params: ChatCompletionParams): Promise<ChatCompletionResponse>;
}
