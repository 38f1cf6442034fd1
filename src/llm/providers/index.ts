// LLM Provider exports

export { BaseLLMProvider } from "./BaseLLMProvider.js";
export { OpenAIProvider, DEFAULT_OPENAI_MODEL } from "./OpenAIProvider.js";
