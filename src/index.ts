// Main entry point

export * from "./types/index.js";
export * from "./config/index.js";
export * from "./context/ContextBag.js";
export * from "./history/HistoryWindow.js";
export * from "./dispatcher/Dispatcher.js";
export * from "./dispatcher/types.js";
export * from "./workers/index.js";
export * from "./sessions/SessionStore.js";
export * from "./sessions/SessionRegistry.js";
export * from "./tools/index.js";
export { ApprovalGate } from "./tools/approval/ApprovalGate.js";
export type { ApprovalDecider } from "./tools/approval/types.js";
export { CLIApprovalDecider, ReadlinePrompter } from "./tools/approval/handlers/cli-approval.js";
export { PolicyApprovalDecider } from "./tools/approval/handlers/policy-approval.js";
export { LLMClient } from "./llm/LLMClient.js";
export type { CompletionCollaborator, CompletionRequest, CompletionResult } from "./llm/types.js";
export { CsvRenderer } from "./render/CsvRenderer.js";
export type { Renderer, RenderResult } from "./render/types.js";
export { FareTable } from "./domain/FareTable.js";
export { createDomainValidator } from "./domain/validation.js";
export * from "./utils/errors.js";
export * from "./utils/logger.js";
