// Dispatcher types

import type { DomainValidator } from "../domain/validation.js";
import type { CompletionCollaborator } from "../llm/types.js";
import type { SessionPersistence } from "../sessions/SessionStore.js";
import type { ApprovalGate } from "../tools/approval/ApprovalGate.js";
import type { ToolRegistry } from "../tools/runtime/ToolRegistry.js";
import type { SystemConfig, WorkerMachineState, WorkerType } from "../types/index.js";
import type { Logger } from "../utils/logger.js";

export type DispatchKind =
  | "reply"
  | "identity_required"
  | "clarify"
  | "completed"
  | "cancelled"
  | "render_failed"
  | "error"
  | "exit";

export interface DispatchResponse {
  kind: DispatchKind;
  text: string;
  sessionId: string;
  workerType?: WorkerType;
  workerState?: WorkerMachineState;
  artifactLocation?: string;
  errorCode?: string;
}

export type ControlCommand = "exit" | "reset";

export interface DispatcherDeps {
  completion: CompletionCollaborator;
  gate: ApprovalGate;
  tools: ToolRegistry;
  validator: DomainValidator;
  store: Pick<SessionPersistence, "save">;
  logger: Logger;
  config: SystemConfig;
  now?: () => Date;
}
