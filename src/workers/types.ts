// Worker types

import type { ContextBag } from "../context/ContextBag.js";
import type { DomainValidator } from "../domain/validation.js";
import type { HistoryWindow } from "../history/HistoryWindow.js";
import type { CompletionCollaborator } from "../llm/types.js";
import type { ApprovalGate } from "../tools/approval/ApprovalGate.js";
import type { ApplySettings } from "../tools/settings/SettingsTool.js";
import type { ToolRegistry } from "../tools/runtime/ToolRegistry.js";
import type {
  PersistedWorker,
  SystemConfig,
  WorkerMachineState,
  WorkerState,
  WorkerType,
} from "../types/index.js";
import type { Logger } from "../utils/logger.js";

export type WorkerOutcomeKind = "reply" | "completed" | "cancelled" | "render_failed";

/**
 * What one call to `advance` produced.
 */
export interface WorkerOutcome {
  kind: WorkerOutcomeKind;
  text: string;
  state: WorkerMachineState;
  artifactLocation?: string;
}

export interface FieldSpec {
  name: string;
  description: string;
  required: boolean;
  /** Header fields belong to the claim, item fields to each line of a multi-item claim */
  scope: "header" | "item";
}

export interface WorkerDefinition {
  type: WorkerType;
  displayName: string;
  /** Noun phrase naming the claims handled, shown when routing */
  description: string;
  /** Side-effecting tool requested once every field is complete */
  renderActionId: string;
  multiItem: boolean;
  fields: FieldSpec[];
  /** Tools the model may call while collecting */
  toolIds: string[];
  /** Extra instructions for the completion prompt */
  promptRules: string[];
  /** Asked after each completed item while the list is open */
  anotherItemQuestion?: string;
}

export interface WorkerDeps {
  completion: CompletionCollaborator;
  gate: ApprovalGate;
  tools: ToolRegistry;
  validator: DomainValidator;
  logger: Logger;
  config: SystemConfig;
  /** Persist the owning session; called before blocking on the gate */
  checkpoint?: () => Promise<void>;
  /** Store a config.update result on the owning session */
  updateSettings?: ApplySettings;
  now?: () => Date;
}

export interface Worker {
  readonly type: WorkerType;
  readonly definition: WorkerDefinition;
  readonly history: HistoryWindow;

  getState(): Readonly<WorkerState>;

  /** True while the worker holds an unfinished claim */
  isActive(): boolean;

  advance(input: string, context: ContextBag): Promise<WorkerOutcome>;

  /** Re-present a pending action restored from disk; null when there is none */
  resume(context: ContextBag): Promise<WorkerOutcome | null>;

  reset(): void;

  toJSON(): PersistedWorker;
}

export type WorkerFactory = (deps: WorkerDeps, persisted?: PersistedWorker) => Worker;
