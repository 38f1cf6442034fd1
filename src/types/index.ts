// Core Types for the intakebot runtime

// ============================================================================
// Configuration
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface StorageConfig {
  sessionsPath: string;
  logsPath: string;
  /** Directory rendered expense documents are written to */
  outputPath: string;
  /** Fare table consulted by the fare lookup tool */
  fareDataPath: string;
}

export interface HistoryConfig {
  dispatcher: number;
  worker: number;
}

export interface LoopLimitsConfig {
  dispatcher: number;
  worker: number;
}

export interface ApprovalConfig {
  /** How many times the decider is asked again after an invalid decision */
  maxDecisionAttempts: number;
}

export interface RulesConfig {
  maxAmount: number;
  supervisorApprovalThreshold: number;
  claimWindowDays: number;
  /** Station pairs covered by a commuter pass; either direction is refused */
  commuterRoutes: Array<[string, string]>;
}

export interface LLMConfig {
  apiKey?: string;
  baseURL?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface SystemConfig {
  storage: StorageConfig;
  history: HistoryConfig;
  loopLimits: LoopLimitsConfig;
  approval: ApprovalConfig;
  rules: RulesConfig;
  llm?: LLMConfig;
  logLevel: LogLevel;
}

// ============================================================================
// Logging
// ============================================================================

/**
 * Service layers for log tagging.
 */
export type ServiceLayer =
  | "dispatcher"
  | "worker"
  | "approval"
  | "session"
  | "llm"
  | "config"
  | "cli"
  | "render"
  | "tools";

export interface TraceContext {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  layer: ServiceLayer;
  startTime: number;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
  layer?: ServiceLayer;
  traceId?: string;
  spanId?: string;
  parentSpanId?: string;
}

// ============================================================================
// Conversation
// ============================================================================

export type ConversationRole = "user" | "agent" | "tool";

export interface ConversationTurn {
  /** Monotonic position within its window; survives eviction of earlier turns */
  ordinal: number;
  role: ConversationRole;
  content: string;
  timestamp: number;
  pinned?: boolean;
}

// ============================================================================
// Workers
// ============================================================================

export const WORKER_TYPES = ["travel", "receipt"] as const;

export type WorkerType = (typeof WORKER_TYPES)[number];

export type WorkerMachineState =
  | "Idle"
  | "CollectingFields"
  | "ReadyForAction"
  | "AwaitingApproval"
  | "Completed"
  | "Cancelled"
  | "Error";

export type FieldValue = string | number | boolean | string[];

export type FieldMap = Record<string, FieldValue>;

export interface FieldError {
  field: string;
  /** 1-based item number for multi-item workers */
  item?: number;
  message: string;
}

/**
 * Parameters handed to a render action. Built by the worker from its
 * collected fields; never carries requester identity.
 */
export interface ActionParams {
  fields: FieldMap;
  items: FieldMap[];
  total: number;
}

export type PendingActionStatus = "requested" | "approved" | "revised" | "cancelled";

export interface PendingAction {
  id: string;
  actionId: string;
  params: Readonly<ActionParams>;
  workerType: WorkerType;
  originState: WorkerMachineState;
  /** Ordinal of the worker history turn pinned while the action is unresolved */
  originOrdinal?: number;
  summary: string;
  status: PendingActionStatus;
  createdAt: number;
  resolvedAt?: number;
}

export type ApprovalDecision =
  | { kind: "approve" }
  | { kind: "revise"; feedback: string }
  | { kind: "cancel" };

export interface WorkerState {
  type: WorkerType;
  state: WorkerMachineState;
  fields: FieldMap;
  items: FieldMap[];
  itemsClosed: boolean;
  pendingAction?: PendingAction;
  lastErrors: FieldError[];
}

// ============================================================================
// Sessions
// ============================================================================

export interface Session {
  id: string;
  requesterId?: string;
  activeWorker?: WorkerType;
  /** Overrides the configured output path for this session's documents */
  outputDirectory?: string;
  /** ISO date (YYYY-MM-DD) of the first turn, printed on generated documents */
  applicationDate: string;
  createdAt: number;
  updatedAt: number;
}

export interface PersistedWorker {
  state: WorkerState;
  history: ConversationTurn[];
}

export interface SessionRecord {
  version: 1;
  session: Session;
  dispatcher: {
    history: ConversationTurn[];
  };
  workers: {
    travel?: PersistedWorker;
    receipt?: PersistedWorker;
  };
}

export interface SessionSummary {
  id: string;
  requesterId?: string;
  activeWorker?: WorkerType;
  workerState?: WorkerMachineState;
  updatedAt: number;
}

// ============================================================================
// Tools
// ============================================================================

export interface ToolMeta {
  durationMs: number;
  artifacts?: string[];
}

export interface ToolResult<T = unknown> {
  ok: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  meta: ToolMeta;
}
