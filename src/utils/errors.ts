// Error taxonomy shared by the dispatcher, workers, gate and store

export type AgentErrorCode =
  | "CLASSIFICATION_AMBIGUOUS"
  | "FIELD_VALIDATION_FAILED"
  | "RENDER_FAILED"
  | "SESSION_CORRUPT"
  | "LOOP_LIMIT_EXCEEDED"
  | "GATE_PROTOCOL_VIOLATION"
  | "COLLABORATOR_FAILED";

/**
 * Base error for every failure the runtime raises.
 *
 * `userMessage` is safe to show at the turn boundary; `internalMessage`
 * carries detail for the log only.
 */
export class AgentError extends Error {
  readonly code: AgentErrorCode;
  readonly userMessage: string;
  readonly internalMessage?: string;

  constructor(
    code: AgentErrorCode,
    userMessage: string,
    options: { internalMessage?: string; cause?: unknown } = {}
  ) {
    super(options.internalMessage ?? userMessage, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.userMessage = userMessage;
    this.internalMessage = options.internalMessage;
  }
}

export class ClassificationAmbiguous extends AgentError {
  constructor(question: string, options?: { internalMessage?: string }) {
    super("CLASSIFICATION_AMBIGUOUS", question, options);
  }
}

export class FieldValidationFailed extends AgentError {
  readonly errors: ReadonlyArray<{ field: string; item?: number; message: string }>;

  constructor(errors: ReadonlyArray<{ field: string; item?: number; message: string }>) {
    super(
      "FIELD_VALIDATION_FAILED",
      errors
        .map((e) => `${e.item !== undefined ? `Item ${e.item}: ` : ""}${e.field}: ${e.message}`)
        .join("\n")
    );
    this.errors = errors;
  }
}

export class RenderFailed extends AgentError {
  constructor(internalMessage: string) {
    super(
      "RENDER_FAILED",
      "The document could not be generated. Your entries are kept; send any message to try again.",
      { internalMessage }
    );
  }
}

export class SessionCorrupt extends AgentError {
  readonly sessionId: string;

  constructor(sessionId: string, internalMessage: string, cause?: unknown) {
    super("SESSION_CORRUPT", "The saved session could not be read. A new session was started.", {
      internalMessage,
      cause,
    });
    this.sessionId = sessionId;
  }
}

export class LoopLimitExceeded extends AgentError {
  constructor(owner: string, limit: number) {
    super(
      "LOOP_LIMIT_EXCEEDED",
      "That took too many steps to work out. Please rephrase or give the details one at a time.",
      { internalMessage: `${owner} exceeded ${limit} completion calls in one turn` }
    );
  }
}

export class GateProtocolViolation extends AgentError {
  constructor(internalMessage: string) {
    super("GATE_PROTOCOL_VIOLATION", "The approval step was used incorrectly.", { internalMessage });
  }
}

export class CollaboratorFailed extends AgentError {
  constructor(collaborator: string, cause: unknown) {
    super("COLLABORATOR_FAILED", "Something went wrong while processing your request. Please try again.", {
      internalMessage: `${collaborator} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause,
    });
  }
}

/**
 * Errors that end the turn instead of being converted to a reply.
 */
export function isHardFailure(error: unknown): boolean {
  return error instanceof GateProtocolViolation || error instanceof SessionCorrupt;
}

/**
 * Normalize anything thrown by a collaborator into an AgentError.
 */
export function toAgentError(error: unknown, collaborator: string): AgentError {
  if (error instanceof AgentError) {
    return error;
  }
  return new CollaboratorFailed(collaborator, error);
}
