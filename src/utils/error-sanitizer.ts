// Error message sanitization to prevent information disclosure

import { AgentError } from "./errors.js";

export interface SanitizedError {
  code: string;
  message: string;
}

/**
 * Sanitize error messages before they reach the user.
 *
 * Security rules:
 * - Remove file paths
 * - Remove stack trace frames
 * - Generic messages for credential errors (e.g. a rejected API key)
 * - Preserve error codes for debugging
 *
 * @example
 * const original = new Error("Failed at /home/user/project/src/file.ts:42");
 * const sanitized = ErrorSanitizer.sanitize(original);
 * // Returns: { code: 'UNKNOWN', message: 'Failed at [path]file.ts:42' }
 */
export class ErrorSanitizer {
  private static readonly SENSITIVE_PATTERNS = [
    /\/[a-zA-Z0-9_\-/.]+\//g, // Unix paths: /home/user/project/
    /[a-zA-Z]:\\[a-zA-Z0-9_\-\\.]+\\/g, // Windows paths: C:\Users\project\
    /at .*\(.*:\d+:\d+\)/g, // Stack traces: at functionName (file.js:10:5)
  ];

  private static readonly AUTH_KEYWORDS = [
    "api key", "apikey", "unauthorized", "forbidden", "credential",
  ];

  /**
   * Sanitize an error. AgentErrors keep their code and expose only their
   * user message; anything else is scrubbed.
   */
  static sanitize(error: unknown): SanitizedError {
    if (error instanceof AgentError) {
      return { code: error.code, message: this.scrub(error.userMessage) };
    }

    const message = error instanceof Error ? error.message : String(error);

    if (this.isAuthError(message)) {
      return {
        code: "AUTH_FAILED",
        message: "Authentication with the language model failed",
      };
    }

    return {
      code: "UNKNOWN",
      message: this.scrub(message),
    };
  }

  /**
   * Remove sensitive patterns (paths, stack frames).
   */
  static scrub(message: string): string {
    let sanitized = message;
    for (const pattern of this.SENSITIVE_PATTERNS) {
      sanitized = sanitized.replace(pattern, "[path]");
    }
    return sanitized;
  }

  private static isAuthError(message: string): boolean {
    const lowerMessage = message.toLowerCase();
    return this.AUTH_KEYWORDS.some((keyword) => lowerMessage.includes(keyword));
  }
}
