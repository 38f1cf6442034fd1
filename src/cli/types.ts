/**
 * CLI types and interfaces
 */

/** CLI command options */
export interface CliOptions {
  json?: boolean;
  verbose?: boolean;
  /** Path to config.json */
  config?: string;
}

/** Output format */
export type OutputFormat = "table" | "json";

/** Options for the chat command */
export interface ChatOptions extends CliOptions {
  /** Resume or start this session id */
  session?: string;
  /** Prefix for generated session ids */
  prefix?: string;
  /** Decide approvals unattended: approve totals up to this amount, cancel above */
  autoApprove?: number;
}

/** One row of `sessions list` */
export interface SessionRow {
  id: string;
  requester: string;
  worker: string;
  state: string;
  updated: string;
}
