/**
 * intakebot CLI - Main entry point
 */

import { Command, InvalidArgumentError } from "commander";
import type { CliOptions } from "./types.js";
import { chatCommand } from "./commands/chat.js";
import { sessionsDelete, sessionsList, sessionsShow } from "./commands/sessions.js";

/** Helper to get CLI options from a command */
function getCliOptions(command: Command): CliOptions {
  const opts = command.optsWithGlobals();
  return {
    json: opts.json === true,
    verbose: opts.verbose === true,
    config: typeof opts.config === "string" ? opts.config : undefined,
  };
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isFinite(limit) || limit < 0) {
    throw new InvalidArgumentError("Expected a non-negative amount.");
  }
  return limit;
}

/** Create CLI program */
export function createCli(): Command {
  const program = new Command();

  program
    .name("intakebot")
    .description("Conversational expense intake with a human approval gate")
    .version("0.1.0");

  // Global options
  program.option("--json", "Output in JSON format");
  program.option("--verbose", "Verbose output");
  program.option("-c, --config <path>", "Path to config.json");

  // Chat command
  program.command("chat")
    .description("Start or resume an intake session")
    .option("-s, --session <id>", "Resume this session, or start it under this id")
    .option("-p, --prefix <prefix>", "Prefix for a generated session id")
    .option("--auto-approve <limit>", "Approve totals up to <limit> without asking, cancel above", parseLimit)
    .action(async (options: { session?: string; prefix?: string; autoApprove?: number }, command: Command) => {
      process.exitCode = await chatCommand({ ...getCliOptions(command), ...options });
    });

  // Sessions commands
  const sessionsCmd = program.command("sessions")
    .description("Saved session management");

  sessionsCmd.command("list")
    .description("List saved sessions")
    .action(async (_options: unknown, command: Command) => {
      await sessionsList(getCliOptions(command));
    });

  sessionsCmd.command("show")
    .description("Show a saved session")
    .argument("<id>", "Session ID")
    .action(async (id: string, _options: unknown, command: Command) => {
      await sessionsShow(id, getCliOptions(command));
    });

  sessionsCmd.command("delete")
    .description("Delete a saved session")
    .argument("<id>", "Session ID")
    .action(async (id: string, _options: unknown, command: Command) => {
      await sessionsDelete(id, getCliOptions(command));
    });

  return program;
}

/** Run CLI */
export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = createCli();
  await program.parseAsync(argv);
}
