/**
 * Chat command - interactive expense intake session
 */

import chalk from "chalk";
import { ensureStorageDirectories, loadConfig } from "../../config/index.js";
import { FareTable } from "../../domain/FareTable.js";
import { createDomainValidator } from "../../domain/validation.js";
import { parseControlCommand } from "../../dispatcher/Dispatcher.js";
import { LLMClient } from "../../llm/LLMClient.js";
import { CsvRenderer } from "../../render/CsvRenderer.js";
import { SessionRegistry } from "../../sessions/SessionRegistry.js";
import { SessionStore } from "../../sessions/SessionStore.js";
import { ApprovalGate } from "../../tools/approval/ApprovalGate.js";
import { CLIApprovalDecider, InputClosedError, ReadlinePrompter, type Prompter } from "../../tools/approval/handlers/cli-approval.js";
import { PolicyApprovalDecider } from "../../tools/approval/handlers/policy-approval.js";
import type { ApprovalDecider } from "../../tools/approval/types.js";
import { createToolRegistry } from "../../tools/index.js";
import type { SystemConfig } from "../../types/index.js";
import { ErrorSanitizer } from "../../utils/error-sanitizer.js";
import { Logger } from "../../utils/logger.js";
import type { ChatOptions } from "../types.js";
import { printError, printHeader, printInfo, printResponse, printWarning } from "../utils/output.js";

/**
 * Wire the collaborators of one chat process.
 */
async function createRegistry(
  config: SystemConfig,
  logger: Logger,
  decider: ApprovalDecider,
  completion: LLMClient
): Promise<SessionRegistry> {
  const fareTable = await FareTable.load(config.storage.fareDataPath);
  const renderer = new CsvRenderer(config.storage.outputPath, logger);
  const tools = createToolRegistry({ fareTable, renderer, logger });
  const gate = new ApprovalGate(
    {
      decider,
      sideEffecting: tools.sideEffectingIds(),
      maxDecisionAttempts: config.approval.maxDecisionAttempts,
    },
    logger
  );

  return new SessionRegistry({
    completion,
    gate,
    tools,
    validator: createDomainValidator(config.rules),
    store: new SessionStore(config.storage.sessionsPath, logger),
    logger,
    config,
  });
}

/**
 * Ask for the requester's name until a non-empty one is given.
 * Returns false when the user asked to exit instead.
 */
async function askName(registry: SessionRegistry, sessionId: string, prompter: Prompter): Promise<boolean> {
  for (;;) {
    const name = await prompter.question(chalk.bold("Your name: "));
    if (parseControlCommand(name) === "exit") {
      return false;
    }
    const response = await registry.identify(sessionId, name);
    printResponse(response);
    if (response.kind !== "identity_required") {
      return true;
    }
  }
}

/**
 * Run the REPL. Resolves to the process exit code.
 */
export async function chatCommand(options: ChatOptions): Promise<number> {
  const config = loadConfig(options.config);
  ensureStorageDirectories(config);
  const logger = new Logger(config, "cli", {
    console: options.verbose ?? false,
    level: options.verbose ? "debug" : undefined,
  });

  const completion = new LLMClient(logger, config.llm);
  if (!completion.isAvailable()) {
    printError("No OpenAI API key configured. Set OPENAI_API_KEY or llm.apiKey in config.json.");
    return 1;
  }

  const prompter = new ReadlinePrompter();
  const decider: ApprovalDecider =
    options.autoApprove === undefined
      ? new CLIApprovalDecider(prompter)
      : new PolicyApprovalDecider({ maxTotal: options.autoApprove });

  try {
    const registry = await createRegistry(config, logger, decider, completion);
    const opened = await registry.open({ sessionId: options.session, prefix: options.prefix });

    printHeader("intakebot");
    printInfo(`Session ${opened.sessionId}${opened.resumed ? " (resumed)" : ""}`);
    printInfo("Type 'exit' to leave or 'reset' to start over.");
    if (opened.notice) {
      printWarning(opened.notice);
    }

    const identified = Boolean(registry.get(opened.sessionId)?.getSession().requesterId);
    if (!identified && !(await askName(registry, opened.sessionId, prompter))) {
      await registry.close(opened.sessionId);
      return 0;
    }

    const resumed = await registry.resume(opened.sessionId);
    if (resumed) {
      printResponse(resumed);
    }

    for (;;) {
      const input = (await prompter.question(chalk.bold("> "))).trim();
      if (!input) {
        continue;
      }

      const response = await registry.handle(opened.sessionId, input);
      printResponse(response);

      if (response.kind === "exit") {
        await registry.close(opened.sessionId);
        return 0;
      }
      if (response.kind === "identity_required" && !(await askName(registry, opened.sessionId, prompter))) {
        await registry.close(opened.sessionId);
        return 0;
      }
    }
  } catch (error) {
    if (error instanceof InputClosedError) {
      return 0;
    }
    logger.forLayer("cli").logError("chat", error);
    printError(ErrorSanitizer.sanitize(error).message);
    return 1;
  } finally {
    prompter.close();
  }
}
