// CLI approval handler - interactive 1/2/3 prompt

import readline from "readline";
import type { ApprovalDecision } from "../../../types/index.js";
import type { ApprovalDecider } from "../types.js";

/**
 * Line-oriented question/answer source.
 */
export interface Prompter {
  question(query: string): Promise<string>;
  close(): void;
}

export class InputClosedError extends Error {
  constructor() {
    super("Input stream closed");
    this.name = "InputClosedError";
  }
}

/**
 * Prompter backed by a readline interface.
 */
export class ReadlinePrompter implements Prompter {
  private rl: readline.Interface;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, output });
    this.rl.on("close", () => {
      this.closed = true;
    });
  }

  question(query: string): Promise<string> {
    if (this.closed) {
      return Promise.reject(new InputClosedError());
    }
    return new Promise((resolve, reject) => {
      const onClose = (): void => reject(new InputClosedError());
      this.rl.once("close", onClose);
      this.rl.question(query, (answer) => {
        this.rl.off("close", onClose);
        resolve(answer);
      });
    });
  }

  close(): void {
    this.rl.close();
  }
}

const DIVIDER = "═══════════════════════════════════════════════════";

const APPROVE_ANSWERS = new Set(["1", "ok", "y", "yes", "approve"]);
const REVISE_ANSWERS = new Set(["2", "revise", "edit", "修正"]);
const CANCEL_ANSWERS = new Set(["3", "cancel", "キャンセル"]);

/**
 * Interactive decider: shows the summary and asks for 1 (approve),
 * 2 (revise with feedback) or 3 (cancel).
 */
export class CLIApprovalDecider implements ApprovalDecider {
  constructor(
    private prompter: Prompter,
    private print: (line: string) => void = (line) => console.log(line)
  ) {}

  async decide(summary: string): Promise<ApprovalDecision> {
    this.print("");
    this.print("🛡️  Approval Required");
    this.print(DIVIDER);
    this.print(summary);
    this.print(DIVIDER);
    this.print("1. Approve and generate the document");
    this.print("2. Request changes");
    this.print("3. Cancel");

    for (;;) {
      const answer = (await this.prompter.question("Choose 1-3: ")).trim().toLowerCase();

      if (APPROVE_ANSWERS.has(answer)) {
        return { kind: "approve" };
      }

      if (CANCEL_ANSWERS.has(answer)) {
        return { kind: "cancel" };
      }

      if (REVISE_ANSWERS.has(answer)) {
        return this.askFeedback();
      }

      this.print("Please enter 1, 2 or 3.");
    }
  }

  /** Asks until the user describes a change or types CANCEL. */
  private async askFeedback(): Promise<ApprovalDecision> {
    for (;;) {
      const feedback = (await this.prompter.question("What should be changed? ")).trim();
      if (feedback.toUpperCase() === "CANCEL") {
        return { kind: "cancel" };
      }
      if (feedback) {
        return { kind: "revise", feedback };
      }
      this.print("Describe the change to request a revision.");
    }
  }
}
