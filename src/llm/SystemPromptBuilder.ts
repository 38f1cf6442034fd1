// System Prompt Builder for the dispatcher and workers

/**
 * Tool information shown to the model.
 */
export interface PromptToolInfo {
  id: string;
  description: string;
  schema: object;
}

/**
 * A field the worker collects.
 */
export interface PromptFieldInfo {
  name: string;
  description: string;
  required: boolean;
  scope: "header" | "item";
}

/**
 * Main configuration for SystemPromptBuilder.
 */
export interface SystemPromptConfig {
  identity: {
    name: string;
    description: string;
  };
  role: "dispatcher" | "worker";
  /** Handlers the dispatcher may route to */
  workers?: Array<{ type: string; description: string }>;
  /** Fields a worker collects */
  fields?: PromptFieldInfo[];
  /** Whether the worker collects a list of items */
  multiItem?: boolean;
  /** Business rules, one per line */
  rules?: string[];
  tools?: PromptToolInfo[];
  /** Current date, YYYY-MM-DD */
  today: string;
  /** Structured snapshot of what has been collected so far */
  state?: string;
}

const DISPATCHER_FORMAT = `
## Response Format

Reply with one JSON object and nothing else:
{"reply": "<message to the user>", "action": <optional action>}

Actions:
- {"type": "route", "workerType": "<type>"} when the request clearly belongs to one handler
- {"type": "clarify", "candidates": ["<type>", ...]} when it could belong to more than one; put the question in "reply"
- {"type": "tool", "toolId": "<id>", "input": {...}} when the user changes a setting listed under Tools

Omit "action" for greetings or questions you can answer directly.
`.trim();

const WORKER_FORMAT = `
## Response Format

Reply with one JSON object and nothing else:
{"reply": "<message to the user>", "action": <optional action>}

Actions:
- {"type": "collect", "fields": {...}, "items": [{"index": 1, "fields": {...}}], "noMoreItems": true}
  Record values the user stated in this turn. Item indexes start at 1; omit "index" to fill the item in progress.
  Set "noMoreItems" only when the user says there are no more items.
  Send {"type": "collect"} alone when the user confirms the collected values are correct.
- {"type": "tool", "toolId": "<id>", "input": {...}}
  Call a tool. Its result comes back as the next message, then answer again.

Omit "action" when you are only asking a question.
`.trim();

const GUIDELINES = `
## Guidelines
- Respond in the same language as the user
- Ask for one missing thing at a time
- Never invent values the user has not given
- Dates are written YYYY-MM-DD
`.trim();

/**
 * Builds structured system prompts for completion calls.
 */
export class SystemPromptBuilder {
  private config: SystemPromptConfig;

  constructor(config: SystemPromptConfig) {
    this.config = config;
  }

  build(): string {
    const sections: string[] = [];

    // 1. Identity declaration
    sections.push(this.buildIdentitySection());

    // 2. Routing targets or fields to collect
    if (this.config.role === "dispatcher") {
      sections.push(this.buildRoutingSection());
    } else {
      sections.push(this.buildFieldsSection());
    }

    // 3. Business rules (optional)
    if (this.config.rules && this.config.rules.length > 0) {
      sections.push(`## Rules\n${this.config.rules.map((rule) => `- ${rule}`).join("\n")}`);
    }

    // 4. Tools (optional)
    if (this.config.tools && this.config.tools.length > 0) {
      sections.push(this.buildToolsSection(this.config.tools));
    }

    sections.push(GUIDELINES);

    // 5. Response format
    sections.push(this.config.role === "dispatcher" ? DISPATCHER_FORMAT : WORKER_FORMAT);

    // 6. Runtime info (always at the end)
    sections.push(this.buildRuntimeSection());

    return sections.join("\n\n");
  }

  private buildIdentitySection(): string {
    const { name, description } = this.config.identity;
    return `You are ${name}, ${description}`;
  }

  private buildRoutingSection(): string {
    const workers = this.config.workers ?? [];
    if (workers.length === 0) {
      return "## Handlers\n\n(No handlers available)";
    }
    const list = workers.map((w) => `- \`${w.type}\`: ${w.description}`).join("\n");
    return `## Handlers\n\nRoute each request to exactly one of these handlers:\n${list}`;
  }

  private buildFieldsSection(): string {
    const fields = this.config.fields ?? [];
    const describe = (f: PromptFieldInfo): string =>
      `- \`${f.name}\`${f.required ? " (required)" : ""}: ${f.description}`;
    const header = fields.filter((f) => f.scope === "header").map(describe);
    const items = fields.filter((f) => f.scope === "item").map(describe);

    const parts = ["## Fields"];
    if (header.length > 0) {
      parts.push(header.join("\n"));
    }
    if (items.length > 0) {
      parts.push(
        this.config.multiItem
          ? `Each item (collect one item at a time, then ask whether there is another):\n${items.join("\n")}`
          : items.join("\n")
      );
    }
    return parts.join("\n\n");
  }

  private buildToolsSection(tools: PromptToolInfo[]): string {
    const list = tools
      .map((tool) => `### ${tool.id}\n${tool.description}\nInput schema: ${JSON.stringify(tool.schema)}`)
      .join("\n\n");
    return `## Tools\n\nTool ids are case-sensitive.\n\n${list}`;
  }

  private buildRuntimeSection(): string {
    const lines = [`## Runtime`, `Today: ${this.config.today}`];
    if (this.config.state) {
      lines.push(`Collected so far: ${this.config.state}`);
    }
    return lines.join("\n");
  }
}
