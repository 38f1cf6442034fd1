/**
 * Output formatting utilities for CLI
 */

import Table from "cli-table3";
import chalk from "chalk";
import type { DispatchResponse } from "../../dispatcher/types.js";
import type { OutputFormat } from "../types.js";

type TableData = Record<string, unknown> | Array<Record<string, unknown>>;

/** Format output based on format type */
export function formatOutput(data: TableData, format: OutputFormat = "table"): string {
  if (format === "json") {
    return JSON.stringify(data, null, 2);
  }
  return formatAsTable(data);
}

/** Format rows or a single object as a table */
export function formatAsTable(data: TableData): string {
  // Handle arrays
  if (Array.isArray(data)) {
    if (data.length === 0) return "No data";

    const keys = Object.keys(data[0]);
    const table = new Table({
      head: keys.map((k) => chalk.cyan(k)),
    });

    for (const item of data) {
      table.push(keys.map((k) => formatValue(item[k])));
    }

    return table.toString();
  }

  // Handle single object
  const table = new Table({
    colWidths: [24, 56],
    wordWrap: true,
  });

  for (const [key, value] of Object.entries(data)) {
    table.push([chalk.cyan(key), formatValue(value)]);
  }

  return table.toString();
}

/** Format a value for display */
export function formatValue(value: unknown): string {
  if (value === null) return chalk.gray("null");
  if (value === undefined) return chalk.gray("-");
  if (typeof value === "boolean") return value ? chalk.green("true") : chalk.red("false");
  if (typeof value === "number") return String(value);
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((v) => (typeof v === "string" ? v : JSON.stringify(v))).join(", ");
  return JSON.stringify(value);
}

/** Print an agent reply according to its kind */
export function printResponse(response: DispatchResponse): void {
  switch (response.kind) {
    case "completed":
      printSuccess(response.text);
      break;
    case "cancelled":
      printWarning(response.text);
      break;
    case "error":
    case "render_failed":
      printError(response.text);
      break;
    default:
      console.log(chalk.magenta("bot:"), response.text);
  }
}

/** Print success message */
export function printSuccess(message: string): void {
  console.log(chalk.green("✓"), message);
}

/** Print error message */
export function printError(message: string): void {
  console.error(chalk.red("✗"), message);
}

/** Print warning message */
export function printWarning(message: string): void {
  console.warn(chalk.yellow("⚠"), message);
}

/** Print info message */
export function printInfo(message: string): void {
  console.log(chalk.blue("ℹ"), message);
}

/** Print header */
export function printHeader(title: string): void {
  console.log("\n" + chalk.bold.cyan(title));
  console.log(chalk.gray("─".repeat(50)));
}
