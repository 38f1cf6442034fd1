// Common formatting utilities for approval summaries

import type { FieldValue } from "../../../types/index.js";

/**
 * Truncate a string to a maximum length.
 */
export function truncateString(str: string, maxLength: number): string {
  if (str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - 3) + "...";
}

export function formatAmount(amount: number): string {
  return `¥${amount.toLocaleString("en-US")}`;
}

export function formatFieldValue(value: FieldValue | undefined): string {
  if (value === undefined) {
    return "-";
  }
  if (Array.isArray(value)) {
    return value.length > 0 ? value.join(", ") : "-";
  }
  if (typeof value === "boolean") {
    return value ? "yes" : "no";
  }
  return truncateString(String(value), 200);
}

/**
 * Render a titled block of `label: value` lines.
 */
export function formatSection(title: string, rows: Array<[string, string]>): string {
  const width = Math.max(0, ...rows.map(([label]) => label.length));
  const lines = rows.map(([label, value]) => `  ${`${label}:`.padEnd(width + 1)} ${value}`);
  return [title, ...lines].join("\n");
}
