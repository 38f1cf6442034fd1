// Field validation rules for expense claims

import type { FieldValue, RulesConfig } from "../types/index.js";
import { err, ok, type Result } from "../utils/result.js";
import { addDays, toIsoDate } from "../utils/time.js";
import { normalizeTransport } from "./transport.js";

export interface ValidationError {
  field: string;
  message: string;
}

export interface DomainValidator {
  validate(field: string, value: unknown): Result<FieldValue, ValidationError>;
}

export const EXPENSE_CATEGORIES = ["事務用品費", "宿泊費", "資格精算費", "その他経費"] as const;

export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

const CATEGORY_ALIASES: Record<string, ExpenseCategory> = {
  "office supplies": "事務用品費",
  office_supplies: "事務用品費",
  supplies: "事務用品費",
  accommodation: "宿泊費",
  lodging: "宿泊費",
  hotel: "宿泊費",
  certification: "資格精算費",
  qualification: "資格精算費",
  exam: "資格精算費",
  other: "その他経費",
  others: "その他経費",
};

const DATE_PATTERNS = [/^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})$/, /^(\d{4})年(\d{1,2})月(\d{1,2})日$/];

const MAX_TEXT_LENGTH = 200;

export function validateDate(value: unknown, windowDays: number, today: Date): Result<string, string> {
  if (typeof value !== "string") {
    return err("Enter the date as YYYY-MM-DD");
  }

  const text = value.trim();
  const match = DATE_PATTERNS.map((pattern) => pattern.exec(text)).find((m) => m !== null);
  if (!match) {
    return err("Enter the date as YYYY-MM-DD");
  }

  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return err(`${text} is not a valid calendar date`);
  }

  const iso = toIsoDate(date);
  const latest = toIsoDate(today);
  const earliest = toIsoDate(addDays(today, -windowDays));
  if (iso > latest) {
    return err("The date cannot be in the future");
  }
  if (iso < earliest) {
    return err(`Only expenses from the last ${windowDays} days can be claimed (on or after ${earliest})`);
  }
  return ok(iso);
}

export function validateAmount(value: unknown, maxAmount: number): Result<number, string> {
  let amount: number;
  if (typeof value === "number") {
    amount = value;
  } else if (typeof value === "string") {
    const cleaned = value.replace(/[,¥￥円\s]/g, "");
    if (!/^\d+(\.\d+)?$/.test(cleaned)) {
      return err("Enter the amount as a number of yen");
    }
    amount = Number(cleaned);
  } else {
    return err("Enter the amount as a number of yen");
  }

  if (!Number.isFinite(amount) || amount <= 0) {
    return err("The amount must be greater than zero");
  }
  if (!Number.isInteger(amount)) {
    return err("The amount must be a whole number of yen");
  }
  if (amount > maxAmount) {
    return err(`Amounts over ¥${maxAmount.toLocaleString("en-US")} cannot be claimed`);
  }
  return ok(amount);
}

export function validateText(value: unknown, options: { allowEmpty?: boolean } = {}): Result<string, string> {
  if (typeof value !== "string" && typeof value !== "number") {
    return err("Enter this as text");
  }
  const text = String(value).trim();
  if (!text && !options.allowEmpty) {
    return err("This cannot be empty");
  }
  if (text.length > MAX_TEXT_LENGTH) {
    return err(`Keep this under ${MAX_TEXT_LENGTH} characters`);
  }
  return ok(text);
}

export function validateTransport(value: unknown): Result<string, string> {
  const transport = typeof value === "string" ? normalizeTransport(value) : undefined;
  if (!transport) {
    return err("Choose one of train, bus, taxi or airplane");
  }
  return ok(transport);
}

export function validateItemList(value: unknown): Result<string[], string> {
  let raw: unknown[];
  if (Array.isArray(value)) {
    raw = value;
  } else if (typeof value === "string") {
    raw = value.split(/[,、\n]/);
  } else {
    return err("List the purchased items");
  }

  const items: string[] = [];
  for (const entry of raw) {
    if (typeof entry !== "string") {
      return err("Each item must be text");
    }
    const text = entry.trim();
    if (text) {
      items.push(text);
    }
  }
  if (items.length === 0) {
    return err("List at least one purchased item");
  }
  return ok(items);
}

export function validateCategory(value: unknown): Result<ExpenseCategory, string> {
  if (typeof value === "string") {
    const text = value.trim();
    const exact = EXPENSE_CATEGORIES.find((category) => category === text);
    const category = exact ?? CATEGORY_ALIASES[text.toLowerCase()];
    if (category) {
      return ok(category);
    }
  }
  return err(`Choose one of ${EXPENSE_CATEGORIES.join(", ")}`);
}

export function validateBoolean(value: unknown): Result<boolean, string> {
  if (typeof value === "boolean") {
    return ok(value);
  }
  if (typeof value === "string") {
    const text = value.trim().toLowerCase();
    if (["yes", "y", "true", "はい"].includes(text)) {
      return ok(true);
    }
    if (["no", "n", "false", "いいえ"].includes(text)) {
      return ok(false);
    }
  }
  return err("Answer yes or no");
}

/**
 * Build the validator used by workers. Each field name maps to one rule;
 * unknown fields are rejected.
 */
export function createDomainValidator(rules: RulesConfig, now: () => Date = () => new Date()): DomainValidator {
  const rulesByField: Record<string, (value: unknown) => Result<FieldValue, string>> = {
    date: (value) => validateDate(value, rules.claimWindowDays, now()),
    amount: (value) => validateAmount(value, rules.maxAmount),
    cost: (value) => validateAmount(value, rules.maxAmount),
    departure: (value) => validateText(value),
    destination: (value) => validateText(value),
    transportType: validateTransport,
    purpose: (value) => validateText(value),
    storeName: (value) => validateText(value),
    notes: (value) => validateText(value, { allowEmpty: true }),
    items: validateItemList,
    expenseCategory: validateCategory,
    supervisorApproved: validateBoolean,
  };

  return {
    validate(field, value) {
      const rule = Object.prototype.hasOwnProperty.call(rulesByField, field) ? rulesByField[field] : undefined;
      if (!rule) {
        return err({ field, message: "Unknown field" });
      }
      const result = rule(value);
      return result.ok ? result : err({ field, message: result.error });
    },
  };
}
