// CSV renderer for expense documents

import fs from "fs/promises";
import path from "path";
import { randomUUID } from "crypto";
import { ContextKeys, readContextString, type ContextBag } from "../context/ContextBag.js";
import { ToolIds } from "../tools/ids.js";
import type { ActionParams, FieldMap, FieldValue } from "../types/index.js";
import type { LayerLogger, Logger } from "../utils/logger.js";
import { formatCompactTimestamp, toIsoDate } from "../utils/time.js";
import type { RenderResult, Renderer } from "./types.js";

type Row = Array<string | number>;

interface Layout {
  filePrefix: string;
  rows(params: Readonly<ActionParams>, header: Row[]): Row[];
}

// Excel opens UTF-8 CSV correctly only with a byte order mark.
const BOM = "\uFEFF";

// Spreadsheets evaluate text cells starting with these as formulas.
const FORMULA_PREFIX = /^[=+\-@\t\r]/;

export function escapeCsvCell(value: string | number): string {
  const text = typeof value === "string" && FORMULA_PREFIX.test(value) ? `'${value}` : String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function toCsv(rows: Row[]): string {
  return rows.map((row) => row.map(escapeCsvCell).join(",")).join("\r\n") + "\r\n";
}

function cell(value: FieldValue | undefined): string | number {
  if (value === undefined) {
    return "";
  }
  if (Array.isArray(value)) {
    return value.join("; ");
  }
  if (typeof value === "boolean") {
    return value ? "yes" : "no";
  }
  return value;
}

function supervisorRow(fields: FieldMap): Row[] {
  return fields.supervisorApproved === undefined ? [] : [["Supervisor approval", cell(fields.supervisorApproved)]];
}

const LAYOUTS: Record<string, Layout> = {
  [ToolIds.renderTravel]: {
    filePrefix: "travel_expense",
    rows: (params, header) => [
      ["Travel Expense Report"],
      ...header,
      ["Purpose", cell(params.fields.purpose)],
      ...supervisorRow(params.fields),
      [],
      ["No.", "Date", "Departure", "Destination", "Transport", "Cost", "Notes"],
      ...params.items.map((item, index): Row => [
        index + 1,
        cell(item.date),
        cell(item.departure),
        cell(item.destination),
        cell(item.transportType),
        cell(item.cost),
        cell(item.notes),
      ]),
      ["Total", "", "", "", "", params.total, ""],
    ],
  },
  [ToolIds.renderReceipt]: {
    filePrefix: "receipt_expense",
    rows: (params, header) => [
      ["Receipt Expense Report"],
      ...header,
      ["Store", cell(params.fields.storeName)],
      ["Receipt date", cell(params.fields.date)],
      ["Items", cell(params.fields.items)],
      ["Category", cell(params.fields.expenseCategory)],
      ["Purpose", cell(params.fields.purpose)],
      ["Amount", params.total],
      ...supervisorRow(params.fields),
    ],
  },
};

export class CsvRenderer implements Renderer {
  private logger: LayerLogger;

  constructor(
    private outputDir: string,
    logger: Logger,
    private now: () => Date = () => new Date()
  ) {
    this.logger = logger.forLayer("render");
  }

  async render(actionId: string, params: Readonly<ActionParams>, context: ContextBag): Promise<RenderResult> {
    const layout = LAYOUTS[actionId];
    if (!layout) {
      return { success: false, errorMessage: `No document layout for ${actionId}` };
    }

    const now = this.now();
    const header: Row[] = [
      ["Applicant", readContextString(context, ContextKeys.requesterId, "unknown")],
      ["Application date", readContextString(context, ContextKeys.applicationDate, toIsoDate(now))],
    ];
    const content = BOM + toCsv(layout.rows(params, header));
    const fileName = `${layout.filePrefix}_${formatCompactTimestamp(now)}_${randomUUID().slice(0, 8)}.csv`;
    const outputDir = readContextString(context, ContextKeys.outputDirectory, this.outputDir);
    const targetPath = path.join(outputDir, fileName);
    // Atomic write: write to temp file then rename
    const tempPath = `${targetPath}.tmp.${Date.now()}`;
    const startTime = Date.now();

    try {
      await fs.mkdir(outputDir, { recursive: true });
      await fs.writeFile(tempPath, content, "utf8");
      await fs.rename(tempPath, targetPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      this.logger.logError(`render ${actionId}`, error, startTime);
      return {
        success: false,
        errorMessage: error instanceof Error ? error.message : String(error),
      };
    }

    this.logger.info(`Document written: ${fileName}`, { actionId, durationMs: Date.now() - startTime });
    return { success: true, artifactLocation: targetPath };
  }
}
