/**
 * Report Writer
 * Writes every record with its final status as JSON and CSV, in source order
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "node:path";
import { SOURCE_COLUMNS } from "../types";
import type { ProcessingStats, RecordOutcome } from "../types";

type Cell = string | number | boolean | null | undefined;

export const OUTCOME_COLUMNS = [
  "Status",
  "Message",
  "Attempts",
  "Response",
] as const;

export interface ReportFiles {
  json: string;
  csv: string;
}

function outcomeCells(entry: RecordOutcome): Cell[] {
  const { outcome } = entry;
  return [
    outcome.status === "success" ? "Success" : "Error",
    outcome.status === "success"
      ? outcome.message
      : `${outcome.stage}: ${outcome.message}`,
    outcome.attempts,
    outcome.status === "success" ? outcome.response : "",
  ];
}

function escapeCell(value: Cell): string {
  if (value === null || value === undefined) return "";
  if (typeof value !== "string") return String(value);
  return `"${value.replace(/"/g, '""')}"`;
}

export function buildCsv(entries: readonly RecordOutcome[]): string {
  const header = [...SOURCE_COLUMNS, ...OUTCOME_COLUMNS];
  const rows: Cell[][] = entries.map((entry) => [
    ...SOURCE_COLUMNS.map((column) => entry.record.row[column]),
    ...outcomeCells(entry),
  ]);

  return [header, ...rows]
    .map((cols) => cols.map(escapeCell).join(","))
    .join("\n");
}

export class ReportWriter {
  constructor(private readonly reportDir: string) {}

  async write(
    entries: readonly RecordOutcome[],
    summary: Omit<ProcessingStats, "issues">,
    now: Date = new Date(),
  ): Promise<ReportFiles> {
    await mkdir(this.reportDir, { recursive: true });
    const timestamp = now.toISOString().replace(/[:.]/g, "-");
    const json = join(this.reportDir, `report-${timestamp}.json`);
    const csv = join(this.reportDir, `report-${timestamp}.csv`);

    const records = entries.map(({ record, outcome }) => ({
      ...record.row,
      outcome,
    }));
    await writeFile(json, JSON.stringify({ summary, records }, null, 2), "utf-8");
    await writeFile(csv, buildCsv(entries), "utf-8");

    return { json, csv };
  }
}
