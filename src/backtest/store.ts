import path from "node:path";
import type { BacktestReport } from "./metrics.js";
import type { BacktestRow } from "./types.js";
import { resolveStateDir } from "../config/paths.js";
import { appendNdjson, readNdjsonFile } from "../storage/ndjson.js";

export const BACKTEST_ROWS_PATH = path.join("backtests", "rows.ndjson");
export const BACKTEST_REPORTS_PATH = path.join("backtests", "reports.ndjson");

export type StoredBacktestReport = BacktestReport & {
  runId: string;
  createdAt: string;
  model: string;
  symbols: string[];
  horizons: number[];
  start: string;
  end: string;
};

export function resolveBacktestRowsPath(): string {
  return path.join(resolveStateDir(), BACKTEST_ROWS_PATH);
}

export function resolveBacktestReportsPath(): string {
  return path.join(resolveStateDir(), BACKTEST_REPORTS_PATH);
}

function mapRow(value: unknown): BacktestRow | null {
  if (!value || typeof value !== "object" || !("id" in value) || typeof value.id !== "string") {
    return null;
  }
  return value as BacktestRow;
}

export async function loadBacktestRows(): Promise<BacktestRow[]> {
  return await readNdjsonFile(resolveBacktestRowsPath(), mapRow);
}

/** Appends rows whose id is not stored yet; returns how many were written. */
export async function appendBacktestRows(rows: BacktestRow[]): Promise<number> {
  const existing = new Set((await loadBacktestRows()).map((row) => row.id));
  const fresh = rows.filter((row) => !existing.has(row.id));
  await appendNdjson(resolveBacktestRowsPath(), fresh);
  return fresh.length;
}

export async function appendBacktestReport(report: StoredBacktestReport): Promise<void> {
  await appendNdjson(resolveBacktestReportsPath(), [report]);
}

export async function loadBacktestReports(): Promise<StoredBacktestReport[]> {
  return await readNdjsonFile(resolveBacktestReportsPath(), (value) =>
    value && typeof value === "object" && "runId" in value ? (value as StoredBacktestReport) : null,
  );
}
