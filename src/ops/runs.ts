import fs from "node:fs";
import path from "node:path";
import { resolveStateDir } from "../config/paths.js";
import { readNdjsonFile } from "../storage/ndjson.js";
import { VERSION } from "../version.js";

export type RunRecord = {
  runId: string;
  job: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  status: "ok" | "partial" | "cancelled" | "error";
  counts?: Record<string, number>;
  error?: string;
  provenance: { runId: string; agent: string; version: string };
};

export const OPS_RUNS_PATH = path.join("ops", "runs.ndjson");

export function resolveOpsRunsPath(): string {
  return path.join(resolveStateDir(), OPS_RUNS_PATH);
}

export async function appendRunRecord(record: RunRecord): Promise<void> {
  const filePath = resolveOpsRunsPath();
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.appendFile(filePath, `${JSON.stringify(record)}\n`, "utf8");
}

export async function loadRunRecords(): Promise<RunRecord[]> {
  return await readNdjsonFile(resolveOpsRunsPath(), (value) =>
    value && typeof value === "object" && "runId" in value ? (value as RunRecord) : null,
  );
}

export function buildRunRecord(params: {
  runId: string;
  job: string;
  startedAt: string;
  finishedAt: string;
  status?: RunRecord["status"];
  counts?: Record<string, number>;
  error?: string;
}): RunRecord {
  const durationMs = new Date(params.finishedAt).getTime() - new Date(params.startedAt).getTime();
  return {
    runId: params.runId,
    job: params.job,
    startedAt: params.startedAt,
    finishedAt: params.finishedAt,
    durationMs: Math.max(0, durationMs),
    status: params.status ?? "ok",
    counts: params.counts,
    error: params.error,
    provenance: {
      runId: params.runId,
      agent: params.job,
      version: VERSION,
    },
  };
}
