import { Command } from "commander";
import crypto from "node:crypto";
import type { BacktestModel, BacktestRow } from "../backtest/types.js";
import { buildBacktestDataset } from "../backtest/dataset.js";
import { buildBacktestReport } from "../backtest/metrics.js";
import { createEventAnalogModel, naiveReturnModel } from "../backtest/models.js";
import { appendBacktestReport, appendBacktestRows } from "../backtest/store.js";
import { loadConfig } from "../config/config.js";
import {
  resolveBacktestSettings,
  resolveForecastSettings,
  resolveRegimeSettings,
} from "../config/defaults.js";
import { createSubsystemLogger } from "../logging/logger.js";
import { appendRunRecord, buildRunRecord } from "../ops/runs.js";
import { createRegimeClassifier } from "../regime/classifier.js";
import { createRuntime } from "../runtime.js";
import { requireZonedInstant } from "../time/instant.js";

const program = new Command();

program
  .requiredOption("--symbols <list>", "Comma-separated symbols")
  .requiredOption("--horizons <list>", "Comma-separated horizons in minutes")
  .requiredOption("--start <iso>", "First as-of instant (with offset)")
  .requiredOption("--end <iso>", "Last as-of instant (with offset)")
  .option("--model <name>", "naive or event-analog")
  .option("--sampleFrequency <n>", "Use every Nth as-of date")
  .option("--lookbackDays <days>", "History window handed to the model")
  .option("--concurrency <n>", "Cells evaluated in parallel")
  .option("--persist", "Append rows and the report under the state dir")
  .parse(process.argv);

const opts = program.opts();

function parseList(raw: unknown): string[] {
  return String(raw)
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function parseIntOption(raw: unknown, label: string): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number.parseInt(String(raw), 10);
  if (!Number.isFinite(value)) {
    throw new Error(`${label} must be an integer`);
  }
  return value;
}

const cfg = loadConfig();
const settings = resolveBacktestSettings(cfg);
const log = createSubsystemLogger("backtest");
const runId = `backtest-${crypto.randomUUID()}`;
const startedAt = new Date().toISOString();

const symbols = parseList(opts.symbols);
const horizons = parseList(opts.horizons).map((entry) => {
  const value = Number.parseInt(entry, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`invalid horizon: ${entry}`);
  }
  return value;
});
const start = requireZonedInstant(String(opts.start), "start");
const end = requireZonedInstant(String(opts.end), "end");
const modelName = opts.model === undefined ? settings.model : String(opts.model);

const runtime = await createRuntime(cfg, log);
let model: BacktestModel;
if (modelName === "naive") {
  model = naiveReturnModel;
} else if (modelName === "event-analog") {
  model = createEventAnalogModel({
    index: runtime.index,
    settings: resolveForecastSettings(cfg),
    log: log.child("event-analog"),
  });
} else {
  throw new Error(`unknown model: ${modelName}`);
}

const controller = new AbortController();
process.once("SIGINT", () => {
  log.warn("interrupt received; finishing in-flight cells");
  controller.abort();
});

const rows: BacktestRow[] = [];
let failures = 0;
let cancelled = false;
for (const horizonMinutes of horizons) {
  if (controller.signal.aborted) {
    cancelled = true;
    break;
  }
  const dataset = await buildBacktestDataset(
    {
      symbols,
      horizonMinutes,
      start,
      end,
      model,
      regime: createRegimeClassifier(resolveRegimeSettings(cfg)),
      lookbackDays: parseIntOption(opts.lookbackDays, "lookbackDays") ?? settings.lookbackDays,
      sampleFrequency:
        parseIntOption(opts.sampleFrequency, "sampleFrequency") ?? settings.sampleFrequency,
      concurrency: parseIntOption(opts.concurrency, "concurrency") ?? settings.concurrency,
      directionThreshold: settings.directionThreshold,
      signal: controller.signal,
    },
    { outcomes: runtime.outcomes, events: runtime.events, log },
  );
  rows.push(...dataset.rows);
  failures += dataset.failures.length;
  cancelled ||= dataset.cancelled;
}

const report = buildBacktestReport(rows, {
  calibrationBuckets: settings.calibrationBuckets,
  calibrationTolerance: settings.calibrationTolerance,
});

let persisted = 0;
if (opts.persist === true || settings.persist) {
  persisted = await appendBacktestRows(rows);
  await appendBacktestReport({
    ...report,
    runId,
    createdAt: new Date().toISOString(),
    model: model.name,
    symbols,
    horizons,
    start,
    end,
  });
}

await appendRunRecord(
  buildRunRecord({
    runId,
    job: "backtest",
    startedAt,
    finishedAt: new Date().toISOString(),
    status: cancelled ? "cancelled" : failures > 0 ? "partial" : "ok",
    counts: { rows: rows.length, failures, persisted },
  }),
);

console.log(JSON.stringify(report, null, 2));
