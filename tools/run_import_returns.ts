import { Command } from "commander";
import crypto from "node:crypto";
import { z } from "zod";
import { loadConfig, resolveStoragePaths } from "../src/config/config.js";
import { createSubsystemLogger } from "../src/logging/logger.js";
import { appendRunRecord, buildRunRecord } from "../src/ops/runs.js";
import { createFileOutcomeStore } from "../src/outcomes/store.js";
import { readNdjsonFile } from "../src/storage/ndjson.js";

const InputSchema = z.object({
  symbol: z.string().min(1),
  asOf: z.string().min(1),
  horizonMinutes: z.number().int().positive(),
  priceStart: z.number(),
  priceEnd: z.number(),
});

const program = new Command();
program.requiredOption("--file <path>", "NDJSON file of realized returns").parse(process.argv);
const opts = program.opts();

const cfg = loadConfig();
const log = createSubsystemLogger("import-returns");
const runId = `import-returns-${crypto.randomUUID()}`;
const startedAt = new Date().toISOString();

let rejected = 0;
const inputs = await readNdjsonFile(String(opts.file), (value) => {
  const parsed = InputSchema.safeParse(value);
  if (!parsed.success) {
    rejected += 1;
    return null;
  }
  return parsed.data;
});

const store = createFileOutcomeStore({ filePath: resolveStoragePaths(cfg).outcomesPath });
const result = await store.insertMany(inputs);
log.info("imported realized returns", { ...result, rejected });

await appendRunRecord(
  buildRunRecord({
    runId,
    job: "import-returns",
    startedAt,
    finishedAt: new Date().toISOString(),
    status: rejected > 0 ? "partial" : "ok",
    counts: { read: inputs.length, inserted: result.inserted, skipped: result.skipped, rejected },
  }),
);
