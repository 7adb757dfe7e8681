import { Command } from "commander";
import crypto from "node:crypto";
import { loadConfig, resolveStoragePaths } from "../src/config/config.js";
import { createEmbedderFromConfig } from "../src/embeddings/factory.js";
import { indexEvents, resolveBatchSize } from "../src/events/indexing.js";
import { createFileEventRepository, parseEventRecord } from "../src/events/store.js";
import { createSubsystemLogger } from "../src/logging/logger.js";
import { appendRunRecord, buildRunRecord } from "../src/ops/runs.js";
import { readNdjsonFile } from "../src/storage/ndjson.js";
import { createVectorIndex } from "../src/vector/factory.js";

const program = new Command();
program
  .option("--file <path>", "NDJSON file of events to add before indexing")
  .option("--batchSize <n>", "Events per embedding request", "64")
  .parse(process.argv);
const opts = program.opts();
const batchSize = resolveBatchSize(Number(opts.batchSize));

const cfg = loadConfig();
const log = createSubsystemLogger("index-events");
const runId = `index-events-${crypto.randomUUID()}`;
const startedAt = new Date().toISOString();

const repository = createFileEventRepository({ filePath: resolveStoragePaths(cfg).eventsPath });
if (opts.file) {
  const incoming = await readNdjsonFile(String(opts.file), parseEventRecord);
  const added = await repository.putEvents(incoming);
  log.info("added events", { added });
}

const index = createVectorIndex({
  config: cfg.vectorIndex,
  retry: cfg.retry,
  log: log.child("vector"),
});
if (index.kind === "memory") {
  log.warn("memory index is not persistent; only event embeddings will be stored");
}

const embedder = createEmbedderFromConfig(cfg, log.child("embeddings"));
const result = await indexEvents({
  events: await repository.listEvents(),
  embedder,
  index,
  batchSize,
  log,
});
await repository.putEvents(result.events);

const degraded = embedder.degradedCount();
log.info("indexed events", {
  inserted: result.inserted,
  embedded: result.embedded,
  reused: result.reused,
  degraded,
});

await appendRunRecord(
  buildRunRecord({
    runId,
    job: "index-events",
    startedAt,
    finishedAt: new Date().toISOString(),
    status: degraded > 0 ? "partial" : "ok",
    counts: { inserted: result.inserted, embedded: result.embedded, reused: result.reused, degraded },
  }),
);
