import type { EchocastConfig } from "./config/types.js";
import type { EventRepository } from "./events/types.js";
import type { SubsystemLogger } from "./logging/logger.js";
import type { RealizedOutcomeStore } from "./outcomes/types.js";
import type { VectorIndex } from "./vector/types.js";
import { resolveStoragePaths } from "./config/config.js";
import { createFileEventRepository } from "./events/store.js";
import { toVectorRecord } from "./events/indexing.js";
import { createFileOutcomeStore } from "./outcomes/store.js";
import { createVectorIndex } from "./vector/factory.js";

export type Runtime = {
  events: EventRepository;
  outcomes: RealizedOutcomeStore;
  index: VectorIndex;
};

/**
 * Wires the file-backed stores and the configured vector index. An in-memory
 * index starts empty, so it is loaded from the stored event embeddings.
 */
export async function createRuntime(cfg: EchocastConfig, log: SubsystemLogger): Promise<Runtime> {
  const paths = resolveStoragePaths(cfg);
  const events = createFileEventRepository({ filePath: paths.eventsPath });
  const outcomes = createFileOutcomeStore({ filePath: paths.outcomesPath });
  const index = createVectorIndex({
    config: cfg.vectorIndex,
    retry: cfg.retry,
    log: log.child("vector"),
  });
  if (index.kind === "memory") {
    const all = await events.listEvents();
    const records = all.flatMap((event) =>
      event.embedding && event.embedding.length > 0 ? [toVectorRecord(event, event.embedding)] : [],
    );
    await index.insertBatch(records);
    log.debug("loaded memory index", { events: all.length, vectors: records.length });
  }
  return { events, outcomes, index };
}
