import type { EmbeddingProvider } from "../embeddings/types.js";
import type { SubsystemLogger } from "../logging/logger.js";
import type { VectorIndex, VectorRecord } from "../vector/types.js";
import type { EventRecord } from "./types.js";
import { InvalidParamsError } from "../errors.js";
import { silentLogger } from "../logging/logger.js";
import { eventText } from "./types.js";

export const DEFAULT_INDEX_BATCH_SIZE = 64;

export type IndexEventsResult = {
  inserted: number;
  embedded: number;
  reused: number;
  /** Copies of the input events with `embedding` filled in. */
  events: EventRecord[];
};

export function toVectorRecord(event: EventRecord, vector: number[]): VectorRecord {
  return {
    id: event.id,
    vector,
    metadata: {
      timestamp: event.timestamp,
      source: event.source,
      categories: event.categories,
      tags: event.tags,
    },
  };
}

export function resolveBatchSize(value: number | undefined): number {
  const batchSize = value ?? DEFAULT_INDEX_BATCH_SIZE;
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new InvalidParamsError("index events params", [
      `batchSize must be an integer >= 1, got ${String(value)}`,
    ]);
  }
  return batchSize;
}

/**
 * Embeds events lacking a vector and upserts all of them into the index in
 * batches. Event text is read, never rewritten.
 */
export async function indexEvents(params: {
  events: EventRecord[];
  embedder: EmbeddingProvider;
  index: VectorIndex;
  batchSize?: number;
  log?: SubsystemLogger;
}): Promise<IndexEventsResult> {
  const batchSize = resolveBatchSize(params.batchSize);
  const log = params.log ?? silentLogger;
  const result: IndexEventsResult = { inserted: 0, embedded: 0, reused: 0, events: [] };

  for (let offset = 0; offset < params.events.length; offset += batchSize) {
    const batch = params.events.slice(offset, offset + batchSize);
    const pending = batch.filter((event) => !event.embedding || event.embedding.length === 0);
    const vectors = await params.embedder.embed(pending.map(eventText));
    const fresh = new Map<string, number[]>();
    pending.forEach((event, i) => fresh.set(event.id, vectors[i]));

    const enriched = batch.map((event) => {
      const vector = fresh.get(event.id) ?? event.embedding;
      return { ...event, embedding: vector ?? null };
    });
    const records = enriched.flatMap((event) =>
      event.embedding ? [toVectorRecord(event, event.embedding)] : [],
    );
    result.inserted += await params.index.insertBatch(records);
    result.embedded += pending.length;
    result.reused += batch.length - pending.length;
    result.events.push(...enriched);
    log.debug("indexed batch", { offset, size: batch.length, embedded: pending.length });
  }
  return result;
}
