import type { VectorMetric } from "../config/types.index.js";
import type { VectorHit, VectorIndex, VectorRecord, VectorSearchQuery } from "./types.js";
import { VectorIndexError } from "../errors.js";
import { parseIsoDate, requireZonedMs } from "../time/instant.js";
import { resolveDistance } from "./distance.js";
import { compareHits } from "./types.js";

function isFiniteVector(vector: number[]): boolean {
  return vector.length > 0 && vector.every((value) => Number.isFinite(value));
}

/** Exact nearest-neighbor scan over every stored vector. */
export function createBruteForceIndex(opts: { metric?: VectorMetric } = {}): VectorIndex {
  const distance = resolveDistance(opts.metric ?? "cosine");
  const records = new Map<string, VectorRecord>();
  let dimension: number | null = null;

  const checkVector = (vector: number[], label: string) => {
    if (!isFiniteVector(vector)) {
      throw new VectorIndexError(`${label}: vector must be non-empty and finite`);
    }
    if (dimension !== null && vector.length !== dimension) {
      throw new VectorIndexError(
        `${label}: dimension ${vector.length} does not match index dimension ${dimension}`,
      );
    }
  };

  return {
    kind: "memory",
    insertBatch: async (batch) => {
      for (const record of batch) {
        checkVector(record.vector, `insert ${record.id}`);
        requireZonedMs(record.metadata.timestamp, `insert ${record.id} timestamp`);
        dimension ??= record.vector.length;
      }
      for (const record of batch) {
        records.set(record.id, { ...record, vector: [...record.vector] });
      }
      return batch.length;
    },
    search: async (query: VectorSearchQuery) => {
      if (query.limit <= 0 || records.size === 0) {
        return [];
      }
      checkVector(query.vector, "search");
      const notBefore =
        query.filter?.notBefore === undefined ? null : requireZonedMs(query.filter.notBefore);
      const notAfter =
        query.filter?.notAfter === undefined ? null : requireZonedMs(query.filter.notAfter);
      const hits: VectorHit[] = [];
      for (const record of records.values()) {
        if (record.id === query.excludeId) {
          continue;
        }
        const ts = parseIsoDate(record.metadata.timestamp);
        if (ts === null) {
          continue;
        }
        if ((notBefore !== null && ts < notBefore) || (notAfter !== null && ts > notAfter)) {
          continue;
        }
        hits.push({
          id: record.id,
          distance: distance(query.vector, record.vector),
          metadata: record.metadata,
        });
      }
      return hits.sort(compareHits).slice(0, query.limit);
    },
    getVector: async (id) => {
      const record = records.get(id);
      return record ? [...record.vector] : null;
    },
    delete: async (id) => records.delete(id),
    count: async () => records.size,
  };
}
