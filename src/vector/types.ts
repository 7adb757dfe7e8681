export type VectorMetadata = {
  timestamp: string;
  source: string;
  categories: string[];
  tags: string[];
};

export type VectorRecord = {
  id: string;
  vector: number[];
  metadata: VectorMetadata;
};

export type VectorSearchFilter = {
  /** Inclusive lower bound on metadata.timestamp. */
  notBefore?: string;
  /** Inclusive upper bound on metadata.timestamp. */
  notAfter?: string;
};

export type VectorSearchQuery = {
  vector: number[];
  limit: number;
  excludeId?: string;
  filter?: VectorSearchFilter;
};

/** Lower distance means closer, for every backend. */
export type VectorHit = {
  id: string;
  distance: number;
  metadata: VectorMetadata;
};

export type VectorIndex = {
  kind: "memory" | "weaviate";
  insertBatch: (records: VectorRecord[]) => Promise<number>;
  search: (query: VectorSearchQuery) => Promise<VectorHit[]>;
  getVector: (id: string) => Promise<number[] | null>;
  delete: (id: string) => Promise<boolean>;
  count: () => Promise<number>;
};

export function compareHits(a: VectorHit, b: VectorHit): number {
  return a.distance !== b.distance ? a.distance - b.distance : a.id.localeCompare(b.id);
}
