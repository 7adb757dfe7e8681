export type VectorMetric = "cosine" | "euclidean";

export type MemoryVectorIndexConfig = {
  kind: "memory";
  metric?: VectorMetric;
};

export type WeaviateVectorIndexConfig = {
  kind: "weaviate";
  url: string;
  apiKey?: string;
  className?: string;
  timeoutMs?: number;
};

export type VectorIndexConfig = MemoryVectorIndexConfig | WeaviateVectorIndexConfig;

export type EmbeddingsConfig = {
  provider?: "openai" | "local";
  model?: string;
  dimension?: number;
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
};

export type RetryConfig = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitter?: boolean;
};
