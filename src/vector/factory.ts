import type { RetryConfig, VectorIndexConfig } from "../config/types.index.js";
import type { SubsystemLogger } from "../logging/logger.js";
import type { VectorIndex } from "./types.js";
import { DEFAULT_VECTOR_METRIC } from "../config/defaults.js";
import { createBruteForceIndex } from "./brute-force.js";
import { createWeaviateIndex } from "./weaviate.js";

export function createVectorIndex(params: {
  config?: VectorIndexConfig;
  retry?: RetryConfig;
  log?: SubsystemLogger;
}): VectorIndex {
  const config = params.config ?? { kind: "memory", metric: DEFAULT_VECTOR_METRIC };
  if (config.kind === "weaviate") {
    return createWeaviateIndex({
      url: config.url,
      apiKey: config.apiKey,
      className: config.className,
      timeoutMs: config.timeoutMs,
      retry: params.retry,
      log: params.log,
    });
  }
  return createBruteForceIndex({ metric: config.metric ?? DEFAULT_VECTOR_METRIC });
}
