import type { EmbeddingProvider } from "./types.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/logger.js";
import { errorMessage } from "../utils.js";
import { createLocalEmbeddingProvider } from "./local.js";

export type ResilientEmbedder = EmbeddingProvider & {
  /** Number of texts that were embedded by the local fallback. */
  degradedCount: () => number;
};

/**
 * Wraps a remote provider. Any failure of the remote call, after its own
 * retries, embeds the batch locally and logs the degradation.
 */
export function createResilientEmbedder(params: {
  primary: EmbeddingProvider;
  log?: SubsystemLogger;
}): ResilientEmbedder {
  const log = params.log ?? createSubsystemLogger("embeddings");
  const fallback = createLocalEmbeddingProvider(params.primary.dimension);
  let degraded = 0;
  return {
    name: params.primary.name,
    dimension: params.primary.dimension,
    degradedCount: () => degraded,
    embed: async (texts) => {
      try {
        return await params.primary.embed(texts);
      } catch (err) {
        degraded += texts.length;
        log.warn("embedding degraded to local hash vectors", {
          provider: params.primary.name,
          count: texts.length,
          error: errorMessage(err),
        });
        return await fallback.embed(texts);
      }
    },
  };
}
