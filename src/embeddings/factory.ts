import type { EchocastConfig } from "../config/types.js";
import type { SubsystemLogger } from "../logging/logger.js";
import type { ResilientEmbedder } from "./resilient.js";
import { resolveEmbeddingSettings } from "../config/defaults.js";
import { createLocalEmbeddingProvider } from "./local.js";
import { createOpenAiEmbeddingProvider } from "./openai.js";
import { createResilientEmbedder } from "./resilient.js";

export function createEmbedderFromConfig(cfg: EchocastConfig, log?: SubsystemLogger): ResilientEmbedder {
  const settings = resolveEmbeddingSettings(cfg);
  const primary =
    settings.provider === "openai" && settings.apiKey
      ? createOpenAiEmbeddingProvider({
          apiKey: settings.apiKey,
          model: settings.model,
          dimension: settings.dimension,
          baseUrl: settings.baseUrl,
          timeoutMs: settings.timeoutMs,
          retry: cfg.retry,
          log,
        })
      : createLocalEmbeddingProvider(settings.dimension);
  return createResilientEmbedder({ primary, log });
}
