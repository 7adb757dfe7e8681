import { z } from "zod";
import type { RetryPolicy } from "../retry/policy.js";
import type { EmbeddingProvider } from "./types.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/logger.js";
import { withRetry } from "../retry/policy.js";
import { errorMessage } from "../utils.js";

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ index: z.number().int(), embedding: z.array(z.number()) })),
});

export class EmbeddingHttpError extends Error {
  readonly status: number;

  constructor(status: number, body: string) {
    super(`embedding request failed with ${status}${body ? `: ${body.slice(0, 200)}` : ""}`);
    this.name = "EmbeddingHttpError";
    this.status = status;
  }
}

function isRetryable(err: unknown): boolean {
  if (err instanceof EmbeddingHttpError) {
    return err.status === 429 || err.status >= 500;
  }
  return err instanceof TypeError || (err instanceof Error && err.name === "AbortError");
}

export function createOpenAiEmbeddingProvider(opts: {
  apiKey: string;
  model: string;
  dimension: number;
  baseUrl: string;
  timeoutMs: number;
  retry?: Partial<RetryPolicy>;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  log?: SubsystemLogger;
}): EmbeddingProvider {
  const fetchImpl: FetchLike = opts.fetch ?? ((input, init) => fetch(input, init));
  const log = opts.log ?? createSubsystemLogger("embeddings/openai");
  const url = `${opts.baseUrl.replace(/\/+$/, "")}/embeddings`;

  const embedOnce = async (texts: string[]): Promise<number[][]> => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), opts.timeoutMs);
    try {
      const res = await fetchImpl(url, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${opts.apiKey}`,
        },
        body: JSON.stringify({ model: opts.model, input: texts, dimensions: opts.dimension }),
        signal: controller.signal,
      });
      const text = await res.text();
      if (!res.ok) {
        throw new EmbeddingHttpError(res.status, text);
      }
      const parsed = EmbeddingResponseSchema.safeParse(JSON.parse(text));
      if (!parsed.success) {
        throw new Error("embedding response had an unexpected shape");
      }
      const ordered = [...parsed.data.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== texts.length) {
        throw new Error(`expected ${texts.length} embeddings, got ${ordered.length}`);
      }
      return ordered.map((entry) => entry.embedding);
    } finally {
      clearTimeout(timeout);
    }
  };

  return {
    name: `openai:${opts.model}`,
    dimension: opts.dimension,
    embed: async (texts) => {
      if (texts.length === 0) {
        return [];
      }
      return await withRetry(() => embedOnce(texts), {
        label: "embeddings",
        policy: opts.retry,
        isRetryable,
        sleep: opts.sleep,
        onRetry: ({ attempt, delayMs, error }) =>
          log.warn("retrying embedding request", { attempt, delayMs, error: errorMessage(error) }),
      });
    },
  };
}
