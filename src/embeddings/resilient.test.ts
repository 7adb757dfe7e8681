import { describe, expect, it, vi } from "vitest";
import { RetryExhaustedError } from "../errors.js";
import { createSubsystemLogger, silentLogger, type LogLevel } from "../logging/logger.js";
import { localHashEmbedding, normalizeEmbeddingText } from "./local.js";
import { createOpenAiEmbeddingProvider } from "./openai.js";
import { createResilientEmbedder } from "./resilient.js";

describe("embeddings", () => {
  it("builds deterministic local hash vectors of the requested size", () => {
    const a = localHashEmbedding("rate cut", 40);
    expect(a).toHaveLength(40);
    expect(a).toEqual(localHashEmbedding("rate cut", 40));
    expect(a[32]).toBe(a[0]);
    expect(a.every((value) => value >= 0 && value <= 1)).toBe(true);
    expect(localHashEmbedding("rate hike", 40)).not.toEqual(a);
  });

  it("orders remote embeddings by index", async () => {
    const fetch = vi.fn(
      async (_url: string, _init: RequestInit) =>
        new Response(
          JSON.stringify({
            data: [
              { index: 1, embedding: [0, 1] },
              { index: 0, embedding: [1, 0] },
            ],
          }),
          { status: 200 },
        ),
    );
    const provider = createOpenAiEmbeddingProvider({
      apiKey: "test-secret",
      model: "text-embedding-3-small",
      dimension: 2,
      baseUrl: "http://embeddings.local/v1/",
      timeoutMs: 1000,
      fetch,
    });
    expect(await provider.embed(["first", "second"])).toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(fetch.mock.calls[0][0]).toBe("http://embeddings.local/v1/embeddings");
  });

  it("falls back to local vectors once retries are exhausted and logs it", async () => {
    const lines: Array<[LogLevel, string]> = [];
    const log = createSubsystemLogger("embeddings", {
      sink: (level, line) => lines.push([level, line]),
    });
    const primary = {
      name: "remote",
      dimension: 8,
      embed: async (): Promise<number[][]> => {
        throw new RetryExhaustedError("embeddings", 3, new Error("503"));
      },
    };
    const embedder = createResilientEmbedder({ primary, log });
    const vectors = await embedder.embed(["headline"]);
    expect(vectors).toEqual([localHashEmbedding("headline", 8)]);
    expect(embedder.degradedCount()).toBe(1);
    expect(lines).toEqual([
      [
        "warn",
        '[embeddings] embedding degraded to local hash vectors provider=remote count=1 error="embeddings failed after 3 attempts: 503"',
      ],
    ]);
  });

  it("falls back on a rejected request too", async () => {
    const lines: string[] = [];
    const fetch = vi.fn(
      async (_url: string, _init: RequestInit) =>
        new Response('{"error":"invalid key"}', { status: 401 }),
    );
    const primary = createOpenAiEmbeddingProvider({
      apiKey: "test-secret",
      model: "text-embedding-3-small",
      dimension: 4,
      baseUrl: "http://embeddings.local/v1",
      timeoutMs: 1000,
      fetch,
      log: silentLogger,
    });
    const embedder = createResilientEmbedder({
      primary,
      log: createSubsystemLogger("embeddings", { sink: (_level, line) => lines.push(line) }),
    });
    expect(await embedder.embed(["x", "y"])).toEqual([
      localHashEmbedding("x", 4),
      localHashEmbedding("y", 4),
    ]);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(embedder.degradedCount()).toBe(2);
    expect(lines).toEqual([
      "[embeddings] embedding degraded to local hash vectors provider=openai:text-embedding-3-small count=2 " +
        `error=${JSON.stringify('embedding request failed with 401: {"error":"invalid key"}')}`,
    ]);
  });

  it("hashes whitespace variants of a text to the same vector", () => {
    expect(localHashEmbedding("  rate\n cut\t", 16)).toEqual(localHashEmbedding("rate cut", 16));
    expect(normalizeEmbeddingText(" a \r\n\tb  c ")).toBe("a b c");
  });
});
