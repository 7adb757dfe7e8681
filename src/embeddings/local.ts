import crypto from "node:crypto";
import type { EmbeddingProvider } from "./types.js";

export function normalizeEmbeddingText(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

/**
 * Deterministic stand-in vector: sha256 of the whitespace-normalized text,
 * bytes scaled to [0, 1] and repeated out to the requested dimension.
 * Carries no semantic meaning.
 */
export function localHashEmbedding(text: string, dimension: number): number[] {
  const digest = crypto
    .createHash("sha256")
    .update(normalizeEmbeddingText(text), "utf8")
    .digest();
  const vector = new Array<number>(dimension);
  for (let i = 0; i < dimension; i += 1) {
    vector[i] = digest[i % digest.length] / 255;
  }
  return vector;
}

export function createLocalEmbeddingProvider(dimension: number): EmbeddingProvider {
  return {
    name: "local-hash",
    dimension,
    embed: async (texts) => texts.map((text) => localHashEmbedding(text, dimension)),
  };
}
