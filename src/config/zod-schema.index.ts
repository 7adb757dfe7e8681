import { z } from "zod";

const MemoryVectorIndexSchema = z
  .object({
    kind: z.literal("memory"),
    metric: z.union([z.literal("cosine"), z.literal("euclidean")]).optional(),
  })
  .strict();

const WeaviateVectorIndexSchema = z
  .object({
    kind: z.literal("weaviate"),
    url: z.string().url(),
    apiKey: z.string().optional(),
    className: z
      .string()
      .regex(/^[A-Z][A-Za-z0-9_]*$/, "className must start with an uppercase letter")
      .optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export const VectorIndexSchema = z
  .discriminatedUnion("kind", [MemoryVectorIndexSchema, WeaviateVectorIndexSchema])
  .optional();

export const EmbeddingsSchema = z
  .object({
    provider: z.union([z.literal("openai"), z.literal("local")]).optional(),
    model: z.string().min(1).optional(),
    dimension: z.number().int().positive().optional(),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict()
  .optional();

export const RetrySchema = z
  .object({
    maxAttempts: z.number().int().positive().max(10).optional(),
    baseDelayMs: z.number().int().nonnegative().optional(),
    maxDelayMs: z.number().int().nonnegative().optional(),
    jitter: z.boolean().optional(),
  })
  .strict()
  .optional();
