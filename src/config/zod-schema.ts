import { z } from "zod";
import { BacktestSchema, RegimeSchema } from "./zod-schema.backtest.js";
import { ForecastSchema } from "./zod-schema.forecast.js";
import { EmbeddingsSchema, RetrySchema, VectorIndexSchema } from "./zod-schema.index.js";

const StorageSchema = z
  .object({
    eventsPath: z.string().min(1).optional(),
    outcomesPath: z.string().min(1).optional(),
  })
  .strict()
  .optional();

export const EchocastSchema = z
  .object({
    forecast: ForecastSchema,
    backtest: BacktestSchema,
    regime: RegimeSchema,
    vectorIndex: VectorIndexSchema,
    embeddings: EmbeddingsSchema,
    retry: RetrySchema,
    storage: StorageSchema,
  })
  .strict();
