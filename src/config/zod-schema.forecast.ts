import { z } from "zod";

export const ForecastSchema = z
  .object({
    kNeighbors: z.number().int().positive().optional(),
    lookbackDays: z.number().positive().optional(),
    priceWindowMinutes: z.number().int().nonnegative().optional(),
    alpha: z.number().positive().optional(),
    requireSymbolMention: z.boolean().optional(),
    probabilityBlendWeight: z.number().min(0).max(1).optional(),
  })
  .strict()
  .optional();
