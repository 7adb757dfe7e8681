import { z } from "zod";

export const BacktestSchema = z
  .object({
    model: z.union([z.literal("naive"), z.literal("event-analog")]).optional(),
    lookbackDays: z.number().positive().optional(),
    sampleFrequency: z.number().int().positive().optional(),
    directionThreshold: z.number().nonnegative().optional(),
    concurrency: z.number().int().positive().max(64).optional(),
    calibrationBuckets: z.number().int().positive().optional(),
    calibrationTolerance: z.number().positive().max(1).optional(),
    persist: z.boolean().optional(),
  })
  .strict()
  .optional();

export const RegimeSchema = z
  .object({
    horizonMinutes: z.number().int().positive().optional(),
    momentumDays: z.number().int().positive().optional(),
    volatilityDays: z.number().int().positive().optional(),
    baseThreshold: z.number().nonnegative().optional(),
    volatilityCoefficient: z.number().nonnegative().optional(),
  })
  .strict()
  .optional();
