import { z } from "zod";
import type { ForecastSettings } from "../config/defaults.js";
import type { EventReader } from "../events/types.js";
import type { SubsystemLogger } from "../logging/logger.js";
import type { RealizedOutcomeReader } from "../outcomes/types.js";
import type { VectorIndex } from "../vector/types.js";
import type { ForecastResult } from "./types.js";
import { DEFAULT_FORECAST_SETTINGS } from "../config/defaults.js";
import { InvalidParamsError } from "../errors.js";
import { silentLogger } from "../logging/logger.js";
import { normalizeSymbol } from "../utils.js";
import { computeWeightedMoments } from "./aggregate.js";
import { sampleNeighbors, type NeighborSampling } from "./sampler.js";

function buildParamsSchema(defaults: ForecastSettings) {
  return z.object({
    eventId: z.string().min(1),
    symbol: z.string().min(1).transform(normalizeSymbol),
    horizonMinutes: z.number().int().positive(),
    kNeighbors: z.number().int().positive().default(defaults.kNeighbors),
    lookbackDays: z.number().positive().default(defaults.lookbackDays),
    priceWindowMinutes: z.number().int().nonnegative().default(defaults.priceWindowMinutes),
    alpha: z.number().positive().finite().default(defaults.alpha),
    requireSymbolMention: z.boolean().default(defaults.requireSymbolMention),
  });
}

export type ForecastParams = z.input<ReturnType<typeof buildParamsSchema>>;

export type ForecastEngineDeps = {
  index: VectorIndex;
  events: EventReader;
  outcomes: RealizedOutcomeReader;
  log?: SubsystemLogger;
  defaults?: Partial<ForecastSettings>;
};

export type ForecastEngine = {
  forecastEventReturn: (params: ForecastParams) => Promise<ForecastResult>;
  /** Same as forecastEventReturn, also returning the neighbors behind it. */
  explainForecast: (
    params: ForecastParams,
  ) => Promise<{ result: ForecastResult; sampling: NeighborSampling }>;
};

export function createForecastEngine(deps: ForecastEngineDeps): ForecastEngine {
  const log = deps.log ?? silentLogger;
  const schema = buildParamsSchema({ ...DEFAULT_FORECAST_SETTINGS, ...deps.defaults });

  const explainForecast = async (raw: ForecastParams) => {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidParamsError(
        "forecast params",
        parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      );
    }
    const params = parsed.data;
    const sampling = await sampleNeighbors(params, deps);
    const moments = computeWeightedMoments(sampling.samples, params.alpha);
    const result: ForecastResult = {
      eventId: params.eventId,
      symbol: params.symbol,
      horizonMinutes: params.horizonMinutes,
      ...moments,
      neighborsUsed: Math.min(params.kNeighbors, moments.sampleSize),
    };
    log.debug("forecast computed", {
      eventId: params.eventId,
      symbol: params.symbol,
      horizon: params.horizonMinutes,
      neighbors: sampling.neighbors.length,
      samples: moments.sampleSize,
    });
    return { result, sampling };
  };

  return {
    forecastEventReturn: async (params) => (await explainForecast(params)).result,
    explainForecast,
  };
}
