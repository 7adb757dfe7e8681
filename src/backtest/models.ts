import type { ForecastSettings } from "../config/defaults.js";
import type { EventRecord } from "../events/types.js";
import type { SubsystemLogger } from "../logging/logger.js";
import type { VectorIndex } from "../vector/types.js";
import type { BacktestModel, Direction, ModelContext, ModelForecast } from "./types.js";
import { DEFAULT_FORECAST_SETTINGS } from "../config/defaults.js";
import { MissingEmbeddingError } from "../errors.js";
import { eventText } from "../events/types.js";
import { computeHorizonNormalizedConfidence } from "../forecast/confidence.js";
import { createForecastEngine } from "../forecast/engine.js";
import { isSymbolMentioned } from "../forecast/symbol-filter.js";
import { silentLogger } from "../logging/logger.js";
import { requireZonedMs, toIso } from "../time/instant.js";
import { DAY_MS, mean, pstdev } from "../utils.js";
import { classifyDirection } from "./direction.js";

const EMPTY_FORECAST: ModelForecast = { expectedReturn: null, confidence: 0, sampleSize: 0 };

/** Mean and spread of the symbol's own recent realized returns. */
export const naiveReturnModel: BacktestModel = {
  name: "naive",
  schemaVersion: 1,
  predict: async (ctx: ModelContext) => {
    const asOfMs = requireZonedMs(ctx.asOf, "asOf");
    const rows = await ctx.outcomes.listBefore({
      symbol: ctx.symbol,
      horizonMinutes: ctx.horizonMinutes,
      before: ctx.asOf,
      since: toIso(asOfMs - ctx.lookbackDays * DAY_MS),
    });
    if (rows.length === 0) {
      return { ...EMPTY_FORECAST };
    }
    const returns = rows.map((row) => row.realizedReturn);
    const expectedReturn = mean(returns);
    const volatility = pstdev(returns);
    return {
      expectedReturn,
      volatility,
      sampleSize: returns.length,
      confidence: computeHorizonNormalizedConfidence({
        expectedReturn,
        volatility,
        horizonMinutes: ctx.horizonMinutes,
        sampleSize: returns.length,
      }),
    };
  },
};

const MAX_ANCHOR_CANDIDATES = 5;

/**
 * Probability behind the direction the expected return points to. A flat call
 * is as confident as the analogs are split between up and down.
 */
export function directionalConfidence(
  direction: Direction | null,
  pUp: number,
  pDown: number,
): number {
  switch (direction) {
    case "up":
      return pUp;
    case "down":
      return pDown;
    case "flat":
      return 1 - Math.abs(pUp - pDown);
    default:
      return 0;
  }
}

/**
 * Forecasts from the most recent event at or before asOf, using analog events
 * and outcomes visible through the context's causal views.
 */
export function createEventAnalogModel(params: {
  index: VectorIndex;
  settings?: Partial<ForecastSettings>;
  log?: SubsystemLogger;
}): BacktestModel {
  const settings: ForecastSettings = { ...DEFAULT_FORECAST_SETTINGS, ...params.settings };
  const log = params.log ?? silentLogger;

  const pickCandidates = (events: EventRecord[], symbol: string): EventRecord[] => {
    const relevant = settings.requireSymbolMention
      ? events.filter((event) => isSymbolMentioned(eventText(event), symbol))
      : events;
    return relevant.slice(-MAX_ANCHOR_CANDIDATES).reverse();
  };

  return {
    name: "event-analog",
    schemaVersion: 1,
    predict: async (ctx) => {
      const asOfMs = requireZonedMs(ctx.asOf, "asOf");
      const events = await ctx.events.listEvents({
        notBefore: toIso(asOfMs - ctx.lookbackDays * DAY_MS),
        notAfter: ctx.asOf,
      });
      const engine = createForecastEngine({
        index: params.index,
        events: ctx.events,
        outcomes: ctx.outcomes,
        defaults: settings,
        log,
      });
      for (const anchor of pickCandidates(events, ctx.symbol)) {
        try {
          const result = await engine.forecastEventReturn({
            eventId: anchor.id,
            symbol: ctx.symbol,
            horizonMinutes: ctx.horizonMinutes,
          });
          if (result.sampleSize === 0) {
            return { ...EMPTY_FORECAST, anchorEventId: anchor.id };
          }
          return {
            expectedReturn: result.expectedReturn,
            volatility: result.stdReturn,
            pUp: result.pUp,
            sampleSize: result.sampleSize,
            confidence: directionalConfidence(
              classifyDirection(result.expectedReturn, ctx.directionThreshold),
              result.pUp,
              result.pDown,
            ),
            anchorEventId: anchor.id,
          };
        } catch (err) {
          if (!(err instanceof MissingEmbeddingError)) {
            throw err;
          }
          log.debug("anchor has no embedding", { eventId: anchor.id });
        }
      }
      return { ...EMPTY_FORECAST, anchorEventId: null };
    },
  };
}
