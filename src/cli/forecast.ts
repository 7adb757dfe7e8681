import { Command } from "commander";
import { loadConfig } from "../config/config.js";
import { resolveForecastSettings } from "../config/defaults.js";
import { confidenceTier } from "../forecast/confidence.js";
import { createForecastEngine } from "../forecast/engine.js";
import { blendUpProbability } from "../forecast/probability.js";
import { createSubsystemLogger } from "../logging/logger.js";
import { createRuntime } from "../runtime.js";
import { round } from "../utils.js";

const program = new Command();

program
  .requiredOption("--event <id>", "Anchor event id")
  .requiredOption("--symbol <symbol>", "Symbol to forecast, e.g. BTC-USD")
  .requiredOption("--horizon <minutes>", "Forecast horizon in minutes")
  .option("--k <count>", "Neighbors to retrieve")
  .option("--lookbackDays <days>", "How far back neighbors may lie")
  .option("--window <minutes>", "Price window around each neighbor")
  .option("--alpha <value>", "Distance decay")
  .option("--requireMention", "Only use neighbors that mention the symbol")
  .option("--explain", "Include the neighbors behind the forecast")
  .parse(process.argv);

const opts = program.opts();

function optionalNumber(value: unknown, label: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${label} must be a number`);
  }
  return parsed;
}

const cfg = loadConfig();
const settings = resolveForecastSettings(cfg);
const log = createSubsystemLogger("forecast");
const runtime = await createRuntime(cfg, log);
const engine = createForecastEngine({ ...runtime, log, defaults: settings });

const { result, sampling } = await engine.explainForecast({
  eventId: String(opts.event),
  symbol: String(opts.symbol),
  horizonMinutes: optionalNumber(opts.horizon, "horizon") ?? 0,
  kNeighbors: optionalNumber(opts.k, "k"),
  lookbackDays: optionalNumber(opts.lookbackDays, "lookbackDays"),
  priceWindowMinutes: optionalNumber(opts.window, "window"),
  alpha: optionalNumber(opts.alpha, "alpha"),
  requireSymbolMention: opts.requireMention === true ? true : undefined,
});

const blended = blendUpProbability(result, settings.probabilityBlendWeight);
const confidence = Math.max(blended.pUp, blended.pDown);

console.log(
  JSON.stringify(
    {
      ...result,
      blendedPUp: round(blended.pUp, 4),
      confidence: round(confidence, 4),
      tier: confidenceTier(confidence, result.sampleSize),
      neighbors: opts.explain ? sampling.neighbors : undefined,
    },
    null,
    2,
  ),
);
