import type { RegimeSettings } from "../config/defaults.js";
import type { RealizedOutcomeReader } from "../outcomes/types.js";
import { DEFAULT_REGIME_SETTINGS } from "../config/defaults.js";
import { createAsOfCursor } from "../outcomes/cursor.js";
import { requireZonedMs, toIso, type InstantInput } from "../time/instant.js";
import { DAY_MS, normalizeSymbol, pstdev } from "../utils.js";

export type Regime = "uptrend" | "downtrend" | "chop";

export type RegimeResult = {
  symbol: string;
  asOf: string;
  regime: Regime;
  score: number;
  momentum: number;
  volatility: number;
  threshold: number;
  sampleSize: number;
};

export type RegimeClassifier = (params: {
  symbol: string;
  asOf: InstantInput;
  outcomes: RealizedOutcomeReader;
}) => Promise<RegimeResult>;

export function labelRegime(
  momentum: number,
  volatility: number,
  settings: Pick<RegimeSettings, "baseThreshold" | "volatilityCoefficient"> = DEFAULT_REGIME_SETTINGS,
): { regime: Regime; score: number; threshold: number } {
  const threshold = settings.baseThreshold + settings.volatilityCoefficient * volatility;
  if (momentum > threshold) {
    return { regime: "uptrend", score: momentum, threshold };
  }
  if (momentum < -threshold) {
    return { regime: "downtrend", score: -momentum, threshold };
  }
  return { regime: "chop", score: Math.abs(momentum), threshold };
}

export function compoundReturns(returns: number[]): number {
  return returns.reduce((acc, value) => acc * (1 + value), 1) - 1;
}

/**
 * Trend label from trailing momentum against a volatility-scaled band. Only
 * returns whose horizon had fully elapsed before `asOf` are read.
 */
export function createRegimeClassifier(overrides: Partial<RegimeSettings> = {}): RegimeClassifier {
  const settings: RegimeSettings = { ...DEFAULT_REGIME_SETTINGS, ...overrides };
  return async ({ symbol, asOf, outcomes }) => {
    const asOfMs = requireZonedMs(asOf, "asOf");
    const lookbackDays = Math.max(settings.momentumDays, settings.volatilityDays);
    const rows = await outcomes.listBefore({
      symbol,
      horizonMinutes: settings.horizonMinutes,
      before: asOfMs,
      since: asOfMs - lookbackDays * DAY_MS,
    });
    const cursor = createAsOfCursor(rows, { cutoff: asOfMs, requireRealized: true });
    const momentumRows = cursor.since(asOfMs - settings.momentumDays * DAY_MS);
    const volatilityRows = cursor.since(asOfMs - settings.volatilityDays * DAY_MS);
    const momentum = compoundReturns(momentumRows.map((row) => row.realizedReturn));
    const volatility = pstdev(volatilityRows.map((row) => row.realizedReturn));
    const label = labelRegime(momentum, volatility, settings);
    return {
      symbol: normalizeSymbol(symbol),
      asOf: toIso(asOfMs),
      ...label,
      momentum,
      volatility,
      sampleSize: volatilityRows.length,
    };
  };
}

export const classifyRegime: RegimeClassifier = createRegimeClassifier();
