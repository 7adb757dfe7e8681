import { clamp, DAY_MINUTES } from "../utils.js";

export type ConfidenceTier = "red" | "yellow" | "green";

/**
 * Signal-to-noise confidence scaled to a per-day basis so short and long
 * horizons are comparable. Thin samples are capped at 0.2.
 */
export function computeHorizonNormalizedConfidence(params: {
  expectedReturn: number;
  volatility: number;
  horizonMinutes: number;
  sampleSize: number;
  scale?: number;
  minSamples?: number;
}): number {
  const scale = params.scale ?? 2;
  const minSamples = params.minSamples ?? 10;
  if (params.sampleSize < minSamples) {
    return (params.sampleSize / minSamples) * 0.2;
  }
  if (params.volatility <= 0 || params.horizonMinutes <= 0) {
    return 0;
  }
  const days = params.horizonMinutes / DAY_MINUTES;
  const dailyReturn = params.expectedReturn / days;
  const dailyVolatility = params.volatility / Math.sqrt(days);
  const snr = Math.abs(dailyReturn) / (dailyVolatility + 1e-8);
  return clamp(snr / scale, 0, 1);
}

export function confidenceTier(confidence: number, sampleSize: number): ConfidenceTier {
  if (sampleSize < 8) {
    return "red";
  }
  if (confidence > 0.6 && sampleSize >= 20) {
    return "green";
  }
  return "yellow";
}
