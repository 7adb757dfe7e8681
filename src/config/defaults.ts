import type { EchocastConfig } from "./types.js";
import type { BacktestModelKind } from "./types.backtest.js";
import type { VectorMetric } from "./types.index.js";

export type ForecastSettings = {
  kNeighbors: number;
  lookbackDays: number;
  priceWindowMinutes: number;
  alpha: number;
  requireSymbolMention: boolean;
  probabilityBlendWeight: number;
};

export const DEFAULT_FORECAST_SETTINGS: ForecastSettings = {
  kNeighbors: 25,
  lookbackDays: 365,
  priceWindowMinutes: 60,
  alpha: 0.5,
  requireSymbolMention: false,
  probabilityBlendWeight: 0.5,
};

export type BacktestSettings = {
  model: BacktestModelKind;
  lookbackDays: number;
  sampleFrequency: number;
  directionThreshold: number;
  concurrency: number;
  calibrationBuckets: number;
  calibrationTolerance: number;
  persist: boolean;
};

export const DEFAULT_BACKTEST_SETTINGS: BacktestSettings = {
  model: "naive",
  lookbackDays: 60,
  sampleFrequency: 1,
  directionThreshold: 0.0005,
  concurrency: 4,
  calibrationBuckets: 5,
  calibrationTolerance: 0.1,
  persist: false,
};

export type RegimeSettings = {
  horizonMinutes: number;
  momentumDays: number;
  volatilityDays: number;
  baseThreshold: number;
  volatilityCoefficient: number;
};

export const DEFAULT_REGIME_SETTINGS: RegimeSettings = {
  horizonMinutes: 1440,
  momentumDays: 7,
  volatilityDays: 30,
  baseThreshold: 0.02,
  volatilityCoefficient: 0.5,
};

export type EmbeddingSettings = {
  provider: "openai" | "local";
  model: string;
  dimension: number;
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
};

export const DEFAULT_EMBEDDING_SETTINGS: EmbeddingSettings = {
  provider: "local",
  model: "text-embedding-3-small",
  dimension: 1536,
  baseUrl: "https://api.openai.com/v1",
  timeoutMs: 15_000,
};

export const DEFAULT_VECTOR_METRIC: VectorMetric = "cosine";

export function resolveForecastSettings(cfg: EchocastConfig): ForecastSettings {
  return { ...DEFAULT_FORECAST_SETTINGS, ...cfg.forecast };
}

export function resolveBacktestSettings(cfg: EchocastConfig): BacktestSettings {
  return { ...DEFAULT_BACKTEST_SETTINGS, ...cfg.backtest };
}

export function resolveRegimeSettings(cfg: EchocastConfig): RegimeSettings {
  return { ...DEFAULT_REGIME_SETTINGS, ...cfg.regime };
}

export function resolveEmbeddingSettings(cfg: EchocastConfig): EmbeddingSettings {
  return { ...DEFAULT_EMBEDDING_SETTINGS, ...cfg.embeddings };
}
