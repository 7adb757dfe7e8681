import type { BacktestConfig, RegimeConfig } from "./types.backtest.js";
import type { ForecastConfig } from "./types.forecast.js";
import type { EmbeddingsConfig, RetryConfig, VectorIndexConfig } from "./types.index.js";

export type StorageConfig = {
  eventsPath?: string;
  outcomesPath?: string;
};

export type EchocastConfig = {
  forecast?: ForecastConfig;
  backtest?: BacktestConfig;
  regime?: RegimeConfig;
  vectorIndex?: VectorIndexConfig;
  embeddings?: EmbeddingsConfig;
  retry?: RetryConfig;
  storage?: StorageConfig;
};
