export { VERSION } from "./version.js";
export * from "./errors.js";
export type { EchocastConfig } from "./config/types.js";
export { loadConfig, parseConfig } from "./config/config.js";
export {
  resolveBacktestSettings,
  resolveForecastSettings,
  resolveRegimeSettings,
} from "./config/defaults.js";
export { createSubsystemLogger } from "./logging/logger.js";
export type { SubsystemLogger } from "./logging/logger.js";
export { withRetry } from "./retry/policy.js";
export type { RetryPolicy } from "./retry/policy.js";

export type { VectorHit, VectorIndex, VectorRecord, VectorSearchQuery } from "./vector/types.js";
export { createBruteForceIndex } from "./vector/brute-force.js";
export { createWeaviateIndex } from "./vector/weaviate.js";
export { createVectorIndex } from "./vector/factory.js";

export type { EventReader, EventRecord, EventRepository } from "./events/types.js";
export { createFileEventRepository, createMemoryEventRepository } from "./events/store.js";
export { indexEvents } from "./events/indexing.js";
export type { EmbeddingProvider } from "./embeddings/types.js";
export { localHashEmbedding } from "./embeddings/local.js";
export { createResilientEmbedder } from "./embeddings/resilient.js";

export type {
  RealizedOutcomeReader,
  RealizedOutcomeStore,
  RealizedReturn,
  RealizedReturnInput,
} from "./outcomes/types.js";
export { createFileOutcomeStore, createMemoryOutcomeStore } from "./outcomes/store.js";
export { createAsOfCursor } from "./outcomes/cursor.js";
export { createCausalEventView, createCausalOutcomeView } from "./causal/boundary.js";

export type { ForecastResult, ForecastSample } from "./forecast/types.js";
export { resolveAnchor } from "./forecast/anchor.js";
export { sampleNeighbors } from "./forecast/sampler.js";
export { computeWeightedMoments, distanceWeight } from "./forecast/aggregate.js";
export { createForecastEngine } from "./forecast/engine.js";
export type { ForecastEngine, ForecastParams } from "./forecast/engine.js";
export { blendUpProbability, returnToProbability } from "./forecast/probability.js";
export { computeHorizonNormalizedConfidence, confidenceTier } from "./forecast/confidence.js";
export { isSymbolMentioned } from "./forecast/symbol-filter.js";

export type { Regime, RegimeClassifier, RegimeResult } from "./regime/classifier.js";
export { classifyRegime, createRegimeClassifier } from "./regime/classifier.js";

export type { BacktestDataset, BacktestModel, BacktestRow } from "./backtest/types.js";
export { buildBacktestDataset } from "./backtest/dataset.js";
export { buildBacktestReport } from "./backtest/metrics.js";
export type { BacktestReport } from "./backtest/metrics.js";
export { createEventAnalogModel, naiveReturnModel } from "./backtest/models.js";
export { classifyDirection } from "./backtest/direction.js";
