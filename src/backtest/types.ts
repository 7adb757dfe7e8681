import type { CausalOutcomeView } from "../causal/boundary.js";
import type { EventReader } from "../events/types.js";
import type { Regime } from "../regime/classifier.js";

export type Direction = "up" | "down" | "flat";

/** What a model knows at asOf; finalized before any ground truth is read. */
export type ModelForecast = {
  expectedReturn: number | null;
  confidence: number;
  sampleSize: number;
  volatility?: number | null;
  pUp?: number | null;
  anchorEventId?: string | null;
};

export type ModelContext = {
  symbol: string;
  asOf: string;
  horizonMinutes: number;
  lookbackDays: number;
  /** Dead band the harness classifies directions with. */
  directionThreshold: number;
  outcomes: CausalOutcomeView;
  events: EventReader;
};

export type BacktestModel = {
  name: string;
  schemaVersion: number;
  predict: (ctx: ModelContext) => Promise<ModelForecast>;
};

export type BacktestRow = {
  id: string;
  symbol: string;
  asOf: string;
  horizonMinutes: number;
  model: string;
  schemaVersion: number;
  expectedReturn: number | null;
  predictedDirection: Direction | null;
  confidence: number;
  sampleSize: number;
  realizedReturn: number | null;
  actualDirection: Direction | null;
  directionCorrect: boolean | null;
  regime: Regime;
  anchorEventId?: string | null;
};

export type BacktestFailure = {
  symbol: string;
  asOf: string;
  horizonMinutes: number;
  error: string;
};

export type BacktestStats = {
  cells: number;
  completed: number;
  failed: number;
  notStarted: number;
};

export type BacktestDataset = {
  rows: BacktestRow[];
  failures: BacktestFailure[];
  cancelled: boolean;
  stats: BacktestStats;
};
