export type BacktestModelKind = "naive" | "event-analog";

export type BacktestConfig = {
  model?: BacktestModelKind;
  lookbackDays?: number;
  sampleFrequency?: number;
  directionThreshold?: number;
  concurrency?: number;
  calibrationBuckets?: number;
  calibrationTolerance?: number;
  persist?: boolean;
};

export type RegimeConfig = {
  horizonMinutes?: number;
  momentumDays?: number;
  volatilityDays?: number;
  baseThreshold?: number;
  volatilityCoefficient?: number;
};
