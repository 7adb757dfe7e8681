export type ForecastSample = {
  neighborId: string;
  distance: number;
  realizedReturn: number;
  asOf: string;
};

export type WeightedMoments = {
  expectedReturn: number;
  stdReturn: number;
  pUp: number;
  pDown: number;
  sampleSize: number;
};

export type ForecastResult = WeightedMoments & {
  eventId: string;
  symbol: string;
  horizonMinutes: number;
  neighborsUsed: number;
};

export type ResolvedAnchor = {
  eventId: string;
  timestamp: string;
  timestampMs: number;
  vector: number[];
};
