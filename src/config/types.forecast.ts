export type ForecastConfig = {
  kNeighbors?: number;
  lookbackDays?: number;
  priceWindowMinutes?: number;
  alpha?: number;
  /** Drop neighbors whose text never mentions the forecast symbol. */
  requireSymbolMention?: boolean;
  /** Share of the linear return transform in the blended up-probability. */
  probabilityBlendWeight?: number;
};
