import type { ForecastSample, WeightedMoments } from "./types.js";

export const NEUTRAL_MOMENTS: WeightedMoments = {
  expectedReturn: 0,
  stdReturn: 0,
  pUp: 0.5,
  pDown: 0.5,
  sampleSize: 0,
};

/** exp(-alpha * d): 1 at distance zero, strictly decreasing for alpha > 0. */
export function distanceWeight(distance: number, alpha: number): number {
  return Math.exp(-alpha * distance);
}

function unweightedMoments(returns: number[]): WeightedMoments {
  const n = returns.length;
  const mean = returns.reduce((acc, value) => acc + value, 0) / n;
  const variance = returns.reduce((acc, value) => acc + (value - mean) ** 2, 0) / n;
  const pUp = returns.filter((value) => value > 0).length / n;
  return {
    expectedReturn: mean,
    stdReturn: Math.sqrt(variance),
    pUp,
    pDown: 1 - pUp,
    sampleSize: n,
  };
}

/**
 * Distance-weighted mean, standard deviation and up-probability of the
 * sampled returns. A return of exactly zero counts toward pDown.
 */
export function computeWeightedMoments(samples: ForecastSample[], alpha: number): WeightedMoments {
  if (samples.length === 0) {
    return { ...NEUTRAL_MOMENTS };
  }
  const returns = samples.map((sample) => sample.realizedReturn);
  const weights = samples.map((sample) => distanceWeight(sample.distance, alpha));
  const weightSum = weights.reduce((acc, value) => acc + value, 0);
  if (!Number.isFinite(weightSum) || weightSum <= 0) {
    return unweightedMoments(returns);
  }
  let mean = 0;
  for (let i = 0; i < returns.length; i += 1) {
    mean += weights[i] * returns[i];
  }
  mean /= weightSum;

  let variance = 0;
  let upWeight = 0;
  for (let i = 0; i < returns.length; i += 1) {
    variance += weights[i] * (returns[i] - mean) ** 2;
    if (returns[i] > 0) {
      upWeight += weights[i];
    }
  }
  variance /= weightSum;
  const pUp = Math.min(1, Math.max(0, upWeight / weightSum));
  return {
    expectedReturn: mean,
    stdReturn: Math.sqrt(Math.max(0, variance)),
    pUp,
    pDown: 1 - pUp,
    sampleSize: samples.length,
  };
}
