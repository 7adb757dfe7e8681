import type { WeightedMoments } from "./types.js";
import { clamp } from "../utils.js";

/** Linear map from expected return to an up-probability, clamped to [0, 1]. */
export function returnToProbability(expectedReturn: number): number {
  return clamp(0.5 + 0.4 * expectedReturn, 0, 1);
}

/**
 * Mixes the linear transform with the neighbor-weighted pUp. `weight` is the
 * share given to the linear transform.
 */
export function blendUpProbability(
  moments: Pick<WeightedMoments, "expectedReturn" | "pUp">,
  weight = 0.5,
): { pUp: number; pDown: number } {
  const w = clamp(weight, 0, 1);
  const pUp = clamp(w * returnToProbability(moments.expectedReturn) + (1 - w) * moments.pUp, 0, 1);
  return { pUp, pDown: 1 - pUp };
}
