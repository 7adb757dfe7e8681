import type { Direction } from "./types.js";

export const DEFAULT_DIRECTION_THRESHOLD = 0.0005;

/** Symmetric dead band: |value| <= threshold is flat. */
export function classifyDirection(
  value: number | null | undefined,
  threshold = DEFAULT_DIRECTION_THRESHOLD,
): Direction | null {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return null;
  }
  const band = Math.max(0, threshold);
  if (value > band) {
    return "up";
  }
  if (value < -band) {
    return "down";
  }
  return "flat";
}

export function isDirectionCorrect(
  predicted: Direction | null,
  actual: Direction | null,
): boolean | null {
  if (predicted === null || actual === null) {
    return null;
  }
  return predicted === actual;
}
