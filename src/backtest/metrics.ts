import type { BacktestRow } from "./types.js";
import { confidenceTier } from "../forecast/confidence.js";
import { round } from "../utils.js";

export type AccuracyGroup = {
  n: number;
  correct: number;
  accuracy: number | null;
  avgConfidence: number | null;
  avgSampleSize: number | null;
};

export type CalibrationBucket = {
  bucket: number;
  n: number;
  minConfidence: number;
  maxConfidence: number;
  meanConfidence: number;
  accuracy: number;
  calibrationError: number;
  miscalibrated: boolean;
};

export type CalibrationSummary = {
  buckets: CalibrationBucket[];
  expectedCalibrationError: number | null;
  tolerance: number;
  wellCalibrated: boolean;
};

export type BacktestReport = {
  rows: number;
  evaluated: number;
  withoutForecast: number;
  overall: AccuracyGroup;
  byPredictedDirection: Record<string, AccuracyGroup>;
  byRegime: Record<string, AccuracyGroup>;
  byHorizon: Record<string, AccuracyGroup>;
  bySymbol: Record<string, AccuracyGroup>;
  /** Keyed by the red/yellow/green tier of each row's confidence and sample size. */
  byConfidenceTier: Record<string, AccuracyGroup>;
  meanAbsoluteError: number | null;
  calibration: CalibrationSummary;
};

type EvaluatedRow = BacktestRow & { directionCorrect: boolean };

function isEvaluated(row: BacktestRow): row is EvaluatedRow {
  return row.directionCorrect !== null;
}

function averageOf(rows: EvaluatedRow[], pick: (row: EvaluatedRow) => number, digits: number) {
  if (rows.length === 0) {
    return null;
  }
  return round(rows.reduce((acc, row) => acc + pick(row), 0) / rows.length, digits);
}

export function computeAccuracy(rows: EvaluatedRow[]): AccuracyGroup {
  const correct = rows.filter((row) => row.directionCorrect).length;
  return {
    n: rows.length,
    correct,
    accuracy: rows.length === 0 ? null : round(correct / rows.length, 4),
    avgConfidence: averageOf(rows, (row) => row.confidence, 4),
    avgSampleSize: averageOf(rows, (row) => row.sampleSize, 2),
  };
}

export function groupAccuracy(
  rows: EvaluatedRow[],
  keyOf: (row: EvaluatedRow) => string,
): Record<string, AccuracyGroup> {
  const groups = new Map<string, EvaluatedRow[]>();
  for (const row of rows) {
    const key = keyOf(row);
    const existing = groups.get(key);
    if (existing) {
      existing.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  const out: Record<string, AccuracyGroup> = {};
  for (const key of [...groups.keys()].sort()) {
    out[key] = computeAccuracy(groups.get(key) ?? []);
  }
  return out;
}

/**
 * Splits evaluated rows into equal-count buckets by confidence and compares
 * each bucket's mean confidence with its hit rate.
 */
export function computeCalibration(
  rows: EvaluatedRow[],
  opts: { buckets: number; tolerance: number },
): CalibrationSummary {
  const bucketCount = Math.max(1, Math.floor(opts.buckets));
  const sorted = [...rows].sort((a, b) =>
    a.confidence !== b.confidence ? a.confidence - b.confidence : a.id.localeCompare(b.id),
  );
  const buckets: CalibrationBucket[] = [];
  let weightedError = 0;
  for (let i = 0; i < bucketCount; i += 1) {
    const from = Math.floor((i * sorted.length) / bucketCount);
    const to = Math.floor(((i + 1) * sorted.length) / bucketCount);
    const slice = sorted.slice(from, to);
    if (slice.length === 0) {
      continue;
    }
    const meanConfidence = slice.reduce((acc, row) => acc + row.confidence, 0) / slice.length;
    const accuracy = slice.filter((row) => row.directionCorrect).length / slice.length;
    const error = Math.abs(accuracy - meanConfidence);
    weightedError += (slice.length / sorted.length) * error;
    buckets.push({
      bucket: buckets.length,
      n: slice.length,
      minConfidence: round(slice[0].confidence, 4),
      maxConfidence: round(slice[slice.length - 1].confidence, 4),
      meanConfidence: round(meanConfidence, 4),
      accuracy: round(accuracy, 4),
      calibrationError: round(error, 4),
      miscalibrated: error > opts.tolerance,
    });
  }
  return {
    buckets,
    expectedCalibrationError: sorted.length === 0 ? null : round(weightedError, 4),
    tolerance: opts.tolerance,
    wellCalibrated: buckets.every((bucket) => !bucket.miscalibrated),
  };
}

export function buildBacktestReport(
  rows: BacktestRow[],
  opts: { calibrationBuckets?: number; calibrationTolerance?: number } = {},
): BacktestReport {
  const evaluated = rows.filter(isEvaluated);
  const errors = rows.flatMap((row) =>
    row.expectedReturn !== null && row.realizedReturn !== null
      ? [Math.abs(row.expectedReturn - row.realizedReturn)]
      : [],
  );
  return {
    rows: rows.length,
    evaluated: evaluated.length,
    withoutForecast: rows.filter((row) => row.expectedReturn === null).length,
    overall: computeAccuracy(evaluated),
    byPredictedDirection: groupAccuracy(evaluated, (row) => row.predictedDirection ?? "none"),
    byRegime: groupAccuracy(evaluated, (row) => row.regime),
    byHorizon: groupAccuracy(evaluated, (row) => String(row.horizonMinutes)),
    bySymbol: groupAccuracy(evaluated, (row) => row.symbol),
    byConfidenceTier: groupAccuracy(evaluated, (row) => confidenceTier(row.confidence, row.sampleSize)),
    meanAbsoluteError:
      errors.length === 0
        ? null
        : round(errors.reduce((acc, value) => acc + value, 0) / errors.length, 6),
    calibration: computeCalibration(evaluated, {
      buckets: opts.calibrationBuckets ?? 5,
      tolerance: opts.calibrationTolerance ?? 0.1,
    }),
  };
}
