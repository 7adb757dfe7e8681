import { describe, expect, it } from "vitest";
import type { BacktestRow } from "./types.js";
import { buildBacktestReport, computeCalibration } from "./metrics.js";

let seq = 0;

function row(overrides: Partial<BacktestRow>): BacktestRow {
  seq += 1;
  return {
    id: `row-${seq}`,
    symbol: "BTC",
    asOf: "2024-05-01T00:00:00.000Z",
    horizonMinutes: 1440,
    model: "naive",
    schemaVersion: 1,
    expectedReturn: 0.01,
    predictedDirection: "up",
    confidence: 0.5,
    sampleSize: 10,
    realizedReturn: 0.01,
    actualDirection: "up",
    directionCorrect: true,
    regime: "chop",
    ...overrides,
  };
}

const rows: BacktestRow[] = [
  row({
    confidence: 0.9,
    sampleSize: 25,
    regime: "uptrend",
    expectedReturn: 0.02,
    realizedReturn: 0.01,
  }),
  row({
    confidence: 0.8,
    sampleSize: 5,
    regime: "uptrend",
    expectedReturn: 0.01,
    realizedReturn: -0.01,
    actualDirection: "down",
    directionCorrect: false,
  }),
  row({
    symbol: "ETH",
    confidence: 0.6,
    predictedDirection: "down",
    actualDirection: "down",
    expectedReturn: -0.01,
    realizedReturn: -0.02,
  }),
  row({
    symbol: "ETH",
    confidence: 0.55,
    predictedDirection: "down",
    actualDirection: "down",
    expectedReturn: -0.02,
    realizedReturn: -0.03,
  }),
  row({
    expectedReturn: null,
    predictedDirection: null,
    directionCorrect: null,
    confidence: 0,
    sampleSize: 0,
  }),
];

describe("buildBacktestReport", () => {
  it("groups directional accuracy over rows that carry a forecast", () => {
    const report = buildBacktestReport(rows, { calibrationBuckets: 2 });
    expect(report.rows).toBe(5);
    expect(report.evaluated).toBe(4);
    expect(report.withoutForecast).toBe(1);
    const overall = { n: 4, correct: 3, accuracy: 0.75, avgConfidence: 0.7125, avgSampleSize: 12.5 };
    expect(report.overall).toEqual(overall);
    expect(report.byPredictedDirection).toEqual({
      down: { n: 2, correct: 2, accuracy: 1, avgConfidence: 0.575, avgSampleSize: 10 },
      up: { n: 2, correct: 1, accuracy: 0.5, avgConfidence: 0.85, avgSampleSize: 15 },
    });
    expect(report.byRegime).toEqual({
      chop: { n: 2, correct: 2, accuracy: 1, avgConfidence: 0.575, avgSampleSize: 10 },
      uptrend: { n: 2, correct: 1, accuracy: 0.5, avgConfidence: 0.85, avgSampleSize: 15 },
    });
    expect(Object.keys(report.bySymbol)).toEqual(["BTC", "ETH"]);
    expect(report.byHorizon["1440"]).toEqual(overall);
    expect(report.meanAbsoluteError).toBe(0.0125);
  });

  it("breaks accuracy down by confidence tier", () => {
    const report = buildBacktestReport(rows);
    expect(report.byConfidenceTier).toEqual({
      green: { n: 1, correct: 1, accuracy: 1, avgConfidence: 0.9, avgSampleSize: 25 },
      red: { n: 1, correct: 0, accuracy: 0, avgConfidence: 0.8, avgSampleSize: 5 },
      yellow: { n: 2, correct: 2, accuracy: 1, avgConfidence: 0.575, avgSampleSize: 10 },
    });
  });

  it("flags buckets whose hit rate strays from their confidence", () => {
    const evaluated = rows.flatMap((entry) =>
      entry.directionCorrect === null ? [] : [{ ...entry, directionCorrect: entry.directionCorrect }],
    );
    const summary = computeCalibration(evaluated, { buckets: 2, tolerance: 0.1 });
    expect(summary.buckets).toHaveLength(2);
    const [low, high] = summary.buckets;
    expect(low).toMatchObject({ n: 2, minConfidence: 0.55, maxConfidence: 0.6, accuracy: 1 });
    expect(low.meanConfidence).toBeCloseTo(0.575, 4);
    expect(low.miscalibrated).toBe(true);
    expect(high).toMatchObject({ n: 2, accuracy: 0.5, meanConfidence: 0.85, miscalibrated: true });
    expect(summary.expectedCalibrationError).toBeCloseTo(0.3875, 3);
    expect(summary.wellCalibrated).toBe(false);
  });

  it("reports nothing to calibrate for an empty run", () => {
    const report = buildBacktestReport([]);
    expect(report.overall).toEqual({
      n: 0,
      correct: 0,
      accuracy: null,
      avgConfidence: null,
      avgSampleSize: null,
    });
    expect(report.byConfidenceTier).toEqual({});
    expect(report.meanAbsoluteError).toBeNull();
    expect(report.calibration).toEqual({
      buckets: [],
      expectedCalibrationError: null,
      tolerance: 0.1,
      wellCalibrated: true,
    });
  });
});
