import fc from "fast-check";
import { describe, expect, it } from "vitest";
import type { ForecastSample } from "./types.js";
import { computeWeightedMoments, distanceWeight, NEUTRAL_MOMENTS } from "./aggregate.js";

function sample(distance: number, realizedReturn: number, neighborId = "n"): ForecastSample {
  return { neighborId, distance, realizedReturn, asOf: "2024-01-01T00:00:00.000Z" };
}

const sampleArb = fc.record({
  neighborId: fc.constantFrom("a", "b", "c"),
  distance: fc.double({ min: 0, max: 2, noNaN: true }),
  realizedReturn: fc.double({ min: -1, max: 1, noNaN: true }),
  asOf: fc.constant("2024-01-01T00:00:00.000Z"),
});

describe("distance-weighted aggregation", () => {
  it("returns the neutral result for no samples", () => {
    expect(computeWeightedMoments([], 0.5)).toEqual(NEUTRAL_MOMENTS);
    expect(NEUTRAL_MOMENTS).toEqual({
      expectedReturn: 0,
      stdReturn: 0,
      pUp: 0.5,
      pDown: 0.5,
      sampleSize: 0,
    });
  });

  it("weights two analogs by exp(-alpha * distance)", () => {
    const moments = computeWeightedMoments([sample(0.2, 0.05), sample(0.8, -0.1)], 0.5);
    expect(moments.expectedReturn).toBeCloseTo(-0.013833622, 8);
    expect(moments.stdReturn).toBeCloseTo(0.074164088, 8);
    expect(moments.pUp).toBeCloseTo(0.574442517, 8);
    expect(moments.pDown).toBeCloseTo(0.425557483, 8);
    expect(moments.sampleSize).toBe(2);
  });

  it("returns the sample itself when there is only one", () => {
    const moments = computeWeightedMoments([sample(0.3, 0.02)], 0.5);
    expect(moments.expectedReturn).toBeCloseTo(0.02, 15);
    expect(moments.stdReturn).toBeCloseTo(0, 12);
    expect(moments.pUp).toBe(1);
    expect(moments.pDown).toBe(0);
  });

  it("does not count a zero return as up", () => {
    const moments = computeWeightedMoments([sample(0.1, 0), sample(0.5, 0)], 0.5);
    expect(moments.expectedReturn).toBe(0);
    expect(moments.pUp).toBe(0);
    expect(moments.pDown).toBe(1);
  });

  it("falls back to unweighted statistics when every weight underflows", () => {
    const moments = computeWeightedMoments(
      [sample(2, 0.1), sample(2, -0.3), sample(2, 0.2)],
      1000,
    );
    expect(moments.expectedReturn).toBeCloseTo(0, 15);
    expect(moments.stdReturn).toBeCloseTo(Math.sqrt(0.14 / 3), 12);
    expect(moments.pUp).toBeCloseTo(2 / 3, 15);
  });

  it("keeps probabilities complementary and in range", () => {
    fc.assert(
      fc.property(
        fc.array(sampleArb, { maxLength: 40 }),
        fc.double({ min: 0.01, max: 10, noNaN: true }),
        (samples, alpha) => {
          const moments = computeWeightedMoments(samples, alpha);
          expect(moments.pUp).toBeGreaterThanOrEqual(0);
          expect(moments.pUp).toBeLessThanOrEqual(1);
          expect(moments.pUp + moments.pDown).toBe(1);
          expect(moments.stdReturn).toBeGreaterThanOrEqual(0);
          expect(moments.sampleSize).toBe(samples.length);
        },
      ),
    );
  });

  it("never gives a farther neighbor more weight", () => {
    fc.assert(
      fc.property(
        fc.double({ min: 0, max: 5, noNaN: true }),
        fc.double({ min: 0, max: 5, noNaN: true }),
        fc.double({ min: 0.01, max: 5, noNaN: true }),
        (a, b, alpha) => {
          const [near, far] = a <= b ? [a, b] : [b, a];
          expect(distanceWeight(near, alpha)).toBeGreaterThanOrEqual(distanceWeight(far, alpha));
        },
      ),
    );
    expect(distanceWeight(0, 0.5)).toBe(1);
    expect(distanceWeight(0.1, 0.5)).toBeGreaterThan(distanceWeight(0.2, 0.5));
  });
});
