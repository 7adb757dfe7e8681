import { describe, expect, it } from "vitest";
import { createMemoryOutcomeStore } from "../outcomes/store.js";
import { classifyRegime, compoundReturns, createRegimeClassifier, labelRegime } from "./classifier.js";

describe("labelRegime", () => {
  it("widens the band with volatility", () => {
    expect(labelRegime(0.05, 0.02)).toEqual({ regime: "uptrend", score: 0.05, threshold: 0.03 });
    expect(labelRegime(-0.04, 0)).toEqual({ regime: "downtrend", score: 0.04, threshold: 0.02 });
    expect(labelRegime(0.025, 0.02).regime).toBe("chop");
  });

  it("compounds returns", () => {
    expect(compoundReturns([0.1, -0.1])).toBeCloseTo(-0.01, 12);
    expect(compoundReturns([])).toBe(0);
  });
});

describe("classifyRegime", () => {
  const day = (date: string, priceEnd: number) => ({
    symbol: "btc",
    asOf: `${date}T00:00:00Z`,
    horizonMinutes: 1440,
    priceStart: 100,
    priceEnd,
  });

  const outcomes = createMemoryOutcomeStore([
    day("2024-03-20", 100),
    day("2024-03-24", 101),
    day("2024-03-25", 101),
    day("2024-03-26", 101),
    day("2024-03-27", 101),
    day("2024-03-28", 101),
    day("2024-03-29", 101),
    day("2024-03-30", 101),
    day("2024-03-31", 50),
  ]);

  it("reads only returns realized before asOf", async () => {
    const result = await classifyRegime({ symbol: "BTC", asOf: "2024-03-31T00:00:00Z", outcomes });
    expect(result.regime).toBe("uptrend");
    expect(result.momentum).toBeCloseTo(1.01 ** 7 - 1, 10);
    expect(result.volatility).toBeCloseTo(Math.sqrt(1.09375e-5), 10);
    expect(result.sampleSize).toBe(8);
    expect(result.asOf).toBe("2024-03-31T00:00:00.000Z");
  });

  it("reports chop when the band is wider than the move", async () => {
    const classify = createRegimeClassifier({ baseThreshold: 0.1 });
    const result = await classify({ symbol: "BTC", asOf: "2024-03-31T00:00:00Z", outcomes });
    expect(result.regime).toBe("chop");
  });

  it("is chop with no history", async () => {
    const result = await classifyRegime({
      symbol: "ETH",
      asOf: "2024-03-31T00:00:00Z",
      outcomes,
    });
    expect(result).toMatchObject({ regime: "chop", momentum: 0, volatility: 0, sampleSize: 0 });
  });
});
