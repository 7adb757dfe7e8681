import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import fc from "fast-check";
import { afterEach, describe, expect, it } from "vitest";
import { InvalidParamsError, NaiveTimestampError } from "../errors.js";
import { createAsOfCursor } from "./cursor.js";
import { createFileOutcomeStore, createMemoryOutcomeStore } from "./store.js";

const series = [
  { symbol: "btc-usd", asOf: "2024-03-01T00:00:00Z", horizonMinutes: 60, priceStart: 100, priceEnd: 102 },
  { symbol: "BTC-USD", asOf: "2024-03-01T01:00:00Z", horizonMinutes: 60, priceStart: 102, priceEnd: 99.96 },
  { symbol: "BTC-USD", asOf: "2024-03-01T02:00:00Z", horizonMinutes: 60, priceStart: 100, priceEnd: 100 },
  { symbol: "ETH-USD", asOf: "2024-03-01T01:00:00Z", horizonMinutes: 60, priceStart: 10, priceEnd: 11 },
];

describe("memory outcome store", () => {
  it("derives realized returns and normalizes keys", async () => {
    const store = createMemoryOutcomeStore(series);
    const row = await store.getExact({
      symbol: "btc-usd",
      asOf: "2024-03-01T01:00:00+01:00",
      horizonMinutes: 60,
    });
    expect(row?.symbol).toBe("BTC-USD");
    expect(row?.asOf).toBe("2024-03-01T00:00:00.000Z");
    expect(row?.realizedReturn).toBeCloseTo(0.02, 12);
  });

  it("treats duplicate keys as no-ops", async () => {
    const store = createMemoryOutcomeStore(series);
    const result = await store.insertMany([
      { symbol: "BTC-USD", asOf: "2024-03-01T00:00:00.000Z", horizonMinutes: 60, priceStart: 1, priceEnd: 5 },
      { symbol: "BTC-USD", asOf: "2024-03-01T00:00:00Z", horizonMinutes: 1440, priceStart: 1, priceEnd: 5 },
    ]);
    expect(result).toEqual({ inserted: 1, skipped: 1 });
    const kept = await store.getExact({
      symbol: "BTC-USD",
      asOf: "2024-03-01T00:00:00Z",
      horizonMinutes: 60,
    });
    expect(kept?.priceEnd).toBe(102);
  });

  it("keeps the first row per key however often batches are replayed", async () => {
    const rowArb = fc.record({
      symbol: fc.constantFrom("BTC", "eth"),
      hour: fc.integer({ min: 0, max: 5 }),
      horizonMinutes: fc.constantFrom(60, 1440),
      priceEnd: fc.integer({ min: 1, max: 500 }),
    });
    await fc.assert(
      fc.asyncProperty(fc.array(rowArb, { minLength: 1, maxLength: 30 }), fc.nat(), async (drawn, seed) => {
        const inputs = drawn.map((entry) => ({
          symbol: entry.symbol,
          asOf: `2024-03-01T0${entry.hour}:00:00Z`,
          horizonMinutes: entry.horizonMinutes,
          priceStart: 100,
          priceEnd: entry.priceEnd,
        }));
        const firstByKey = new Map<string, number>();
        for (const input of inputs) {
          const key = `${input.symbol.toUpperCase()}|${input.asOf}|${input.horizonMinutes}`;
          if (!firstByKey.has(key)) {
            firstByKey.set(key, input.priceEnd);
          }
        }

        const store = createMemoryOutcomeStore();
        const first = await store.insertMany(inputs);
        expect(first).toEqual({ inserted: firstByKey.size, skipped: inputs.length - firstByKey.size });

        const rotated = [...inputs.slice(seed % inputs.length), ...inputs.slice(0, seed % inputs.length)];
        expect(await store.insertMany(rotated)).toEqual({ inserted: 0, skipped: inputs.length });

        for (const [key, priceEnd] of firstByKey) {
          const [symbol, asOf, horizon] = key.split("|");
          const row = await store.getExact({ symbol, asOf, horizonMinutes: Number(horizon) });
          expect(row?.priceEnd).toBe(priceEnd);
        }
      }),
      { numRuns: 50 },
    );
  });

  it("rejects non-positive prices and naive timestamps", async () => {
    const store = createMemoryOutcomeStore();
    await expect(
      store.insertMany([
        { symbol: "X", asOf: "2024-01-01T00:00:00Z", horizonMinutes: 60, priceStart: 0, priceEnd: 1 },
      ]),
    ).rejects.toBeInstanceOf(InvalidParamsError);
    await expect(
      store.insertMany([
        { symbol: "X", asOf: "2024-01-01T00:00:00", horizonMinutes: 60, priceStart: 1, priceEnd: 1 },
      ]),
    ).rejects.toBeInstanceOf(NaiveTimestampError);
  });

  it("lists windows inclusively and before-queries exclusively", async () => {
    const store = createMemoryOutcomeStore(series);
    const window = await store.listInWindow({
      symbol: "BTC-USD",
      horizonMinutes: 60,
      start: "2024-03-01T00:00:00Z",
      end: "2024-03-01T01:00:00Z",
    });
    expect(window.map((row) => row.asOf)).toEqual([
      "2024-03-01T00:00:00.000Z",
      "2024-03-01T01:00:00.000Z",
    ]);
    const before = await store.listBefore({
      symbol: "BTC-USD",
      horizonMinutes: 60,
      before: "2024-03-01T01:00:00Z",
    });
    expect(before.map((row) => row.asOf)).toEqual(["2024-03-01T00:00:00.000Z"]);
    const dates = await store.listAsOfDates({
      symbol: "ETH-USD",
      horizonMinutes: 60,
      start: "2024-03-01T00:00:00Z",
      end: "2024-03-02T00:00:00Z",
    });
    expect(dates).toEqual(["2024-03-01T01:00:00.000Z"]);
  });
});

describe("file outcome store", () => {
  let tempDir: string | null = null;

  afterEach(async () => {
    if (tempDir) {
      await fs.promises.rm(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it("persists rows and stays idempotent across instances", async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "echocast-outcomes-"));
    const filePath = path.join(tempDir, "outcomes", "returns.ndjson");
    const first = createFileOutcomeStore({ filePath });
    expect(await first.insertMany(series)).toEqual({ inserted: 4, skipped: 0 });

    const second = createFileOutcomeStore({ filePath });
    expect(await second.insertMany(series.slice(0, 2))).toEqual({ inserted: 0, skipped: 2 });
    const rows = await second.listInWindow({
      symbol: "BTC-USD",
      horizonMinutes: 60,
      start: "2024-03-01T00:00:00Z",
      end: "2024-03-01T23:00:00Z",
    });
    expect(rows).toHaveLength(3);

    await second.insertMany([
      { symbol: "BTC-USD", asOf: "2024-03-01T03:00:00Z", horizonMinutes: 60, priceStart: 100, priceEnd: 101 },
    ]);
    const refreshed = await first.listAsOfDates({
      symbol: "BTC-USD",
      horizonMinutes: 60,
      start: "2024-03-01T00:00:00Z",
      end: "2024-03-01T23:00:00Z",
    });
    expect(refreshed).toHaveLength(4);
  });
});

describe("as-of cursor", () => {
  it("never exposes rows at or after the cutoff", async () => {
    const store = createMemoryOutcomeStore(series);
    const rows = await store.listInWindow({
      symbol: "BTC-USD",
      horizonMinutes: 60,
      start: "2024-03-01T00:00:00Z",
      end: "2024-03-01T02:00:00Z",
    });
    const cursor = createAsOfCursor(rows, { cutoff: "2024-03-01T01:00:00Z" });
    expect(cursor.rows.map((row) => row.asOf)).toEqual(["2024-03-01T00:00:00.000Z"]);

    const realized = createAsOfCursor(rows, {
      cutoff: "2024-03-01T01:30:00Z",
      requireRealized: true,
    });
    expect(realized.rows.map((row) => row.asOf)).toEqual(["2024-03-01T00:00:00.000Z"]);
    expect(realized.last(5)).toHaveLength(1);
  });
});
