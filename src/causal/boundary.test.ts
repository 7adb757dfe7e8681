import { describe, expect, it } from "vitest";
import type { EventRecord } from "../events/types.js";
import { LookaheadError } from "../errors.js";
import { createMemoryEventRepository } from "../events/store.js";
import { createMemoryOutcomeStore } from "../outcomes/store.js";
import { createCausalEventView, createCausalOutcomeView } from "./boundary.js";

const daily = (asOf: string, priceEnd: number) => ({
  symbol: "BTC",
  asOf,
  horizonMinutes: 1440,
  priceStart: 100,
  priceEnd,
});

function store() {
  return createMemoryOutcomeStore([
    daily("2024-06-01T00:00:00Z", 101),
    daily("2024-06-02T00:00:00Z", 102),
    daily("2024-06-03T00:00:00Z", 103),
  ]);
}

describe("createCausalOutcomeView", () => {
  it("throws when a query reaches past the cutoff", async () => {
    const view = createCausalOutcomeView(store(), "2024-06-03T00:00:00Z");
    await expect(
      view.listInWindow({
        symbol: "BTC",
        horizonMinutes: 1440,
        start: "2024-06-01T00:00:00Z",
        end: "2024-06-04T00:00:00Z",
      }),
    ).rejects.toBeInstanceOf(LookaheadError);
    await expect(
      view.listBefore({ symbol: "BTC", horizonMinutes: 1440, before: "2024-06-03T00:00:01Z" }),
    ).rejects.toThrow(/2024-06-03T00:00:01.000Z/);
    expect(view.accesses()).toEqual([]);
  });

  it("hides rows whose horizon has not elapsed by the cutoff", async () => {
    const view = createCausalOutcomeView(store(), "2024-06-02T12:00:00Z");
    const rows = await view.listBefore({
      symbol: "BTC",
      horizonMinutes: 1440,
      before: "2024-06-02T12:00:00Z",
    });
    expect(rows.map((row) => row.asOf)).toEqual(["2024-06-01T00:00:00.000Z"]);
    expect(view.accesses()).toEqual([
      { operation: "listBefore", upperBound: "2024-06-02T12:00:00.000Z" },
    ]);
  });

  it("can expose started but unrealized rows when asked", async () => {
    const view = createCausalOutcomeView(store(), "2024-06-02T12:00:00Z", {
      requireRealized: false,
    });
    const dates = await view.listAsOfDates({
      symbol: "BTC",
      horizonMinutes: 1440,
      start: "2024-06-01T00:00:00Z",
      end: "2024-06-02T12:00:00Z",
    });
    expect(dates).toEqual(["2024-06-01T00:00:00.000Z", "2024-06-02T00:00:00.000Z"]);
  });
});

describe("createCausalEventView", () => {
  const event = (id: string, timestamp: string): EventRecord => ({
    id,
    timestamp,
    source: "wire",
    rawText: id,
    categories: [],
    tags: [],
    embedding: null,
  });

  it("treats events after the cutoff as nonexistent", async () => {
    const events = createMemoryEventRepository([
      event("early", "2024-06-01T00:00:00Z"),
      event("late", "2024-06-05T00:00:00Z"),
    ]);
    const view = createCausalEventView(events, "2024-06-03T00:00:00Z");
    expect(await view.getEvent("late")).toBeNull();
    expect((await view.getEvent("early"))?.id).toBe("early");
    expect([...(await view.getEvents(["early", "late"])).keys()]).toEqual(["early"]);
    const listed = await view.listEvents({ notAfter: "2024-06-30T00:00:00Z" });
    expect(listed.map((entry) => entry.id)).toEqual(["early"]);
  });
});
