import type { RealizedReturn } from "./types.js";
import { parseIsoDate } from "../time/instant.js";

export type SeriesEntry = {
  asOfMs: number;
  row: RealizedReturn;
};

export type SeriesIndex = Map<string, SeriesEntry[]>;

export function buildSeriesKey(symbol: string, horizonMinutes: number): string {
  return `${symbol}::${horizonMinutes}`;
}

export function buildRowKey(symbol: string, asOfMs: number, horizonMinutes: number): string {
  return `${symbol}::${asOfMs}::${horizonMinutes}`;
}

function compareEntries(a: SeriesEntry, b: SeriesEntry): number {
  return a.asOfMs - b.asOfMs;
}

export function buildSeriesIndex(rows: Iterable<RealizedReturn>): SeriesIndex {
  const index: SeriesIndex = new Map();
  for (const row of rows) {
    const asOfMs = parseIsoDate(row.asOf);
    if (asOfMs === null) {
      continue;
    }
    const key = buildSeriesKey(row.symbol, row.horizonMinutes);
    const entry = { asOfMs, row };
    const existing = index.get(key);
    if (existing) {
      existing.push(entry);
    } else {
      index.set(key, [entry]);
    }
  }
  for (const entries of index.values()) {
    entries.sort(compareEntries);
  }
  return index;
}

export function findFirstAtOrAfter(entries: SeriesEntry[], targetMs: number): number {
  let low = 0;
  let high = entries.length;
  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    if (entries[mid].asOfMs < targetMs) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

function findFirstAfter(entries: SeriesEntry[], targetMs: number): number {
  let low = 0;
  let high = entries.length;
  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    if (entries[mid].asOfMs <= targetMs) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/** Entries with startMs <= asOf <= endMs. */
export function sliceInclusive(entries: SeriesEntry[], startMs: number, endMs: number): SeriesEntry[] {
  if (endMs < startMs) {
    return [];
  }
  return entries.slice(findFirstAtOrAfter(entries, startMs), findFirstAfter(entries, endMs));
}

/** Entries with sinceMs <= asOf < beforeMs. */
export function sliceBefore(
  entries: SeriesEntry[],
  beforeMs: number,
  sinceMs = Number.NEGATIVE_INFINITY,
): SeriesEntry[] {
  const from = Number.isFinite(sinceMs) ? findFirstAtOrAfter(entries, sinceMs) : 0;
  const to = findFirstAtOrAfter(entries, beforeMs);
  return from < to ? entries.slice(from, to) : [];
}

export function findExact(entries: SeriesEntry[], asOfMs: number): SeriesEntry | null {
  const idx = findFirstAtOrAfter(entries, asOfMs);
  const candidate = entries[idx];
  return candidate && candidate.asOfMs === asOfMs ? candidate : null;
}
