import fs from "node:fs";
import path from "node:path";
import lockfile from "proper-lockfile";
import type {
  InsertResult,
  OutcomeBeforeQuery,
  OutcomeExactQuery,
  OutcomeWindowQuery,
  RealizedOutcomeReader,
  RealizedOutcomeStore,
  RealizedReturn,
  RealizedReturnInput,
} from "./types.js";
import { InvalidParamsError } from "../errors.js";
import { appendNdjson, readNdjsonFile } from "../storage/ndjson.js";
import { parseIsoDate, requireZonedMs, toIso } from "../time/instant.js";
import { normalizeSymbol } from "../utils.js";
import {
  buildRowKey,
  buildSeriesIndex,
  buildSeriesKey,
  findExact,
  sliceBefore,
  sliceInclusive,
  type SeriesIndex,
} from "./series.js";

const STORE_LOCK_OPTIONS = {
  retries: {
    retries: 8,
    factor: 2,
    minTimeout: 50,
    maxTimeout: 5000,
    randomize: true,
  },
  stale: 30_000,
} as const;

export function computeRealizedReturn(priceStart: number, priceEnd: number): number {
  return (priceEnd - priceStart) / priceStart;
}

export function validateRealizedReturnInput(
  input: RealizedReturnInput,
): { ok: true; row: RealizedReturn; asOfMs: number } | { ok: false; reason: string } {
  const symbol = normalizeSymbol(input.symbol);
  if (!symbol) {
    return { ok: false, reason: "symbol is required" };
  }
  if (!Number.isInteger(input.horizonMinutes) || input.horizonMinutes <= 0) {
    return { ok: false, reason: `horizonMinutes must be a positive integer (${symbol})` };
  }
  if (!Number.isFinite(input.priceStart) || input.priceStart <= 0) {
    return { ok: false, reason: `priceStart must be > 0 (${symbol})` };
  }
  if (!Number.isFinite(input.priceEnd) || input.priceEnd <= 0) {
    return { ok: false, reason: `priceEnd must be > 0 (${symbol})` };
  }
  const asOfMs = requireZonedMs(input.asOf, "asOf");
  return {
    ok: true,
    asOfMs,
    row: {
      symbol,
      asOf: toIso(asOfMs),
      horizonMinutes: input.horizonMinutes,
      priceStart: input.priceStart,
      priceEnd: input.priceEnd,
      realizedReturn: computeRealizedReturn(input.priceStart, input.priceEnd),
    },
  };
}

/** Validates every input up front; a bad row rejects the whole batch. */
function prepareRows(inputs: RealizedReturnInput[]): Array<{ key: string; row: RealizedReturn }> {
  const prepared: Array<{ key: string; row: RealizedReturn }> = [];
  const issues: string[] = [];
  for (const input of inputs) {
    const result = validateRealizedReturnInput(input);
    if (!result.ok) {
      issues.push(result.reason);
      continue;
    }
    prepared.push({
      key: buildRowKey(result.row.symbol, result.asOfMs, result.row.horizonMinutes),
      row: result.row,
    });
  }
  if (issues.length > 0) {
    throw new InvalidParamsError("realized returns", issues);
  }
  return prepared;
}

function rowKeyOf(row: RealizedReturn): string | null {
  const asOfMs = parseIsoDate(row.asOf);
  return asOfMs === null ? null : buildRowKey(row.symbol, asOfMs, row.horizonMinutes);
}

function createOutcomeReader(loadIndex: () => Promise<SeriesIndex>): RealizedOutcomeReader & {
  getExact: (query: OutcomeExactQuery) => Promise<RealizedReturn | null>;
} {
  const entriesFor = async (symbol: string, horizonMinutes: number) => {
    const index = await loadIndex();
    return index.get(buildSeriesKey(normalizeSymbol(symbol), horizonMinutes)) ?? [];
  };

  const listInWindow = async (query: OutcomeWindowQuery) => {
    const startMs = requireZonedMs(query.start, "start");
    const endMs = requireZonedMs(query.end, "end");
    const entries = await entriesFor(query.symbol, query.horizonMinutes);
    return sliceInclusive(entries, startMs, endMs).map((entry) => entry.row);
  };

  const listBefore = async (query: OutcomeBeforeQuery) => {
    const beforeMs = requireZonedMs(query.before, "before");
    const sinceMs =
      query.since === undefined ? Number.NEGATIVE_INFINITY : requireZonedMs(query.since, "since");
    const entries = await entriesFor(query.symbol, query.horizonMinutes);
    return sliceBefore(entries, beforeMs, sinceMs).map((entry) => entry.row);
  };

  const listAsOfDates = async (query: OutcomeWindowQuery) => {
    const rows = await listInWindow(query);
    return rows.map((row) => row.asOf);
  };

  const getExact = async (query: OutcomeExactQuery) => {
    const asOfMs = requireZonedMs(query.asOf, "asOf");
    const entries = await entriesFor(query.symbol, query.horizonMinutes);
    return findExact(entries, asOfMs)?.row ?? null;
  };

  return { listInWindow, listBefore, listAsOfDates, getExact };
}

export function createMemoryOutcomeStore(seed: RealizedReturnInput[] = []): RealizedOutcomeStore {
  const rows = new Map<string, RealizedReturn>();
  let index: SeriesIndex | null = null;

  const insertNow = (inputs: RealizedReturnInput[]): InsertResult => {
    let inserted = 0;
    let skipped = 0;
    for (const { key, row } of prepareRows(inputs)) {
      if (rows.has(key)) {
        skipped += 1;
        continue;
      }
      rows.set(key, row);
      inserted += 1;
    }
    if (inserted > 0) {
      index = null;
    }
    return { inserted, skipped };
  };

  insertNow(seed);

  const reader = createOutcomeReader(async () => {
    if (!index) {
      index = buildSeriesIndex(rows.values());
    }
    return index;
  });

  return {
    ...reader,
    insertMany: async (inputs) => insertNow(inputs),
  };
}

function mapStoredRow(value: unknown): RealizedReturn | null {
  if (!value || typeof value !== "object") {
    return null;
  }
  const record: Record<string, unknown> = { ...value };
  const { symbol, asOf, horizonMinutes, priceStart, priceEnd, realizedReturn } = record;
  if (
    typeof symbol !== "string" ||
    typeof asOf !== "string" ||
    typeof horizonMinutes !== "number" ||
    typeof priceStart !== "number" ||
    typeof priceEnd !== "number" ||
    typeof realizedReturn !== "number"
  ) {
    return null;
  }
  return { symbol, asOf, horizonMinutes, priceStart, priceEnd, realizedReturn };
}

async function ensureFile(filePath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const handle = await fs.promises.open(filePath, "a");
  await handle.close();
}

async function withStoreLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  await ensureFile(filePath);
  const release = await lockfile.lock(filePath, STORE_LOCK_OPTIONS);
  try {
    return await fn();
  } finally {
    await release();
  }
}

/**
 * NDJSON-backed store. Inserts take a cross-process lock; reads are served
 * from a cache that is rebuilt whenever the file's mtime or size changes.
 */
export function createFileOutcomeStore(params: { filePath: string }): RealizedOutcomeStore {
  const { filePath } = params;
  let cache: { mtimeMs: number; size: number; rows: RealizedReturn[]; index: SeriesIndex } | null =
    null;

  const loadRows = async (): Promise<{ rows: RealizedReturn[]; index: SeriesIndex }> => {
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(filePath);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return { rows: [], index: new Map() };
      }
      throw err;
    }
    if (cache && cache.mtimeMs === stat.mtimeMs && cache.size === stat.size) {
      return cache;
    }
    const rows = await readNdjsonFile(filePath, mapStoredRow);
    const index = buildSeriesIndex(rows);
    cache = { mtimeMs: stat.mtimeMs, size: stat.size, rows, index };
    return cache;
  };

  const reader = createOutcomeReader(async () => (await loadRows()).index);

  const insertMany = async (inputs: RealizedReturnInput[]): Promise<InsertResult> => {
    const prepared = prepareRows(inputs);
    if (prepared.length === 0) {
      return { inserted: 0, skipped: 0 };
    }
    return await withStoreLock(filePath, async () => {
      const { rows } = await loadRows();
      const seen = new Set<string>();
      for (const row of rows) {
        const key = rowKeyOf(row);
        if (key) {
          seen.add(key);
        }
      }
      const fresh: RealizedReturn[] = [];
      for (const { key, row } of prepared) {
        if (seen.has(key)) {
          continue;
        }
        seen.add(key);
        fresh.push(row);
      }
      await appendNdjson(filePath, fresh);
      return { inserted: fresh.length, skipped: prepared.length - fresh.length };
    });
  };

  return { ...reader, insertMany };
}
