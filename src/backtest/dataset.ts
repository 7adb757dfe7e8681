import crypto from "node:crypto";
import type { EventReader } from "../events/types.js";
import type { SubsystemLogger } from "../logging/logger.js";
import type { RealizedOutcomeStore } from "../outcomes/types.js";
import type { RegimeClassifier } from "../regime/classifier.js";
import type {
  BacktestDataset,
  BacktestFailure,
  BacktestModel,
  BacktestRow,
  ModelForecast,
} from "./types.js";
import { createCausalEventView, createCausalOutcomeView } from "../causal/boundary.js";
import { InvalidParamsError } from "../errors.js";
import { createMemoryEventRepository } from "../events/store.js";
import { silentLogger } from "../logging/logger.js";
import { classifyRegime } from "../regime/classifier.js";
import { requireZonedMs, toIso, type InstantInput } from "../time/instant.js";
import { errorMessage, normalizeSymbol } from "../utils.js";
import { classifyDirection, DEFAULT_DIRECTION_THRESHOLD, isDirectionCorrect } from "./direction.js";
import { naiveReturnModel } from "./models.js";
import { runPool } from "./pool.js";

export type BuildBacktestParams = {
  symbols: string[];
  horizonMinutes: number;
  start: InstantInput;
  end: InstantInput;
  lookbackDays?: number;
  sampleFrequency?: number;
  directionThreshold?: number;
  concurrency?: number;
  model?: BacktestModel;
  regime?: RegimeClassifier;
  signal?: AbortSignal;
};

export type BacktestDeps = {
  outcomes: RealizedOutcomeStore;
  events?: EventReader;
  log?: SubsystemLogger;
};

type Cell = { symbol: string; asOf: string };

export function deriveBacktestRowId(params: {
  symbol: string;
  asOf: string;
  horizonMinutes: number;
  model: string;
}): string {
  const raw = [params.symbol, params.asOf, params.horizonMinutes, params.model].join("|");
  return crypto.createHash("sha256").update(raw).digest("hex").slice(0, 16);
}

function validateParams(params: BuildBacktestParams) {
  const issues: string[] = [];
  if (!Number.isInteger(params.horizonMinutes) || params.horizonMinutes <= 0) {
    issues.push("horizonMinutes must be a positive integer");
  }
  const sampleFrequency = params.sampleFrequency ?? 1;
  if (!Number.isInteger(sampleFrequency) || sampleFrequency < 1) {
    issues.push("sampleFrequency must be an integer >= 1");
  }
  const lookbackDays = params.lookbackDays ?? 60;
  if (!(lookbackDays > 0)) {
    issues.push("lookbackDays must be > 0");
  }
  const directionThreshold = params.directionThreshold ?? DEFAULT_DIRECTION_THRESHOLD;
  if (!(directionThreshold >= 0)) {
    issues.push("directionThreshold must be >= 0");
  }
  const concurrency = params.concurrency ?? 4;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    issues.push("concurrency must be an integer >= 1");
  }
  if (issues.length > 0) {
    throw new InvalidParamsError("backtest params", issues);
  }
  return {
    startMs: requireZonedMs(params.start, "start"),
    endMs: requireZonedMs(params.end, "end"),
    sampleFrequency,
    lookbackDays,
    directionThreshold,
    concurrency,
  };
}

function compareRows(a: BacktestRow, b: BacktestRow): number {
  if (a.symbol !== b.symbol) {
    return a.symbol < b.symbol ? -1 : 1;
  }
  return a.asOf < b.asOf ? -1 : a.asOf > b.asOf ? 1 : 0;
}

/**
 * Replays history one (symbol, asOf) cell at a time. Each model sees only a
 * causal view cut at asOf; the realized return is fetched afterwards from the
 * full store and used solely to score the frozen forecast.
 */
export async function buildBacktestDataset(
  params: BuildBacktestParams,
  deps: BacktestDeps,
): Promise<BacktestDataset> {
  const opts = validateParams(params);
  const log = deps.log ?? silentLogger;
  const model = params.model ?? naiveReturnModel;
  const regime = params.regime ?? classifyRegime;
  const events = deps.events ?? createMemoryEventRepository();

  const cells: Cell[] = [];
  for (const rawSymbol of params.symbols) {
    const symbol = normalizeSymbol(rawSymbol);
    if (!symbol || opts.endMs < opts.startMs) {
      continue;
    }
    const dates = await deps.outcomes.listAsOfDates({
      symbol,
      horizonMinutes: params.horizonMinutes,
      start: toIso(opts.startMs),
      end: toIso(opts.endMs),
    });
    dates.forEach((asOf, i) => {
      if (i % opts.sampleFrequency === 0) {
        cells.push({ symbol, asOf });
      }
    });
  }

  const rows: BacktestRow[] = [];
  const failures: BacktestFailure[] = [];

  const runCell = async (cell: Cell): Promise<BacktestRow> => {
    const outcomes = createCausalOutcomeView(deps.outcomes, cell.asOf);
    const forecast: Readonly<ModelForecast> = Object.freeze(
      await model.predict({
        symbol: cell.symbol,
        asOf: cell.asOf,
        horizonMinutes: params.horizonMinutes,
        lookbackDays: opts.lookbackDays,
        directionThreshold: opts.directionThreshold,
        outcomes,
        events: createCausalEventView(events, cell.asOf),
      }),
    );
    const label = await regime({ symbol: cell.symbol, asOf: cell.asOf, outcomes });

    const truth = await deps.outcomes.getExact({
      symbol: cell.symbol,
      asOf: cell.asOf,
      horizonMinutes: params.horizonMinutes,
    });
    const realizedReturn = truth?.realizedReturn ?? null;
    const predictedDirection = classifyDirection(forecast.expectedReturn, opts.directionThreshold);
    const actualDirection = classifyDirection(realizedReturn, opts.directionThreshold);
    const row: BacktestRow = {
      id: deriveBacktestRowId({
        symbol: cell.symbol,
        asOf: cell.asOf,
        horizonMinutes: params.horizonMinutes,
        model: model.name,
      }),
      symbol: cell.symbol,
      asOf: cell.asOf,
      horizonMinutes: params.horizonMinutes,
      model: model.name,
      schemaVersion: model.schemaVersion,
      expectedReturn: forecast.expectedReturn,
      predictedDirection,
      confidence: forecast.confidence,
      sampleSize: forecast.sampleSize,
      realizedReturn,
      actualDirection,
      directionCorrect: isDirectionCorrect(predictedDirection, actualDirection),
      regime: label.regime,
    };
    if (forecast.anchorEventId !== undefined) {
      row.anchorEventId = forecast.anchorEventId;
    }
    return row;
  };

  const { started } = await runPool({
    items: cells,
    concurrency: opts.concurrency,
    signal: params.signal,
    worker: async (cell) => {
      try {
        rows.push(await runCell(cell));
      } catch (err) {
        const error = errorMessage(err);
        failures.push({ ...cell, horizonMinutes: params.horizonMinutes, error });
        log.warn("backtest cell failed", {
          symbol: cell.symbol,
          asOf: cell.asOf,
          horizon: params.horizonMinutes,
          error,
        });
      }
    },
  });

  rows.sort(compareRows);
  failures.sort((a, b) =>
    a.symbol === b.symbol ? a.asOf.localeCompare(b.asOf) : a.symbol.localeCompare(b.symbol),
  );
  const cancelled = started < cells.length;
  if (cancelled) {
    log.warn("backtest cancelled", { started, cells: cells.length });
  }
  log.info("backtest dataset built", {
    model: model.name,
    horizon: params.horizonMinutes,
    cells: cells.length,
    rows: rows.length,
    failed: failures.length,
  });
  return {
    rows,
    failures,
    cancelled,
    stats: {
      cells: cells.length,
      completed: rows.length,
      failed: failures.length,
      notStarted: cells.length - started,
    },
  };
}
