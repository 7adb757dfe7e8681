import type { EventReader } from "../events/types.js";
import type { SubsystemLogger } from "../logging/logger.js";
import type { RealizedOutcomeReader } from "../outcomes/types.js";
import type { VectorIndex } from "../vector/types.js";
import type { ForecastSample, ResolvedAnchor } from "./types.js";
import { eventText } from "../events/types.js";
import { silentLogger } from "../logging/logger.js";
import { parseIsoDate, toIso } from "../time/instant.js";
import { DAY_MS, MINUTE_MS } from "../utils.js";
import { resolveAnchor } from "./anchor.js";
import { isSymbolMentioned } from "./symbol-filter.js";

export type SampleNeighborsParams = {
  eventId: string;
  symbol: string;
  horizonMinutes: number;
  kNeighbors: number;
  lookbackDays: number;
  priceWindowMinutes: number;
  requireSymbolMention?: boolean;
};

export type SamplerDeps = {
  events: EventReader;
  index: VectorIndex;
  outcomes: RealizedOutcomeReader;
  log?: SubsystemLogger;
};

export type SampledNeighbor = {
  id: string;
  distance: number;
  timestamp: string;
  sampleCount: number;
};

export type NeighborSampling = {
  anchor: ResolvedAnchor;
  neighbors: SampledNeighbor[];
  samples: ForecastSample[];
};

/**
 * Finds up to k historical analogs of the anchor and collects the realized
 * returns recorded around each one. Every neighbor is re-checked against the
 * event catalogue, so none can postdate the anchor whatever the index says.
 */
export async function sampleNeighbors(
  params: SampleNeighborsParams,
  deps: SamplerDeps,
): Promise<NeighborSampling> {
  const log = deps.log ?? silentLogger;
  const anchor = await resolveAnchor(params.eventId, deps);
  const notBeforeMs = anchor.timestampMs - params.lookbackDays * DAY_MS;
  const windowMs = params.priceWindowMinutes * MINUTE_MS;

  const hits = await deps.index.search({
    vector: anchor.vector,
    limit: params.kNeighbors,
    excludeId: anchor.eventId,
    filter: { notBefore: toIso(notBeforeMs), notAfter: anchor.timestamp },
  });
  const catalogue = await deps.events.getEvents(hits.map((hit) => hit.id));

  const accepted: Array<{ id: string; distance: number; tsMs: number }> = [];
  for (const hit of hits) {
    const event = catalogue.get(hit.id);
    const tsMs = event ? parseIsoDate(event.timestamp) : null;
    if (!event || tsMs === null) {
      log.debug("neighbor missing from catalogue", { neighbor: hit.id });
      continue;
    }
    if (hit.id === anchor.eventId || tsMs > anchor.timestampMs || tsMs < notBeforeMs) {
      log.debug("neighbor outside lookback window", { neighbor: hit.id, ts: event.timestamp });
      continue;
    }
    if (params.requireSymbolMention && !isSymbolMentioned(eventText(event), params.symbol)) {
      continue;
    }
    accepted.push({ id: hit.id, distance: hit.distance, tsMs });
  }

  const windows = await Promise.all(
    accepted.map((neighbor) =>
      deps.outcomes.listInWindow({
        symbol: params.symbol,
        horizonMinutes: params.horizonMinutes,
        start: neighbor.tsMs - windowMs,
        end: Math.min(neighbor.tsMs + windowMs, anchor.timestampMs),
      }),
    ),
  );

  const neighbors: SampledNeighbor[] = [];
  const samples: ForecastSample[] = [];
  accepted.forEach((neighbor, i) => {
    const rows = windows[i];
    neighbors.push({
      id: neighbor.id,
      distance: neighbor.distance,
      timestamp: toIso(neighbor.tsMs),
      sampleCount: rows.length,
    });
    for (const row of rows) {
      samples.push({
        neighborId: neighbor.id,
        distance: neighbor.distance,
        realizedReturn: row.realizedReturn,
        asOf: row.asOf,
      });
    }
  });
  return { anchor, neighbors, samples };
}
