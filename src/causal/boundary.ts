import type { EventReader, EventRecord } from "../events/types.js";
import type {
  OutcomeBeforeQuery,
  OutcomeWindowQuery,
  RealizedOutcomeReader,
  RealizedReturn,
} from "../outcomes/types.js";
import { LookaheadError } from "../errors.js";
import { parseIsoDate, requireZonedMs, toIso, type InstantInput } from "../time/instant.js";
import { MINUTE_MS } from "../utils.js";

export type CausalAccess = {
  operation: string;
  /** Latest instant the read could have touched. */
  upperBound: string;
};

export type CausalOutcomeView = RealizedOutcomeReader & {
  cutoff: string;
  accesses: () => CausalAccess[];
};

/**
 * Read-only outcome view pinned at `cutoff`. Queries reaching past it throw
 * LookaheadError. Unless `requireRealized` is turned off, rows whose horizon
 * had not elapsed by the cutoff are hidden as well.
 */
export function createCausalOutcomeView(
  store: RealizedOutcomeReader,
  cutoffInput: InstantInput,
  opts: { requireRealized?: boolean } = {},
): CausalOutcomeView {
  const cutoffMs = requireZonedMs(cutoffInput, "cutoff");
  const cutoff = toIso(cutoffMs);
  const requireRealized = opts.requireRealized ?? true;
  const accesses: CausalAccess[] = [];

  const guard = (operation: string, upper: InstantInput) => {
    const upperMs = requireZonedMs(upper, operation);
    if (upperMs > cutoffMs) {
      throw new LookaheadError({ cutoff, requested: toIso(upperMs), operation });
    }
    accesses.push({ operation, upperBound: toIso(upperMs) });
  };

  const isKnown = (row: RealizedReturn) => {
    const asOfMs = parseIsoDate(row.asOf);
    if (asOfMs === null || asOfMs >= cutoffMs) {
      return false;
    }
    return !requireRealized || asOfMs + row.horizonMinutes * MINUTE_MS <= cutoffMs;
  };

  return {
    cutoff,
    accesses: () => [...accesses],
    listInWindow: async (query: OutcomeWindowQuery) => {
      guard("listInWindow", query.end);
      return (await store.listInWindow(query)).filter(isKnown);
    },
    listBefore: async (query: OutcomeBeforeQuery) => {
      guard("listBefore", query.before);
      return (await store.listBefore(query)).filter(isKnown);
    },
    listAsOfDates: async (query: OutcomeWindowQuery) => {
      guard("listAsOfDates", query.end);
      const rows = await store.listInWindow(query);
      return rows.filter(isKnown).map((row) => row.asOf);
    },
  };
}

/** Event catalogue as it looked at `cutoff`: later events do not exist. */
export function createCausalEventView(events: EventReader, cutoffInput: InstantInput): EventReader {
  const cutoffMs = requireZonedMs(cutoffInput, "cutoff");
  const visible = (event: EventRecord | null | undefined): event is EventRecord => {
    if (!event) {
      return false;
    }
    const ts = parseIsoDate(event.timestamp);
    return ts !== null && ts <= cutoffMs;
  };
  return {
    getEvent: async (eventId) => {
      const event = await events.getEvent(eventId);
      return visible(event) ? event : null;
    },
    getEvents: async (eventIds) => {
      const found = await events.getEvents(eventIds);
      const filtered = new Map<string, EventRecord>();
      for (const [id, event] of found) {
        if (visible(event)) {
          filtered.set(id, event);
        }
      }
      return filtered;
    },
    listEvents: async (filter = {}) => {
      const notAfterMs =
        filter.notAfter === undefined
          ? cutoffMs
          : Math.min(requireZonedMs(filter.notAfter, "notAfter"), cutoffMs);
      return await events.listEvents({ ...filter, notAfter: toIso(notAfterMs) });
    },
  };
}
