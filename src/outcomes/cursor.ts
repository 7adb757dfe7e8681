import type { RealizedReturn } from "./types.js";
import { parseIsoDate, requireZonedMs, type InstantInput } from "../time/instant.js";
import { MINUTE_MS } from "../utils.js";

export type AsOfCursor = {
  cutoffMs: number;
  /** Visible rows, oldest first. */
  rows: RealizedReturn[];
  returns: () => number[];
  last: (n: number) => RealizedReturn[];
  since: (sinceMs: number) => RealizedReturn[];
};

/**
 * Read-only window over a series that only ever exposes rows strictly before
 * the cutoff. With `requireRealized`, a row is visible only once its horizon
 * has fully elapsed by the cutoff.
 */
export function createAsOfCursor(
  rows: RealizedReturn[],
  opts: { cutoff: InstantInput; requireRealized?: boolean },
): AsOfCursor {
  const cutoffMs = requireZonedMs(opts.cutoff, "cutoff");
  const visible = rows
    .map((row) => ({ row, asOfMs: parseIsoDate(row.asOf) }))
    .filter((entry): entry is { row: RealizedReturn; asOfMs: number } => {
      if (entry.asOfMs === null || entry.asOfMs >= cutoffMs) {
        return false;
      }
      if (opts.requireRealized) {
        return entry.asOfMs + entry.row.horizonMinutes * MINUTE_MS <= cutoffMs;
      }
      return true;
    })
    .sort((a, b) => a.asOfMs - b.asOfMs);

  const ordered = visible.map((entry) => entry.row);
  return {
    cutoffMs,
    rows: ordered,
    returns: () => ordered.map((row) => row.realizedReturn),
    last: (n) => (n <= 0 ? [] : ordered.slice(-n)),
    since: (sinceMs) => visible.filter((entry) => entry.asOfMs >= sinceMs).map((entry) => entry.row),
  };
}
