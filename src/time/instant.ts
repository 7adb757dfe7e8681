import { NaiveTimestampError } from "../errors.js";

const ZONE_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

export type InstantInput = string | Date | number;

export function hasExplicitZone(value: string): boolean {
  return ZONE_SUFFIX.test(value.trim());
}

/**
 * Epoch milliseconds for an instant. Strings without a zone designator are
 * rejected rather than read as local time.
 */
export function requireZonedMs(value: InstantInput, label = "timestamp"): number {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new NaiveTimestampError(label, String(value));
    }
    return value;
  }
  if (value instanceof Date) {
    const ms = value.getTime();
    if (!Number.isFinite(ms)) {
      throw new NaiveTimestampError(label, "Invalid Date");
    }
    return ms;
  }
  const trimmed = value.trim();
  if (!hasExplicitZone(trimmed)) {
    throw new NaiveTimestampError(label, value);
  }
  const ms = new Date(trimmed).getTime();
  if (!Number.isFinite(ms)) {
    throw new NaiveTimestampError(label, value);
  }
  return ms;
}

export function requireZonedInstant(value: InstantInput, label = "timestamp"): string {
  return toIso(requireZonedMs(value, label));
}

export function toIso(ms: number): string {
  return new Date(ms).toISOString();
}

/** Lenient parse for rows already written by this process; null when unusable. */
export function parseIsoDate(value: string | undefined | null): number | null {
  if (!value || !hasExplicitZone(value)) {
    return null;
  }
  const ts = new Date(value).getTime();
  if (!Number.isFinite(ts)) {
    return null;
  }
  return ts;
}
