export const MINUTE_MS = 60 * 1000;
export const DAY_MS = 24 * 60 * MINUTE_MS;
export const DAY_MINUTES = 1440;

export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(max, Math.max(min, value));
}

export function round(value: number, digits = 4): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function normalizeSymbol(raw: string): string {
  return raw.trim().toUpperCase();
}

export function mean(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((acc, value) => acc + value, 0) / values.length;
}

/** Population standard deviation. */
export function pstdev(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const mu = mean(values);
  const variance = values.reduce((acc, value) => acc + (value - mu) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
