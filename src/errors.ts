export class EventNotFoundError extends Error {
  readonly eventId: string;

  constructor(eventId: string) {
    super(`event not found: ${eventId}`);
    this.name = "EventNotFoundError";
    this.eventId = eventId;
  }
}

export class MissingEmbeddingError extends Error {
  readonly eventId: string;

  constructor(eventId: string) {
    super(`event has no embedding: ${eventId}`);
    this.name = "MissingEmbeddingError";
    this.eventId = eventId;
  }
}

export class NaiveTimestampError extends Error {
  readonly value: string;

  constructor(label: string, value: string) {
    super(`${label} must carry an explicit UTC offset (got "${value}")`);
    this.name = "NaiveTimestampError";
    this.value = value;
  }
}

/** Thrown when a read reaches past the as-of cutoff of a causal view. */
export class LookaheadError extends Error {
  readonly cutoff: string;
  readonly requested: string;

  constructor(params: { cutoff: string; requested: string; operation: string }) {
    super(
      `${params.operation} requested data at ${params.requested}, past the cutoff ${params.cutoff}`,
    );
    this.name = "LookaheadError";
    this.cutoff = params.cutoff;
    this.requested = params.requested;
  }
}

export class VectorIndexError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "VectorIndexError";
    this.status = options?.status;
  }
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(label: string, attempts: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${label} failed after ${attempts} attempts: ${detail}`, { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class InvalidParamsError extends Error {
  readonly issues: string[];

  constructor(label: string, issues: string[]) {
    super(`invalid ${label}: ${issues.join("; ")}`);
    this.name = "InvalidParamsError";
    this.issues = issues;
  }
}
