import crypto from "node:crypto";
import weaviate, { ApiKey } from "weaviate-ts-client";
import { z } from "zod";
import type { RetryPolicy } from "../retry/policy.js";
import type { VectorHit, VectorIndex, VectorRecord, VectorSearchQuery } from "./types.js";
import { RetryExhaustedError, VectorIndexError } from "../errors.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/logger.js";
import { withRetry } from "../retry/policy.js";
import { requireZonedInstant } from "../time/instant.js";
import { errorMessage } from "../utils.js";
import { compareHits } from "./types.js";

export const DEFAULT_WEAVIATE_CLASS = "EventEmbedding";
const DEFAULT_TIMEOUT_MS = 10_000;
const HIT_FIELDS = "eventId timestamp source categories tags _additional { distance }";

export type WeaviateWhere = {
  operator: "And" | "GreaterThanEqual" | "LessThanEqual";
  path?: string[];
  valueDate?: string;
  operands?: WeaviateWhere[];
};

export type WeaviateObjectInput = {
  class: string;
  id: string;
  vector: number[];
  properties: Record<string, unknown>;
};

type GetBuilder = {
  withClassName: (className: string) => GetBuilder;
  withFields: (fields: string) => GetBuilder;
  withNearVector: (args: { vector: number[] }) => GetBuilder;
  withWhere: (where: WeaviateWhere) => GetBuilder;
  withLimit: (limit: number) => GetBuilder;
  do: () => Promise<unknown>;
};

type AggregateBuilder = {
  withClassName: (className: string) => AggregateBuilder;
  withFields: (fields: string) => AggregateBuilder;
  do: () => Promise<unknown>;
};

type ObjectsBatcher = {
  withObjects: (...objects: WeaviateObjectInput[]) => ObjectsBatcher;
  do: () => Promise<unknown>;
};

type GetterById = {
  withClassName: (className: string) => GetterById;
  withId: (id: string) => GetterById;
  withVector: () => GetterById;
  do: () => Promise<unknown>;
};

type Deleter = {
  withClassName: (className: string) => Deleter;
  withId: (id: string) => Deleter;
  do: () => Promise<unknown>;
};

/** The slice of the weaviate-ts-client surface this index calls. */
export type WeaviateClientLike = {
  graphql: { get: () => GetBuilder; aggregate: () => AggregateBuilder };
  batch: { objectsBatcher: () => ObjectsBatcher };
  data: { getterById: () => GetterById; deleter: () => Deleter };
};

const HitSchema = z.object({
  eventId: z.string(),
  timestamp: z.string(),
  source: z.string().nullable().optional(),
  categories: z.array(z.string()).nullable().optional(),
  tags: z.array(z.string()).nullable().optional(),
  _additional: z.object({ distance: z.number() }),
});

const GetResponseSchema = z.object({
  data: z.object({ Get: z.record(z.string(), z.array(HitSchema).nullable()) }),
});

const AggregateResponseSchema = z.object({
  data: z.object({
    Aggregate: z.record(z.string(), z.array(z.object({ meta: z.object({ count: z.number() }) }))),
  }),
});

const GraphqlErrorsSchema = z.object({
  errors: z.array(z.object({ message: z.string() })).min(1),
});

/** GraphQL failures come back as a resolved body carrying `errors`. */
function assertNoGraphqlErrors(label: string, value: unknown): void {
  const parsed = GraphqlErrorsSchema.safeParse(value);
  if (parsed.success) {
    throw new VectorIndexError(
      `weaviate ${label}: ${parsed.data.errors.map((entry) => entry.message).join("; ")}`,
    );
  }
}

const BatchResultSchema = z.array(
  z.object({
    id: z.string().optional(),
    result: z
      .object({
        errors: z
          .object({ error: z.array(z.object({ message: z.string() })).optional() })
          .nullable()
          .optional(),
      })
      .nullable()
      .optional(),
  }),
);

const ObjectSchema = z.object({ vector: z.array(z.number()).nullable().optional() });

class WeaviateTimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`weaviate ${label} timed out after ${ms}ms`);
    this.name = "WeaviateTimeoutError";
  }
}

/**
 * HTTP status behind a client error. The client reports failures as
 * `usage error (<status>): <body>`; newer releases also set `statusCode`.
 */
export function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "statusCode" in err) {
    const code = err.statusCode;
    if (typeof code === "number") {
      return code;
    }
  }
  const match = err instanceof Error ? /\((\d{3})\)/.exec(err.message) : null;
  return match ? Number.parseInt(match[1], 10) : undefined;
}

export function isRetryableWeaviateError(err: unknown): boolean {
  if (err instanceof WeaviateTimeoutError) {
    return true;
  }
  const status = statusOf(err);
  if (status !== undefined) {
    return status === 429 || status >= 500;
  }
  // fetch rejects with TypeError on network failure
  return err instanceof TypeError;
}

/** Weaviate object ids must be UUIDs, so event ids are hashed into one. */
export function objectIdFor(eventId: string): string {
  const hex = crypto.createHash("sha256").update(eventId).digest("hex");
  const variant = ((Number.parseInt(hex[16], 16) & 0x3) | 0x8).toString(16);
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `5${hex.slice(13, 16)}`,
    `${variant}${hex.slice(17, 20)}`,
    hex.slice(20, 32),
  ].join("-");
}

export function buildWhereFilter(filter: VectorSearchQuery["filter"]): WeaviateWhere | null {
  const operands: WeaviateWhere[] = [];
  if (filter?.notBefore !== undefined) {
    operands.push({
      operator: "GreaterThanEqual",
      path: ["timestamp"],
      valueDate: requireZonedInstant(filter.notBefore, "notBefore"),
    });
  }
  if (filter?.notAfter !== undefined) {
    operands.push({
      operator: "LessThanEqual",
      path: ["timestamp"],
      valueDate: requireZonedInstant(filter.notAfter, "notAfter"),
    });
  }
  if (operands.length === 0) {
    return null;
  }
  return operands.length === 1 ? operands[0] : { operator: "And", operands };
}

export function createWeaviateClient(url: string, apiKey?: string): WeaviateClientLike {
  const parsed = new URL(url);
  return weaviate.client({
    scheme: parsed.protocol.replace(/:$/, ""),
    host: parsed.host,
    ...(apiKey ? { apiKey: new ApiKey(apiKey) } : {}),
  });
}

export type WeaviateIndexOptions = {
  url: string;
  apiKey?: string;
  className?: string;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  client?: WeaviateClientLike;
  sleep?: (ms: number) => Promise<void>;
  log?: SubsystemLogger;
};

/**
 * Index backed by a Weaviate class. Approximate search happens server-side;
 * exclusion of the query event is re-applied here.
 */
export function createWeaviateIndex(opts: WeaviateIndexOptions): VectorIndex {
  const className = opts.className ?? DEFAULT_WEAVIATE_CLASS;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const client = opts.client ?? createWeaviateClient(opts.url, opts.apiKey);
  const log = opts.log ?? createSubsystemLogger("vector/weaviate");

  const withTimeout = async <T>(label: string, promise: Promise<T>): Promise<T> => {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new WeaviateTimeoutError(label, timeoutMs)), timeoutMs);
    });
    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  };

  const call = async (
    label: string,
    run: () => Promise<unknown>,
    callOpts: { allowStatus?: number[] } = {},
  ): Promise<{ missing: boolean; value: unknown }> => {
    try {
      return await withRetry(
        async () => {
          try {
            return { missing: false, value: await withTimeout(label, run()) };
          } catch (err) {
            const status = statusOf(err);
            if (status !== undefined && callOpts.allowStatus?.includes(status)) {
              return { missing: true, value: null };
            }
            throw err;
          }
        },
        {
          label: `weaviate ${label}`,
          policy: opts.retry,
          isRetryable: isRetryableWeaviateError,
          sleep: opts.sleep,
          onRetry: ({ attempt, delayMs, error }) =>
            log.warn("retrying request", { op: label, attempt, delayMs, error: errorMessage(error) }),
        },
      );
    } catch (err) {
      const root = err instanceof RetryExhaustedError ? err.cause : err;
      throw new VectorIndexError(`weaviate ${label} failed: ${errorMessage(err)}`, {
        status: statusOf(root),
        cause: err,
      });
    }
  };

  const insertBatch = async (records: VectorRecord[]): Promise<number> => {
    if (records.length === 0) {
      return 0;
    }
    const objects = records.map(
      (record): WeaviateObjectInput => ({
        class: className,
        id: objectIdFor(record.id),
        vector: record.vector,
        properties: {
          eventId: record.id,
          timestamp: requireZonedInstant(record.metadata.timestamp, `insert ${record.id}`),
          source: record.metadata.source,
          categories: record.metadata.categories,
          tags: record.metadata.tags,
        },
      }),
    );
    const { value } = await call("insertBatch", () =>
      client.batch
        .objectsBatcher()
        .withObjects(...objects)
        .do(),
    );
    const parsed = BatchResultSchema.safeParse(value);
    if (!parsed.success) {
      throw new VectorIndexError("weaviate insertBatch: unexpected response shape");
    }
    const failures = parsed.data.flatMap(
      (entry) => entry.result?.errors?.error?.map((error) => error.message) ?? [],
    );
    if (failures.length > 0) {
      throw new VectorIndexError(
        `weaviate insertBatch: ${failures.length} object(s) rejected: ${failures[0]}`,
      );
    }
    return records.length;
  };

  const search = async (query: VectorSearchQuery): Promise<VectorHit[]> => {
    if (query.limit <= 0) {
      return [];
    }
    const limit = query.excludeId === undefined ? query.limit : query.limit + 1;
    const where = buildWhereFilter(query.filter);
    const { value } = await call("search", () => {
      let builder = client.graphql
        .get()
        .withClassName(className)
        .withNearVector({ vector: query.vector })
        .withLimit(limit)
        .withFields(HIT_FIELDS);
      if (where) {
        builder = builder.withWhere(where);
      }
      return builder.do();
    });
    assertNoGraphqlErrors("search", value);
    const parsed = GetResponseSchema.safeParse(value);
    if (!parsed.success) {
      throw new VectorIndexError("weaviate search: unexpected result shape");
    }
    const rows = parsed.data.data.Get[className] ?? [];
    return rows
      .filter((row) => row.eventId !== query.excludeId)
      .map((row) => ({
        id: row.eventId,
        distance: row._additional.distance,
        metadata: {
          timestamp: row.timestamp,
          source: row.source ?? "unknown",
          categories: row.categories ?? [],
          tags: row.tags ?? [],
        },
      }))
      .sort(compareHits)
      .slice(0, query.limit);
  };

  return {
    kind: "weaviate",
    insertBatch,
    search,
    getVector: async (id) => {
      const { missing, value } = await call(
        "getVector",
        () =>
          client.data
            .getterById()
            .withClassName(className)
            .withId(objectIdFor(id))
            .withVector()
            .do(),
        { allowStatus: [404] },
      );
      if (missing) {
        return null;
      }
      const parsed = ObjectSchema.safeParse(value);
      if (!parsed.success) {
        throw new VectorIndexError("weaviate getVector: unexpected response shape");
      }
      const vector = parsed.data.vector;
      return vector && vector.length > 0 ? vector : null;
    },
    delete: async (id) => {
      const { missing } = await call(
        "delete",
        () => client.data.deleter().withClassName(className).withId(objectIdFor(id)).do(),
        { allowStatus: [404] },
      );
      return !missing;
    },
    count: async () => {
      const { value } = await call("count", () =>
        client.graphql.aggregate().withClassName(className).withFields("meta { count }").do(),
      );
      assertNoGraphqlErrors("count", value);
      const parsed = AggregateResponseSchema.safeParse(value);
      if (!parsed.success) {
        throw new VectorIndexError("weaviate count: unexpected result shape");
      }
      return parsed.data.data.Aggregate[className]?.[0]?.meta.count ?? 0;
    },
  };
}
