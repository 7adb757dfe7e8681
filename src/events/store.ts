import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { EventRecord, EventRepository, EventTimeFilter } from "./types.js";
import { readNdjsonFile } from "../storage/ndjson.js";
import { parseIsoDate, requireZonedMs, toIso } from "../time/instant.js";

const EventRecordSchema = z.object({
  id: z.string().min(1),
  timestamp: z.string().min(1),
  source: z.string().default("unknown"),
  title: z.string().optional(),
  summary: z.string().optional(),
  rawText: z.string().default(""),
  cleanText: z.string().optional(),
  categories: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
  embedding: z.array(z.number()).nullable().default(null),
});

export function parseEventRecord(value: unknown): EventRecord | null {
  const parsed = EventRecordSchema.safeParse(value);
  if (!parsed.success || parseIsoDate(parsed.data.timestamp) === null) {
    return null;
  }
  return parsed.data;
}

/** Normalizes the timestamp; throws on a naive one. */
export function normalizeEventRecord(event: EventRecord): EventRecord {
  return { ...event, timestamp: toIso(requireZonedMs(event.timestamp, `event ${event.id}`)) };
}

function sortByTimestamp(events: EventRecord[]): EventRecord[] {
  return [...events].sort((a, b) => {
    const diff = (parseIsoDate(a.timestamp) ?? 0) - (parseIsoDate(b.timestamp) ?? 0);
    return diff !== 0 ? diff : a.id.localeCompare(b.id);
  });
}

function filterByTime(events: EventRecord[], filter: EventTimeFilter = {}): EventRecord[] {
  const notBefore =
    filter.notBefore === undefined ? null : requireZonedMs(filter.notBefore, "notBefore");
  const notAfter = filter.notAfter === undefined ? null : requireZonedMs(filter.notAfter, "notAfter");
  return events.filter((event) => {
    const ts = parseIsoDate(event.timestamp);
    if (ts === null) {
      return false;
    }
    if (notBefore !== null && ts < notBefore) {
      return false;
    }
    return notAfter === null || ts <= notAfter;
  });
}

function createRepository(params: {
  load: () => Promise<Map<string, EventRecord>>;
  save: (events: Map<string, EventRecord>) => Promise<void>;
}): EventRepository {
  return {
    getEvent: async (eventId) => (await params.load()).get(eventId) ?? null,
    getEvents: async (eventIds) => {
      const all = await params.load();
      const found = new Map<string, EventRecord>();
      for (const id of eventIds) {
        const event = all.get(id);
        if (event) {
          found.set(id, event);
        }
      }
      return found;
    },
    listEvents: async (filter) => sortByTimestamp(filterByTime([...(await params.load()).values()], filter)),
    putEvents: async (events) => {
      const normalized = events.map(normalizeEventRecord);
      const all = new Map(await params.load());
      for (const event of normalized) {
        all.set(event.id, event);
      }
      await params.save(all);
      return normalized.length;
    },
  };
}

export function createMemoryEventRepository(seed: EventRecord[] = []): EventRepository {
  let events = new Map(
    seed.map((event): [string, EventRecord] => [event.id, normalizeEventRecord(event)]),
  );
  return createRepository({
    load: async () => events,
    save: async (next) => {
      events = next;
    },
  });
}

async function writeNdjsonFile(filePath: string, events: EventRecord[]): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.promises.mkdir(dir, { recursive: true });
  const tmp = path.join(dir, `${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);
  const body = events.map((event) => JSON.stringify(event)).join("\n");
  await fs.promises.writeFile(tmp, events.length > 0 ? `${body}\n` : "", "utf8");
  await fs.promises.rename(tmp, filePath);
}

/** Event catalogue kept as one NDJSON file; later lines win on duplicate ids. */
export function createFileEventRepository(params: { filePath: string }): EventRepository {
  let cache: { mtimeMs: number; events: Map<string, EventRecord> } | null = null;

  const load = async (): Promise<Map<string, EventRecord>> => {
    const mtimeMs = fs.existsSync(params.filePath) ? fs.statSync(params.filePath).mtimeMs : -1;
    if (cache && cache.mtimeMs === mtimeMs) {
      return cache.events;
    }
    const records = await readNdjsonFile(params.filePath, parseEventRecord);
    const events = new Map(records.map((event): [string, EventRecord] => [event.id, event]));
    cache = { mtimeMs, events };
    return events;
  };

  return createRepository({
    load,
    save: async (events) => {
      await writeNdjsonFile(params.filePath, sortByTimestamp([...events.values()]));
      cache = null;
    },
  });
}
