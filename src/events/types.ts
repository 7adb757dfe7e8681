export type EventRecord = {
  id: string;
  /** ISO-8601 instant with an explicit offset. */
  timestamp: string;
  source: string;
  title?: string;
  summary?: string;
  rawText: string;
  cleanText?: string;
  categories: string[];
  tags: string[];
  embedding: number[] | null;
};

export type EventTimeFilter = {
  notBefore?: string;
  notAfter?: string;
};

export type EventReader = {
  getEvent: (eventId: string) => Promise<EventRecord | null>;
  getEvents: (eventIds: string[]) => Promise<Map<string, EventRecord>>;
  /** Events in the filter range, oldest first. */
  listEvents: (filter?: EventTimeFilter) => Promise<EventRecord[]>;
};

export type EventRepository = EventReader & {
  putEvents: (events: EventRecord[]) => Promise<number>;
};

export function eventText(event: EventRecord): string {
  return [event.title, event.summary, event.cleanText ?? event.rawText]
    .filter((part): part is string => Boolean(part && part.trim()))
    .join("\n");
}
