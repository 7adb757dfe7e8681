import type { EventReader } from "../events/types.js";
import type { VectorIndex } from "../vector/types.js";
import type { ResolvedAnchor } from "./types.js";
import { EventNotFoundError, MissingEmbeddingError } from "../errors.js";
import { requireZonedMs, toIso } from "../time/instant.js";

/**
 * Looks up the event's timestamp and embedding. The index copy of the vector
 * wins; the event's stored embedding is the fallback.
 */
export async function resolveAnchor(
  eventId: string,
  deps: { events: EventReader; index: VectorIndex },
): Promise<ResolvedAnchor> {
  const event = await deps.events.getEvent(eventId);
  if (!event) {
    throw new EventNotFoundError(eventId);
  }
  const timestampMs = requireZonedMs(event.timestamp, `event ${eventId} timestamp`);
  const indexed = await deps.index.getVector(eventId);
  const vector = indexed && indexed.length > 0 ? indexed : event.embedding;
  if (!vector || vector.length === 0) {
    throw new MissingEmbeddingError(eventId);
  }
  return { eventId, timestamp: toIso(timestampMs), timestampMs, vector };
}
