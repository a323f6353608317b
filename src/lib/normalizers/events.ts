import type { CatalogEvent } from "../../types/events";

/** Field names as stored in the `events` collection. */
export type EventDocument = {
  title?: unknown;
  description?: unknown;
  date?: unknown;
  venue?: unknown;
  created_at?: unknown;
  registration_deadline?: unknown;
  genres?: unknown;
  capacity?: unknown;
  note?: unknown;
  spotify_artist_id?: unknown;
};

export class EventDocumentError extends Error {
  eventId: string;

  constructor(eventId: string, message: string) {
    super(`Event ${eventId}: ${message}`);
    this.name = "EventDocumentError";
    this.eventId = eventId;
  }
}

function hasToDate(value: object): value is { toDate: () => unknown } {
  return "toDate" in value && typeof value.toDate === "function";
}

/**
 * Accepts Firestore Timestamps, Dates, ISO strings and epoch milliseconds.
 * Anything else, or an invalid date, is `null`.
 */
export function toDateOrNull(value: unknown): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value === "string" || typeof value === "number") {
    if (typeof value === "string" && !value.trim()) return null;
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  if (value && typeof value === "object" && hasToDate(value)) {
    try {
      return toDateOrNull(value.toDate());
    } catch {
      return null;
    }
  }
  return null;
}

function optionalText(value: unknown): string | null {
  if (typeof value !== "string") return null;
  return value.trim() ? value : null;
}

function normalizeGenres(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((genre): genre is string => typeof genre === "string")
    .map((genre) => genre.trim())
    .filter(Boolean);
}

function optionalInteger(value: unknown): number | null {
  if (typeof value !== "number" || !Number.isFinite(value)) return null;
  return Math.trunc(value);
}

/**
 * Maps one stored event to the catalog shape. `title` and `date` are required;
 * optional fields that are missing or malformed become `null` (or `[]`).
 */
export function normalizeEventDoc(id: string, raw: EventDocument): CatalogEvent {
  if (typeof raw.title !== "string" || !raw.title.trim()) {
    throw new EventDocumentError(id, "title is missing");
  }
  const date = toDateOrNull(raw.date);
  if (!date) {
    throw new EventDocumentError(id, "date is missing or invalid");
  }

  return {
    id,
    title: raw.title,
    description: optionalText(raw.description),
    date,
    location: optionalText(raw.venue),
    createdAt: toDateOrNull(raw.created_at),
    registrationDeadline: toDateOrNull(raw.registration_deadline),
    genres: normalizeGenres(raw.genres),
    capacity: optionalInteger(raw.capacity),
    note: optionalText(raw.note),
    imageRef: optionalText(raw.spotify_artist_id),
  };
}
