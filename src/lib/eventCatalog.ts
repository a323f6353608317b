import type {
  CatalogEvent,
  ComposedEventView,
  EventCard,
  EventCategory,
  PreferenceSnapshot,
} from "../types/events";

export const DEFAULT_CLOSING_WINDOW_DAYS = 7;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export type ComposeEventViewInput = {
  events: readonly CatalogEvent[];
  preferences: PreferenceSnapshot;
  searchText?: string;
  selectedGenres?: Iterable<string>;
  now: Date;
  closingWindowDays?: number;
};

function startOfLocalDayMs(value: Date): number {
  return new Date(value.getFullYear(), value.getMonth(), value.getDate()).getTime();
}

/**
 * Whole calendar days from `now` to `deadline` on the local calendar: a
 * deadline later today is 0, tomorrow is 1, yesterday is -1. Invalid dates
 * yield `null`.
 */
export function daysUntil(deadline: Date, now: Date): number | null {
  if (Number.isNaN(deadline.getTime()) || Number.isNaN(now.getTime())) return null;
  // Rounded because DST days are 23 or 25 hours long.
  return Math.round((startOfLocalDayMs(deadline) - startOfLocalDayMs(now)) / MS_PER_DAY);
}

function deadlineDays(event: Pick<CatalogEvent, "registrationDeadline">, now: Date): number | null {
  return event.registrationDeadline ? daysUntil(event.registrationDeadline, now) : null;
}

export function formatClosingLabel(days: number | null): string | null {
  if (days === null || days < 0) return null;
  if (days === 0) return "Closing today";
  if (days === 1) return "Closing in 1 day";
  return `Closing in ${days} days`;
}

export function closingLabel(event: Pick<CatalogEvent, "registrationDeadline">, now: Date): string | null {
  return formatClosingLabel(deadlineDays(event, now));
}

export function matchesSearch(event: CatalogEvent, searchText: string): boolean {
  if (!searchText) return true;
  const term = searchText.toLocaleLowerCase();
  return [event.title, event.description, event.location].some(
    (field) => typeof field === "string" && field.toLocaleLowerCase().includes(term)
  );
}

export function matchesGenres(event: CatalogEvent, selectedGenres: ReadonlySet<string>): boolean {
  if (selectedGenres.size === 0) return true;
  return event.genres.some((genre) => selectedGenres.has(genre));
}

export function filterEvents(
  events: readonly CatalogEvent[],
  searchText = "",
  selectedGenres: Iterable<string> = []
): CatalogEvent[] {
  const genres = new Set(selectedGenres);
  return events.filter((event) => matchesSearch(event, searchText) && matchesGenres(event, genres));
}

export function categorizeEvent(
  event: CatalogEvent,
  applied: ReadonlySet<string>,
  now: Date,
  closingWindowDays = DEFAULT_CLOSING_WINDOW_DAYS
): EventCategory {
  if (applied.has(event.id)) return "applied";
  const days = deadlineDays(event, now);
  if (days !== null && days >= 0 && days <= closingWindowDays) return "closingSoon";
  return "other";
}

/**
 * One composition pass: filter by search text, then genres, then split into
 * applied / closing soon / other. Source order is kept inside each bucket and
 * every filtered event lands in exactly one of them.
 */
export function composeEventView(input: ComposeEventViewInput): ComposedEventView {
  const { preferences, now } = input;
  const closingWindowDays = input.closingWindowDays ?? DEFAULT_CLOSING_WINDOW_DAYS;
  const filtered = filterEvents(input.events, input.searchText, input.selectedGenres);

  const view: ComposedEventView = { applied: [], closingSoon: [], other: [], total: filtered.length };

  for (const event of filtered) {
    const days = deadlineDays(event, now);
    const card: EventCard = {
      event,
      category: categorizeEvent(event, preferences.applied, now, closingWindowDays),
      wishlisted: preferences.wishlisted.has(event.id),
      daysUntilDeadline: days,
      closingLabel: formatClosingLabel(days),
    };
    view[card.category].push(card);
  }

  return view;
}

/** Genre options for the filter sheet: every genre in the catalog, sorted. */
export function collectGenres(events: readonly CatalogEvent[]): string[] {
  const genres = new Set<string>();
  for (const event of events) {
    for (const genre of event.genres) genres.add(genre);
  }
  return [...genres].sort((left, right) => left.localeCompare(right));
}

/** The wishlist screen ignores catalog filters: full collection ∩ wishlisted. */
export function selectWishlistEvents(
  events: readonly CatalogEvent[],
  wishlisted: ReadonlySet<string>
): CatalogEvent[] {
  return events.filter((event) => wishlisted.has(event.id));
}
