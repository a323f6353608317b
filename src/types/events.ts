export type CatalogEvent = {
  id: string;
  title: string;
  description: string | null;
  date: Date;
  location: string | null;
  createdAt: Date | null;
  registrationDeadline: Date | null;
  genres: string[];
  capacity: number | null;
  note: string | null;
  // Opaque artist reference; resolving it to an image is up to the host.
  imageRef: string | null;
};

export type PreferenceSetName = "applied" | "wishlisted";

export type PreferenceSnapshot = {
  applied: ReadonlySet<string>;
  wishlisted: ReadonlySet<string>;
};

export type EventCategory = "applied" | "closingSoon" | "other";

export type EventCard = {
  event: CatalogEvent;
  category: EventCategory;
  wishlisted: boolean;
  daysUntilDeadline: number | null;
  closingLabel: string | null;
};

export type ComposedEventView = {
  applied: EventCard[];
  closingSoon: EventCard[];
  other: EventCard[];
  total: number;
};

export type CatalogFilters = {
  searchText: string;
  selectedGenres: string[];
};

export type GuestRegistrationForm = {
  eventId: string;
  fullName: string;
  role: string;
  company: string;
  email: string;
  additionalRequest: string;
};

export type GuestRegistrationRequest = {
  eventId: string;
  fullName: string;
  role: string;
  company: string;
  email: string;
  additionalRequest: string | null;
};

export type GuestRecord = GuestRegistrationRequest & {
  id: string;
  createdAt: Date | null;
};
