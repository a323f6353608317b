import type { RemoteEventRepository } from "../api/eventRepository";
import type { RegistrationSubmitter } from "../api/guestRegistration";
import type { Logger } from "../config/logger";
import { silentLogger } from "../config/logger";
import { ValidationError, isAbortError } from "../errors/appError";
import type {
  CatalogEvent,
  CatalogFilters,
  ComposedEventView,
  GuestRecord,
  GuestRegistrationForm,
  PreferenceSnapshot,
} from "../types/events";
import { buildSurfaceError, registrationErrorMessage, type SurfaceError } from "../utils/userFacingErrors";
import { DEFAULT_CLOSING_WINDOW_DAYS, collectGenres, composeEventView, selectWishlistEvents } from "./eventCatalog";
import type { NotificationCenter } from "./notifications";
import type { LocalPreferenceStore } from "./preferenceStore";

export type CatalogStatus = "idle" | "loading" | "ready" | "error";

export type RegistrationState = {
  form: GuestRegistrationForm;
  submitting: boolean;
  error: string | null;
  errorField: string | null;
  confirmation: GuestRecord | null;
};

export type CatalogSnapshot = {
  status: CatalogStatus;
  events: readonly CatalogEvent[];
  view: ComposedEventView;
  wishlist: readonly CatalogEvent[];
  availableGenres: readonly string[];
  filters: CatalogFilters;
  preferences: { applied: readonly string[]; wishlisted: readonly string[] };
  fetchError: SurfaceError | null;
  registration: RegistrationState;
};

type Listener = (snapshot: CatalogSnapshot) => void;

export type CatalogSessionOptions = {
  repository: RemoteEventRepository;
  preferences: LocalPreferenceStore;
  submitter: RegistrationSubmitter;
  notifications?: NotificationCenter;
  now?: () => Date;
  closingWindowDays?: number;
  logger?: Logger;
  /** Called after a registration lands; hosts navigate to their confirmation step here. */
  onRegistrationConfirmed?: (record: GuestRecord) => void;
};

export interface CatalogSession {
  getSnapshot(): CatalogSnapshot;
  subscribe(listener: Listener): () => void;
  refresh(options?: { signal?: AbortSignal }): Promise<void>;
  recompose(): void;
  setSearchText(searchText: string): void;
  setSelectedGenres(genres: Iterable<string>): void;
  toggleGenre(genre: string): void;
  clearFilters(): void;
  toggleWishlist(eventId: string): boolean;
  removeFromWishlist(eventId: string): void;
  resetApplied(): void;
  resetWishlist(): void;
  beginRegistration(eventId: string): void;
  updateRegistrationForm(patch: Partial<Omit<GuestRegistrationForm, "eventId">>): void;
  submitRegistration(options?: { signal?: AbortSignal }): Promise<GuestRecord | null>;
  dismissConfirmation(): void;
}

type SessionState = {
  status: CatalogStatus;
  events: readonly CatalogEvent[];
  filters: CatalogFilters;
  preferences: PreferenceSnapshot;
  fetchError: SurfaceError | null;
  registration: RegistrationState;
};

type Derived = Pick<CatalogSnapshot, "view" | "wishlist" | "availableGenres">;

export function emptyRegistrationForm(eventId = ""): GuestRegistrationForm {
  return { eventId, fullName: "", role: "", company: "", email: "", additionalRequest: "" };
}

function idleRegistration(eventId = ""): RegistrationState {
  return { form: emptyRegistrationForm(eventId), submitting: false, error: null, errorField: null, confirmation: null };
}

export function createCatalogSession(options: CatalogSessionOptions): CatalogSession {
  const { repository, preferences, submitter, notifications } = options;
  const now = options.now ?? (() => new Date());
  const closingWindowDays = options.closingWindowDays ?? DEFAULT_CLOSING_WINDOW_DAYS;
  const logger = options.logger ?? silentLogger;
  const listeners = new Set<Listener>();
  let fetchSequence = 0;

  let state: SessionState = {
    status: "idle",
    events: [],
    filters: { searchText: "", selectedGenres: [] },
    preferences: preferences.load(),
    fetchError: null,
    registration: idleRegistration(),
  };

  const derive = (): Derived => {
    const view = composeEventView({
      events: state.events,
      preferences: state.preferences,
      searchText: state.filters.searchText,
      selectedGenres: state.filters.selectedGenres,
      now: now(),
      closingWindowDays,
    });
    logger.debug("catalog recomposed", {
      applied: view.applied.length,
      closingSoon: view.closingSoon.length,
      other: view.other.length,
    });
    return {
      view,
      wishlist: selectWishlistEvents(state.events, state.preferences.wishlisted),
      availableGenres: collectGenres(state.events),
    };
  };

  const toSnapshot = (derived: Derived): CatalogSnapshot => ({
    status: state.status,
    events: state.events,
    ...derived,
    filters: state.filters,
    preferences: {
      applied: [...state.preferences.applied],
      wishlisted: [...state.preferences.wishlisted],
    },
    fetchError: state.fetchError,
    registration: state.registration,
  });

  let derived = derive();
  let snapshot = toSnapshot(derived);

  const commit = (changes: Partial<SessionState>, { recompose = false } = {}) => {
    state = { ...state, ...changes };
    if (recompose) derived = derive();
    snapshot = toSnapshot(derived);
    listeners.forEach((listener) => {
      listener(snapshot);
    });
  };

  const syncPreferences = () => {
    commit({ preferences: preferences.snapshot() }, { recompose: true });
  };

  const findEvent = (eventId: string) => state.events.find((event) => event.id === eventId);

  return {
    getSnapshot: () => snapshot,

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    async refresh({ signal } = {}) {
      const ticket = ++fetchSequence;
      const before = { status: state.status, fetchError: state.fetchError };
      commit({ status: "loading", fetchError: null });

      try {
        const events = await repository.fetchEvents({ signal });
        if (ticket !== fetchSequence) return;
        commit({ status: "ready", events, fetchError: null }, { recompose: true });
      } catch (error: unknown) {
        if (ticket !== fetchSequence) return;
        if (isAbortError(error)) {
          // The previous collection stays on screen.
          commit(before);
          return;
        }
        const surface = buildSurfaceError(error, { kind: "fetch" });
        logger.warn("catalog refresh failed", {
          correlationId: surface.error.correlationId,
          keptEvents: state.events.length,
        });
        commit({ status: "error", fetchError: surface });
      }
    },

    recompose() {
      commit({}, { recompose: true });
    },

    setSearchText(searchText) {
      if (searchText === state.filters.searchText) return;
      commit({ filters: { ...state.filters, searchText } }, { recompose: true });
    },

    setSelectedGenres(genres) {
      commit({ filters: { ...state.filters, selectedGenres: [...new Set(genres)] } }, { recompose: true });
    },

    toggleGenre(genre) {
      const selected = state.filters.selectedGenres;
      const next = selected.includes(genre) ? selected.filter((entry) => entry !== genre) : [...selected, genre];
      commit({ filters: { ...state.filters, selectedGenres: next } }, { recompose: true });
    },

    clearFilters() {
      commit({ filters: { searchText: "", selectedGenres: [] } }, { recompose: true });
    },

    toggleWishlist(eventId) {
      if (preferences.has("wishlisted", eventId)) {
        preferences.remove("wishlisted", eventId);
        syncPreferences();
        return false;
      }
      preferences.add("wishlisted", eventId);
      const title = findEvent(eventId)?.title ?? eventId;
      notifications?.notify(`'${title}' added to wishlist`, "success");
      logger.info("wishlist updated", { eventId, wishlisted: true });
      syncPreferences();
      return true;
    },

    removeFromWishlist(eventId) {
      preferences.remove("wishlisted", eventId);
      syncPreferences();
    },

    resetApplied() {
      preferences.resetApplied();
      syncPreferences();
    },

    resetWishlist() {
      preferences.resetWishlisted();
      syncPreferences();
    },

    beginRegistration(eventId) {
      // The in-flight submission owns the form until it settles.
      if (state.registration.submitting) return;
      if (state.registration.form.eventId === eventId && !state.registration.confirmation) return;
      commit({ registration: idleRegistration(eventId) });
    },

    updateRegistrationForm(patch) {
      const { registration } = state;
      commit({ registration: { ...registration, form: { ...registration.form, ...patch } } });
    },

    async submitRegistration({ signal } = {}) {
      if (state.registration.submitting) return null;
      commit({ registration: { ...state.registration, submitting: true, error: null, errorField: null } });

      let record: GuestRecord;
      try {
        record = await submitter.submit(state.registration.form, { signal });
      } catch (error: unknown) {
        if (isAbortError(error)) {
          commit({ registration: { ...state.registration, submitting: false } });
          return null;
        }
        const validation = error instanceof ValidationError ? error : null;
        commit({
          registration: {
            ...state.registration,
            submitting: false,
            error: validation ? validation.userMessage : registrationErrorMessage(error),
            errorField: validation ? validation.field : null,
          },
        });
        return null;
      }

      commit(
        {
          preferences: preferences.snapshot(),
          registration: { ...idleRegistration(), confirmation: record },
        },
        { recompose: true }
      );
      options.onRegistrationConfirmed?.(record);
      return record;
    },

    dismissConfirmation() {
      if (!state.registration.confirmation) return;
      commit({ registration: idleRegistration() });
    },
  };
}
