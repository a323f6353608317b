import { useEffect, useMemo, useSyncExternalStore } from "react";

import type { Logger } from "../config/logger";
import { silentLogger } from "../config/logger";
import type { CatalogSession, CatalogSnapshot } from "../lib/catalogSession";
import type { GuestRegistrationForm } from "../types/events";
import { toVoidHandler } from "../utils/toVoidHandler";

type UseEventCatalogOptions = {
  /** Fetch on mount. Defaults to true. */
  autoRefresh?: boolean;
  logger?: Logger;
  onHandlerError?: (error: unknown) => void;
};

export type EventCatalogActions = {
  refresh: () => void;
  setSearchText: (searchText: string) => void;
  toggleGenre: (genre: string) => void;
  clearFilters: () => void;
  toggleWishlist: (eventId: string) => void;
  removeFromWishlist: (eventId: string) => void;
  resetApplied: () => void;
  resetWishlist: () => void;
  beginRegistration: (eventId: string) => void;
  updateRegistrationForm: (patch: Partial<Omit<GuestRegistrationForm, "eventId">>) => void;
  submitRegistration: () => void;
  dismissConfirmation: () => void;
};

export function useEventCatalog(
  session: CatalogSession,
  options: UseEventCatalogOptions = {}
): CatalogSnapshot & { actions: EventCatalogActions } {
  const { autoRefresh = true, logger = silentLogger, onHandlerError } = options;
  const snapshot = useSyncExternalStore(session.subscribe, session.getSnapshot, session.getSnapshot);

  useEffect(() => {
    if (!autoRefresh) return;
    const controller = new AbortController();
    void session.refresh({ signal: controller.signal });
    return () => {
      controller.abort();
    };
  }, [session, autoRefresh]);

  const actions = useMemo<EventCatalogActions>(() => {
    const wrap = <TArgs extends unknown[]>(label: string, handler: (...args: TArgs) => void | Promise<unknown>) =>
      toVoidHandler(handler, { label, logger, onError: onHandlerError });

    return {
      refresh: wrap("catalog-refresh", () => session.refresh()),
      setSearchText: wrap("catalog-search", (searchText: string) => session.setSearchText(searchText)),
      toggleGenre: wrap("catalog-genre", (genre: string) => session.toggleGenre(genre)),
      clearFilters: wrap("catalog-clear-filters", () => session.clearFilters()),
      toggleWishlist: wrap("wishlist-toggle", (eventId: string) => {
        session.toggleWishlist(eventId);
      }),
      removeFromWishlist: wrap("wishlist-remove", (eventId: string) => session.removeFromWishlist(eventId)),
      resetApplied: wrap("settings-reset-applied", () => session.resetApplied()),
      resetWishlist: wrap("settings-reset-wishlist", () => session.resetWishlist()),
      beginRegistration: wrap("registration-begin", (eventId: string) => session.beginRegistration(eventId)),
      updateRegistrationForm: wrap(
        "registration-update",
        (patch: Partial<Omit<GuestRegistrationForm, "eventId">>) => session.updateRegistrationForm(patch)
      ),
      submitRegistration: wrap("registration-submit", () => session.submitRegistration()),
      dismissConfirmation: wrap("registration-dismiss", () => session.dismissConfirmation()),
    };
  }, [session, logger, onHandlerError]);

  return { ...snapshot, actions };
}
