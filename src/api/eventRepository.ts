import type { Firestore } from "firebase/firestore";
import { collection, getDocs, orderBy, query } from "firebase/firestore";

import type { Logger } from "../config/logger";
import { silentLogger } from "../config/logger";
import { toAppError } from "../errors/appError";
import { EventDocumentError, normalizeEventDoc } from "../lib/normalizers/events";
import type { CatalogEvent } from "../types/events";

export type FetchEventsOptions = {
  signal?: AbortSignal;
};

export interface RemoteEventRepository {
  /** Full catalog, ordered by `date` ascending. Rejects with `FetchError`. */
  fetchEvents(options?: FetchEventsOptions): Promise<CatalogEvent[]>;
}

type FirestoreEventRepositoryOptions = {
  db: Firestore;
  collectionName?: string;
  logger?: Logger;
};

export function createFirestoreEventRepository(options: FirestoreEventRepositoryOptions): RemoteEventRepository {
  const collectionName = options.collectionName ?? "events";
  const logger = options.logger ?? silentLogger;

  return {
    async fetchEvents({ signal } = {}) {
      signal?.throwIfAborted();
      const startedAt = Date.now();

      let events: CatalogEvent[];
      try {
        const snapshot = await getDocs(query(collection(options.db, collectionName), orderBy("date", "asc")));
        events = snapshot.docs.map((doc) => normalizeEventDoc(doc.id, doc.data()));
      } catch (error: unknown) {
        const fetchError = toAppError(error, {
          kind: "fetch",
          userMessage:
            error instanceof EventDocumentError ? "Some events could not be read. Try again later." : undefined,
        });
        logger.error("event fetch failed", {
          collection: collectionName,
          code: fetchError.code ?? null,
          debugMessage: fetchError.debugMessage,
          correlationId: fetchError.correlationId,
        });
        throw fetchError;
      }

      // Nothing is handed back once the caller has walked away.
      signal?.throwIfAborted();
      logger.info("events fetched", { collection: collectionName, count: events.length, durationMs: Date.now() - startedAt });
      return events;
    },
  };
}
