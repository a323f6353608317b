import type { Logger } from "../config/logger";
import { silentLogger } from "../config/logger";
import type { PreferenceSetName, PreferenceSnapshot } from "../types/events";
import type { KeyValueStorage } from "./safeStorage";
import { safeStorageReadJson, safeStorageRemoveItem, safeStorageSetItem } from "./safeStorage";

export const PREFERENCE_STORAGE_KEYS: Record<PreferenceSetName, string> = {
  applied: "appliedEventIDs",
  wishlisted: "wishlistEventIDs",
};

/**
 * On-device record of the user's relationship to events. Every mutation is
 * written to storage before it returns; nothing is queued.
 */
export interface LocalPreferenceStore {
  load(): PreferenceSnapshot;
  snapshot(): PreferenceSnapshot;
  has(setName: PreferenceSetName, eventId: string): boolean;
  add(setName: PreferenceSetName, eventId: string): void;
  remove(setName: PreferenceSetName, eventId: string): void;
  resetApplied(): void;
  resetWishlisted(): void;
}

type PreferenceStoreOptions = {
  storage: KeyValueStorage | null;
  namespace?: string;
  logger?: Logger;
};

function readIdSet(storage: KeyValueStorage | null, key: string): Set<string> {
  const parsed = safeStorageReadJson(storage, key);
  if (!Array.isArray(parsed)) return new Set();
  return new Set(parsed.filter((entry): entry is string => typeof entry === "string" && entry.length > 0));
}

export function createLocalPreferenceStore(options: PreferenceStoreOptions): LocalPreferenceStore {
  const { storage } = options;
  const namespace = options.namespace ?? "";
  const logger = options.logger ?? silentLogger;
  const keyFor = (setName: PreferenceSetName) => `${namespace}${PREFERENCE_STORAGE_KEYS[setName]}`;

  // Read up front: every mutation writes the whole set back.
  const sets: Record<PreferenceSetName, Set<string>> = {
    applied: readIdSet(storage, keyFor("applied")),
    wishlisted: readIdSet(storage, keyFor("wishlisted")),
  };

  const persist = (setName: PreferenceSetName) => {
    const written = safeStorageSetItem(storage, keyFor(setName), JSON.stringify([...sets[setName]]));
    if (!written) {
      logger.warn("preference write did not reach storage", { set: setName, size: sets[setName].size });
    }
  };

  const snapshot = (): PreferenceSnapshot => ({
    applied: new Set(sets.applied),
    wishlisted: new Set(sets.wishlisted),
  });

  return {
    load() {
      sets.applied = readIdSet(storage, keyFor("applied"));
      sets.wishlisted = readIdSet(storage, keyFor("wishlisted"));
      logger.debug("preferences loaded", { applied: sets.applied.size, wishlisted: sets.wishlisted.size });
      return snapshot();
    },
    snapshot,
    has(setName, eventId) {
      return sets[setName].has(eventId);
    },
    add(setName, eventId) {
      sets[setName].add(eventId);
      persist(setName);
    },
    remove(setName, eventId) {
      sets[setName].delete(eventId);
      persist(setName);
    },
    resetApplied() {
      sets.applied = new Set();
      if (!safeStorageRemoveItem(storage, keyFor("applied"))) {
        logger.warn("applied reset did not reach storage");
      }
      logger.info("applied events reset");
    },
    resetWishlisted() {
      sets.wishlisted = new Set();
      if (!safeStorageRemoveItem(storage, keyFor("wishlisted"))) {
        logger.warn("wishlist reset did not reach storage");
      }
      logger.info("wishlist reset");
    },
  };
}
