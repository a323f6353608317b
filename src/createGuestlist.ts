import { resolve } from "node:path";

import { createFirestoreEventRepository, type RemoteEventRepository } from "./api/eventRepository";
import {
  createFirestoreGuestWriter,
  createRegistrationSubmitter,
  type GuestWriter,
  type RegistrationSubmitter,
} from "./api/guestRegistration";
import { readEnv, redactEnvForLogs, type EnvSource, type GuestlistEnv } from "./config/env";
import { createLogger, type Logger, type LogSink } from "./config/logger";
import { createFirestore, type FirestoreHandle } from "./firebase";
import { createCatalogSession, type CatalogSession } from "./lib/catalogSession";
import { createFileStorage } from "./lib/fileStorage";
import { createNotificationCenter, type NotificationCenter } from "./lib/notifications";
import { createLocalPreferenceStore, type LocalPreferenceStore } from "./lib/preferenceStore";
import { resolveBrowserStorage, type KeyValueStorage } from "./lib/safeStorage";
import type { GuestRecord } from "./types/events";

export type GuestlistOptions = {
  env?: EnvSource;
  /** Preference storage. Defaults to localStorage in a browser, otherwise the preferences file. */
  storage?: KeyValueStorage;
  logSink?: LogSink;
  now?: () => Date;
  onRegistrationConfirmed?: (record: GuestRecord) => void;
};

export type Guestlist = {
  env: GuestlistEnv;
  logger: Logger;
  firestore: FirestoreHandle;
  repository: RemoteEventRepository;
  guests: GuestWriter;
  preferences: LocalPreferenceStore;
  submitter: RegistrationSubmitter;
  notifications: NotificationCenter;
  session: CatalogSession;
};

function resolvePreferenceStorage(env: GuestlistEnv, logger: Logger): KeyValueStorage {
  const browser = resolveBrowserStorage("localStorage");
  if (browser) return browser;
  const filePath = resolve(env.GUESTLIST_PREFERENCES_FILE);
  logger.debug("preferences stored on disk", { filePath });
  return createFileStorage(filePath);
}

export function createGuestlist(options: GuestlistOptions = {}): Guestlist {
  const env = readEnv(options.env);
  const logger = createLogger({ level: env.GUESTLIST_LOG_LEVEL, sink: options.logSink, scope: "guestlist" });
  logger.debug("configuration loaded", redactEnvForLogs(env));

  const firestore = createFirestore(env, logger.child("firebase"));
  const repository = createFirestoreEventRepository({
    db: firestore.db,
    collectionName: env.GUESTLIST_EVENTS_COLLECTION,
    logger: logger.child("events"),
  });
  const guests = createFirestoreGuestWriter({ db: firestore.db, collectionName: env.GUESTLIST_GUESTS_COLLECTION });

  const preferences = createLocalPreferenceStore({
    storage: options.storage ?? resolvePreferenceStorage(env, logger),
    namespace: env.GUESTLIST_PREFERENCES_NAMESPACE,
    logger: logger.child("preferences"),
  });
  const submitter = createRegistrationSubmitter({ guests, preferences, logger: logger.child("registration") });
  const notifications = createNotificationCenter({ ttlMs: env.GUESTLIST_TOAST_TTL_MS });

  const session = createCatalogSession({
    repository,
    preferences,
    submitter,
    notifications,
    now: options.now,
    closingWindowDays: env.GUESTLIST_CLOSING_WINDOW_DAYS,
    logger: logger.child("catalog"),
    onRegistrationConfirmed: options.onRegistrationConfirmed,
  });

  return { env, logger, firestore, repository, guests, preferences, submitter, notifications, session };
}
