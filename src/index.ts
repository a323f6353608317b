export { createGuestlist } from "./createGuestlist";
export type { Guestlist, GuestlistOptions } from "./createGuestlist";
export { createFirestore } from "./firebase";
export type { FirestoreHandle } from "./firebase";

export { createFirestoreEventRepository } from "./api/eventRepository";
export type { FetchEventsOptions, RemoteEventRepository } from "./api/eventRepository";
export {
  buildConfirmationSummary,
  createFirestoreGuestWriter,
  createRegistrationSubmitter,
  validateGuestRegistration,
} from "./api/guestRegistration";
export type { GuestWriter, RegistrationSubmitter, SubmitRegistrationOptions } from "./api/guestRegistration";

export { readEnv, redactEnvForLogs } from "./config/env";
export type { EnvSource, GuestlistEnv } from "./config/env";
export { createLogger, sanitizeLogMeta, silentLogger } from "./config/logger";
export type { LogLevel, LogMeta, LogSink, Logger } from "./config/logger";

export {
  AppError,
  FetchError,
  SubmissionError,
  ValidationError,
  isAbortError,
  makeSupportCode,
  toAppError,
} from "./errors/appError";
export type { AppErrorKind, AppErrorOptions } from "./errors/appError";

export { useEventCatalog } from "./hooks/useEventCatalog";
export type { EventCatalogActions } from "./hooks/useEventCatalog";
export { useToasts } from "./hooks/useToasts";

export { createCatalogSession, emptyRegistrationForm } from "./lib/catalogSession";
export type {
  CatalogSession,
  CatalogSessionOptions,
  CatalogSnapshot,
  CatalogStatus,
  RegistrationState,
} from "./lib/catalogSession";
export {
  DEFAULT_CLOSING_WINDOW_DAYS,
  categorizeEvent,
  closingLabel,
  collectGenres,
  composeEventView,
  daysUntil,
  filterEvents,
  formatClosingLabel,
  selectWishlistEvents,
} from "./lib/eventCatalog";
export { createFileStorage } from "./lib/fileStorage";
export { EventDocumentError, normalizeEventDoc, toDateOrNull } from "./lib/normalizers/events";
export { DEFAULT_TOAST_TTL_MS, createNotificationCenter } from "./lib/notifications";
export type { NotificationCenter, Toast, ToastTone } from "./lib/notifications";
export { PREFERENCE_STORAGE_KEYS, createLocalPreferenceStore } from "./lib/preferenceStore";
export type { LocalPreferenceStore } from "./lib/preferenceStore";
export { createMemoryStorage, resolveBrowserStorage } from "./lib/safeStorage";
export type { KeyValueStorage, StorageArea } from "./lib/safeStorage";

export type * from "./types/events";

export { buildSurfaceError, fetchErrorMessage, registrationErrorMessage } from "./utils/userFacingErrors";
export type { SurfaceError } from "./utils/userFacingErrors";
export { toVoidHandler } from "./utils/toVoidHandler";
