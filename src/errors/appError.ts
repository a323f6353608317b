export type AppErrorKind = "fetch" | "validation" | "submission" | "unknown";

export type AppErrorOptions = {
  kind?: AppErrorKind;
  code?: string;
  requestId?: string;
  userMessage?: string;
  debugMessage?: string;
  retryable?: boolean;
};

type AppErrorInput = {
  kind: AppErrorKind;
  userMessage: string;
  debugMessage: string;
  correlationId: string;
  retryable: boolean;
  code?: string;
};

type ErrorLike = {
  message?: unknown;
  code?: unknown;
};

/** Short code users can read back to support; matches the `correlationId` in logs. */
export function makeSupportCode(): string {
  return `GL-${crypto.randomUUID().replace(/-/g, "").slice(0, 10).toUpperCase()}`;
}

export class AppError extends Error {
  kind: AppErrorKind;
  userMessage: string;
  debugMessage: string;
  correlationId: string;
  retryable: boolean;
  code?: string;

  constructor(input: AppErrorInput) {
    super(input.userMessage);
    this.name = "AppError";
    this.kind = input.kind;
    this.userMessage = input.userMessage;
    this.debugMessage = input.debugMessage;
    this.correlationId = input.correlationId;
    this.retryable = input.retryable;
    this.code = input.code;
  }
}

/** Reading the event catalog failed. Surfaced with a retry affordance. */
export class FetchError extends AppError {
  constructor(input: Omit<AppErrorInput, "kind">) {
    super({ ...input, kind: "fetch" });
    this.name = "FetchError";
  }
}

/** A required registration field is missing. Raised before any network call. */
export class ValidationError extends AppError {
  field: string;

  constructor(input: { field: string; message: string; correlationId?: string }) {
    super({
      kind: "validation",
      userMessage: input.message,
      debugMessage: `${input.field}: ${input.message}`,
      correlationId: input.correlationId ?? makeSupportCode(),
      retryable: false,
      code: "invalid-argument",
    });
    this.name = "ValidationError";
    this.field = input.field;
  }
}

/**
 * Writing the guest record failed. `userMessage` is the backend message as
 * received, so the form can show it next to the preserved input.
 */
export class SubmissionError extends AppError {
  constructor(input: Omit<AppErrorInput, "kind">) {
    super({ ...input, kind: "submission" });
    this.name = "SubmissionError";
  }
}

function asString(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (value == null) return "";
  return String(value);
}

function normalizeCode(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const next = value.trim().toLowerCase();
  return next ? next.replace(/^firestore\//, "") : undefined;
}

function getErrorLike(value: unknown): ErrorLike {
  if (!value || typeof value !== "object") return {};
  return {
    message: "message" in value ? value.message : undefined,
    code: "code" in value ? value.code : undefined,
  };
}

export function isAbortError(value: unknown): boolean {
  if (!value || typeof value !== "object") return false;
  return "name" in value && value.name === "AbortError";
}

function isConnectivitySignal(rawMessage: string, code?: string): boolean {
  if (code === "unavailable" || code === "deadline-exceeded") return true;
  const lower = rawMessage.toLowerCase();
  return (
    lower.includes("failed to fetch") ||
    lower.includes("network request failed") ||
    lower.includes("fetch failed") ||
    lower.includes("offline") ||
    lower.includes("timed out")
  );
}

function isPermissionSignal(rawMessage: string, code?: string): boolean {
  if (code === "permission-denied" || code === "unauthenticated") return true;
  const lower = rawMessage.toLowerCase();
  return lower.includes("insufficient permissions") || lower.includes("permission denied");
}

function inferRetryable(kind: AppErrorKind, debugMessage: string, code?: string): boolean {
  if (kind === "validation") return false;
  if (kind === "fetch" || kind === "submission") return true;
  return isConnectivitySignal(debugMessage, code);
}

function buildUserMessage(kind: AppErrorKind, debugMessage: string, code?: string): string {
  if (kind === "submission") return debugMessage;
  if (kind === "validation") return debugMessage;

  if (isConnectivitySignal(debugMessage, code)) {
    return "You appear to be offline or on a weak network. Reconnect, then try again.";
  }
  if (isPermissionSignal(debugMessage, code)) {
    return "The event catalog is not available to this app right now. Try again later.";
  }
  if (kind === "fetch") return "We could not load events. Try again.";
  return "Something went wrong. Try again.";
}

function construct(kind: AppErrorKind, input: Omit<AppErrorInput, "kind">): AppError {
  if (kind === "fetch") return new FetchError(input);
  if (kind === "submission") return new SubmissionError(input);
  return new AppError({ ...input, kind });
}

export function toAppError(error: unknown, options: AppErrorOptions = {}): AppError {
  if (error instanceof AppError) return error;

  const asObj = getErrorLike(error);
  const rawDebugMessage = options.debugMessage ?? (typeof asObj.message === "string" ? asObj.message : asString(error));
  const debugMessage = rawDebugMessage.trim() || "Request failed";
  const code = normalizeCode(options.code ?? asObj.code);
  const kind = options.kind ?? "unknown";
  const retryable = options.retryable ?? inferRetryable(kind, debugMessage, code);
  const userMessage = options.userMessage?.trim() || buildUserMessage(kind, debugMessage, code);
  const correlationId = options.requestId?.trim() || makeSupportCode();

  return construct(kind, { userMessage, debugMessage, correlationId, retryable, code });
}
