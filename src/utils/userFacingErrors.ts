import type { AppError, AppErrorKind } from "../errors/appError";
import { toAppError } from "../errors/appError";

type ErrorMessageOptions = {
  kind?: AppErrorKind;
  includeSupportCode?: boolean;
};

export type SurfaceError = {
  error: AppError;
  message: string;
};

function supportCodeCopy(error: AppError): string {
  return `support code: ${error.correlationId}`;
}

export function buildSurfaceError(err: unknown, options: ErrorMessageOptions = {}): SurfaceError {
  const error = toAppError(err, { kind: options.kind });
  // Validation copy sits beside the field; a support code there is noise.
  const includeSupportCode = options.includeSupportCode ?? error.kind !== "validation";
  return {
    error,
    message: includeSupportCode ? `${error.userMessage} (${supportCodeCopy(error)})` : error.userMessage,
  };
}

export function fetchErrorMessage(err: unknown): string {
  return buildSurfaceError(err, { kind: "fetch" }).message;
}

export function registrationErrorMessage(err: unknown): string {
  return buildSurfaceError(err, { kind: "submission", includeSupportCode: false }).message;
}
