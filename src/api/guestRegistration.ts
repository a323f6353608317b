import type { Firestore } from "firebase/firestore";
import { addDoc, collection, serverTimestamp } from "firebase/firestore";
import { z } from "zod";

import type { Logger } from "../config/logger";
import { silentLogger } from "../config/logger";
import { ValidationError, isAbortError, toAppError } from "../errors/appError";
import type { LocalPreferenceStore } from "../lib/preferenceStore";
import type { GuestRecord, GuestRegistrationForm, GuestRegistrationRequest } from "../types/events";

const requiredText = (message: string) => z.string({ required_error: message, invalid_type_error: message }).trim().min(1, { message });

// Key order decides which missing field is reported first.
const guestRegistrationSchema = z.object({
  eventId: requiredText("Choose an event before registering"),
  fullName: requiredText("Full name is required"),
  role: requiredText("Role is required"),
  company: requiredText("Company is required"),
  email: requiredText("Email is required"),
  additionalRequest: z
    .string()
    .nullish()
    .transform((value) => {
      const trimmed = value?.trim() ?? "";
      return trimmed ? trimmed : null;
    }),
});

export function validateGuestRegistration(form: Partial<GuestRegistrationForm>): GuestRegistrationRequest {
  const parsed = guestRegistrationSchema.safeParse(form);
  if (parsed.success) return parsed.data;

  const [issue] = parsed.error.issues;
  const field = typeof issue?.path[0] === "string" ? issue.path[0] : "form";
  throw new ValidationError({ field, message: issue?.message ?? "Registration is incomplete" });
}

/** Backend side of a registration: one guest record per call. */
export interface GuestWriter {
  insertGuest(request: GuestRegistrationRequest): Promise<GuestRecord>;
}

type FirestoreGuestWriterOptions = {
  db: Firestore;
  collectionName?: string;
};

export function createFirestoreGuestWriter(options: FirestoreGuestWriterOptions): GuestWriter {
  const collectionName = options.collectionName ?? "guests";
  return {
    async insertGuest(request) {
      const ref = await addDoc(collection(options.db, collectionName), {
        event_id: request.eventId,
        name: request.fullName,
        role: request.role,
        company: request.company,
        email: request.email,
        request: request.additionalRequest,
        created_at: serverTimestamp(),
      });
      // The server timestamp resolves on the backend; callers that need it re-read.
      return { ...request, id: ref.id, createdAt: null };
    },
  };
}

export type SubmitRegistrationOptions = {
  signal?: AbortSignal;
};

export interface RegistrationSubmitter {
  submit(form: Partial<GuestRegistrationForm>, options?: SubmitRegistrationOptions): Promise<GuestRecord>;
}

type RegistrationSubmitterOptions = {
  guests: GuestWriter;
  preferences: LocalPreferenceStore;
  logger?: Logger;
};

export function createRegistrationSubmitter(options: RegistrationSubmitterOptions): RegistrationSubmitter {
  const logger = options.logger ?? silentLogger;

  return {
    async submit(form, { signal } = {}) {
      const request = validateGuestRegistration(form);
      signal?.throwIfAborted();

      let record: GuestRecord;
      try {
        record = await options.guests.insertGuest(request);
      } catch (error: unknown) {
        if (isAbortError(error)) throw error;
        const submissionError = toAppError(error, { kind: "submission" });
        logger.error("guest insert failed", {
          eventId: request.eventId,
          code: submissionError.code ?? null,
          debugMessage: submissionError.debugMessage,
          correlationId: submissionError.correlationId,
        });
        throw submissionError;
      }

      // Only after the insert has landed; the two must never be seen apart.
      options.preferences.add("applied", request.eventId);
      logger.info("guest registered", { eventId: request.eventId, guestId: record.id });
      return record;
    },
  };
}

/** Lines for the confirmation step, optional fields omitted when empty. */
export function buildConfirmationSummary(record: GuestRecord): string[] {
  const lines = [`Full Name: ${record.fullName}`];
  if (record.role) lines.push(`Role: ${record.role}`);
  if (record.company) lines.push(`Company: ${record.company}`);
  lines.push(`Email: ${record.email}`);
  if (record.additionalRequest) lines.push(`Additional Request: ${record.additionalRequest}`);
  return lines;
}
