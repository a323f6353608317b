import type { Firestore } from "firebase/firestore";
import { afterEach, describe, expect, it, vi } from "vitest";

import { SubmissionError, ValidationError } from "../errors/appError";
import { createLocalPreferenceStore } from "../lib/preferenceStore";
import { createMemoryStorage } from "../lib/safeStorage";
import type { GuestRecord, GuestRegistrationForm, GuestRegistrationRequest } from "../types/events";
import {
  buildConfirmationSummary,
  createFirestoreGuestWriter,
  createRegistrationSubmitter,
  validateGuestRegistration,
  type GuestWriter,
} from "./guestRegistration";

const { addDocMock } = vi.hoisted(() => ({ addDocMock: vi.fn() }));

vi.mock("firebase/firestore", () => ({
  collection: vi.fn((_: unknown, path: string) => ({ path })),
  serverTimestamp: vi.fn(() => "server-timestamp"),
  addDoc: (...args: unknown[]) => addDocMock(...args),
}));

const db = { name: "mock-db" } as unknown as Firestore;

function makeForm(overrides: Partial<GuestRegistrationForm> = {}): GuestRegistrationForm {
  return {
    eventId: "evt-1",
    fullName: "Sam Rivera",
    role: "Producer",
    company: "Northside Audio",
    email: "sam@example.test",
    additionalRequest: "",
    ...overrides,
  };
}

function recordingWriter(result: (request: GuestRegistrationRequest) => Promise<GuestRecord>) {
  const requests: GuestRegistrationRequest[] = [];
  const writer: GuestWriter = {
    insertGuest: (request) => {
      requests.push(request);
      return result(request);
    },
  };
  return { writer, requests };
}

function freshStore() {
  const store = createLocalPreferenceStore({ storage: createMemoryStorage() });
  store.load();
  return store;
}

afterEach(() => {
  addDocMock.mockReset();
});

describe("validateGuestRegistration", () => {
  it("trims values and turns a blank additional request into null", () => {
    expect(
      validateGuestRegistration(makeForm({ fullName: "  Sam Rivera ", additionalRequest: "   " }))
    ).toEqual({
      eventId: "evt-1",
      fullName: "Sam Rivera",
      role: "Producer",
      company: "Northside Audio",
      email: "sam@example.test",
      additionalRequest: null,
    });
  });

  it("keeps a non-empty additional request", () => {
    expect(validateGuestRegistration(makeForm({ additionalRequest: " Step-free access " })).additionalRequest).toBe(
      "Step-free access"
    );
  });

  it("reports the first unmet requirement", () => {
    try {
      validateGuestRegistration(makeForm({ role: " ", email: "" }));
      expect.unreachable("validation should fail");
    } catch (error: unknown) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: "role", userMessage: "Role is required" });
    }
  });

  it("reports missing fields in form order", () => {
    expect(() => validateGuestRegistration({ eventId: "evt-1" })).toThrow("Full name is required");
    expect(() => validateGuestRegistration({})).toThrow("Choose an event before registering");
  });
});

describe("createRegistrationSubmitter", () => {
  it("marks the event applied after a successful insert", async () => {
    const preferences = freshStore();
    const { writer, requests } = recordingWriter(async (request) => {
      expect(preferences.has("applied", request.eventId)).toBe(false);
      return { ...request, id: "guest-1", createdAt: null };
    });

    const record = await createRegistrationSubmitter({ guests: writer, preferences }).submit(makeForm());

    expect(record.id).toBe("guest-1");
    expect(requests).toHaveLength(1);
    expect(preferences.has("applied", "evt-1")).toBe(true);
  });

  it("fails fast on validation without calling the backend", async () => {
    const preferences = freshStore();
    const { writer, requests } = recordingWriter(async (request) => ({ ...request, id: "guest-1", createdAt: null }));

    await expect(
      createRegistrationSubmitter({ guests: writer, preferences }).submit(makeForm({ company: "" }))
    ).rejects.toMatchObject({ kind: "validation", field: "company" });
    expect(requests).toEqual([]);
    expect(preferences.snapshot().applied.size).toBe(0);
  });

  it("leaves applied untouched and keeps the backend message when the insert fails", async () => {
    const preferences = freshStore();
    preferences.add("applied", "evt-0");
    const { writer } = recordingWriter(async () => {
      throw new Error("Registration is closed for this event");
    });

    const failure = await createRegistrationSubmitter({ guests: writer, preferences })
      .submit(makeForm())
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(SubmissionError);
    expect(failure).toMatchObject({ userMessage: "Registration is closed for this event", retryable: true });
    expect([...preferences.snapshot().applied]).toEqual(["evt-0"]);
  });

  it("does not dispatch when the signal is already aborted", async () => {
    const preferences = freshStore();
    const { writer, requests } = recordingWriter(async (request) => ({ ...request, id: "guest-1", createdAt: null }));
    const controller = new AbortController();
    controller.abort();

    await expect(
      createRegistrationSubmitter({ guests: writer, preferences }).submit(makeForm(), { signal: controller.signal })
    ).rejects.toMatchObject({ name: "AbortError" });
    expect(requests).toEqual([]);
    expect(preferences.has("applied", "evt-1")).toBe(false);
  });

  it("commits once the insert has landed even if the caller aborted meanwhile", async () => {
    const preferences = freshStore();
    const controller = new AbortController();
    const { writer } = recordingWriter(async (request) => {
      controller.abort();
      return { ...request, id: "guest-2", createdAt: null };
    });

    const record = await createRegistrationSubmitter({ guests: writer, preferences }).submit(makeForm(), {
      signal: controller.signal,
    });

    expect(record.id).toBe("guest-2");
    expect(preferences.has("applied", "evt-1")).toBe(true);
  });
});

describe("createFirestoreGuestWriter", () => {
  it("adds one guest document with stored field names and a server timestamp", async () => {
    addDocMock.mockResolvedValue({ id: "guest-doc-1" });
    const request = validateGuestRegistration(makeForm({ additionalRequest: "Vegetarian meal" }));

    const record = await createFirestoreGuestWriter({ db }).insertGuest(request);

    expect(addDocMock).toHaveBeenCalledWith(
      { path: "guests" },
      {
        event_id: "evt-1",
        name: "Sam Rivera",
        role: "Producer",
        company: "Northside Audio",
        email: "sam@example.test",
        request: "Vegetarian meal",
        created_at: "server-timestamp",
      }
    );
    expect(record).toEqual({ ...request, id: "guest-doc-1", createdAt: null });
  });
});

describe("buildConfirmationSummary", () => {
  it("lists the submitted details and skips an empty request", () => {
    const record: GuestRecord = {
      eventId: "evt-1",
      fullName: "Sam Rivera",
      role: "Producer",
      company: "Northside Audio",
      email: "sam@example.test",
      additionalRequest: null,
      id: "guest-1",
      createdAt: null,
    };

    expect(buildConfirmationSummary(record)).toEqual([
      "Full Name: Sam Rivera",
      "Role: Producer",
      "Company: Northside Audio",
      "Email: sam@example.test",
    ]);
    expect(buildConfirmationSummary({ ...record, additionalRequest: "Vegetarian meal" }).at(-1)).toBe(
      "Additional Request: Vegetarian meal"
    );
  });
});
