import { afterEach, describe, expect, it, vi } from "vitest";

import { readEnv } from "./config/env";
import { createLogger } from "./config/logger";
import { createFirestore } from "./firebase";

const mocks = vi.hoisted(() => ({
  initializeApp: vi.fn((config: Record<string, unknown>) => ({ name: "[DEFAULT]", options: config })),
  initializeFirestore: vi.fn((app: unknown, settings: Record<string, unknown>) => ({ app, settings })),
  connectFirestoreEmulator: vi.fn(),
}));

vi.mock("firebase/app", () => ({ initializeApp: mocks.initializeApp }));
vi.mock("firebase/firestore", () => ({
  initializeFirestore: mocks.initializeFirestore,
  connectFirestoreEmulator: mocks.connectFirestoreEmulator,
}));

const BASE = {
  GUESTLIST_FIREBASE_API_KEY: "test-api-key",
  GUESTLIST_FIREBASE_PROJECT_ID: "guestlist-test",
};

describe("createFirestore", () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it("initializes the app from env and forces long polling", () => {
    createFirestore(readEnv({ ...BASE, GUESTLIST_FIREBASE_APP_ID: "1:test:web:app" }));

    expect(mocks.initializeApp).toHaveBeenCalledWith({
      apiKey: "test-api-key",
      projectId: "guestlist-test",
      authDomain: "guestlist-test.firebaseapp.com",
      appId: "1:test:web:app",
    });
    expect(mocks.initializeFirestore.mock.calls[0]?.[1]).toEqual({ experimentalForceLongPolling: true });
    expect(mocks.connectFirestoreEmulator).not.toHaveBeenCalled();
  });

  it("connects the emulator when enabled", () => {
    const lines: string[] = [];
    const logger = createLogger({ sink: (line) => lines.push(line) });

    const { db } = createFirestore(
      readEnv({ ...BASE, GUESTLIST_USE_FIRESTORE_EMULATOR: "true", GUESTLIST_FIRESTORE_EMULATOR_PORT: "9150" }),
      logger
    );

    expect(mocks.connectFirestoreEmulator).toHaveBeenCalledWith(db, "127.0.0.1", 9150);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      msg: "firestore emulator connected",
      meta: { host: "127.0.0.1", port: 9150 },
    });
  });
});
