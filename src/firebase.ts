import { initializeApp, type FirebaseApp } from "firebase/app";
import { connectFirestoreEmulator, initializeFirestore, type Firestore } from "firebase/firestore";

import type { GuestlistEnv } from "./config/env";
import type { Logger } from "./config/logger";
import { silentLogger } from "./config/logger";

export type FirestoreHandle = {
  app: FirebaseApp;
  db: Firestore;
};

export function createFirestore(env: GuestlistEnv, logger: Logger = silentLogger): FirestoreHandle {
  const app = initializeApp({
    apiKey: env.GUESTLIST_FIREBASE_API_KEY,
    projectId: env.GUESTLIST_FIREBASE_PROJECT_ID,
    authDomain: env.GUESTLIST_FIREBASE_AUTH_DOMAIN || `${env.GUESTLIST_FIREBASE_PROJECT_ID}.firebaseapp.com`,
    ...(env.GUESTLIST_FIREBASE_APP_ID ? { appId: env.GUESTLIST_FIREBASE_APP_ID } : {}),
  });

  // Long polling survives proxies that drop the watch stream. Works against the emulator too.
  const db = initializeFirestore(app, {
    experimentalForceLongPolling: true,
  });

  if (env.GUESTLIST_USE_FIRESTORE_EMULATOR) {
    const host = env.GUESTLIST_FIRESTORE_EMULATOR_HOST;
    const port = env.GUESTLIST_FIRESTORE_EMULATOR_PORT;
    connectFirestoreEmulator(db, host, port);
    logger.info("firestore emulator connected", { host, port });
  }

  return { app, db };
}
