import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const BoolFromString = z
  .union([z.enum(["true", "false", "1", "0"]), z.boolean()])
  .transform((value) => value === true || value === "true" || value === "1");

const requiredString = (field: string) =>
  z
    .string()
    .trim()
    .min(1, { message: `${field} must not be empty` });

const EnvSchema = z.object({
  GUESTLIST_FIREBASE_API_KEY: requiredString("GUESTLIST_FIREBASE_API_KEY"),
  GUESTLIST_FIREBASE_PROJECT_ID: requiredString("GUESTLIST_FIREBASE_PROJECT_ID"),
  GUESTLIST_FIREBASE_AUTH_DOMAIN: z.string().trim().optional(),
  GUESTLIST_FIREBASE_APP_ID: z.string().trim().optional(),
  GUESTLIST_USE_FIRESTORE_EMULATOR: BoolFromString.default(false),
  GUESTLIST_FIRESTORE_EMULATOR_HOST: requiredString("GUESTLIST_FIRESTORE_EMULATOR_HOST").default("127.0.0.1"),
  GUESTLIST_FIRESTORE_EMULATOR_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  GUESTLIST_EVENTS_COLLECTION: requiredString("GUESTLIST_EVENTS_COLLECTION").default("events"),
  GUESTLIST_GUESTS_COLLECTION: requiredString("GUESTLIST_GUESTS_COLLECTION").default("guests"),
  GUESTLIST_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  GUESTLIST_CLOSING_WINDOW_DAYS: z.coerce.number().int().min(0).max(365).default(7),
  GUESTLIST_TOAST_TTL_MS: z.coerce.number().int().min(250).max(60_000).default(2_500),
  GUESTLIST_PREFERENCES_FILE: requiredString("GUESTLIST_PREFERENCES_FILE").default(".guestlist-preferences.json"),
  GUESTLIST_PREFERENCES_NAMESPACE: z.string().default(""),
});

export type GuestlistEnv = z.infer<typeof EnvSchema>;

export type EnvSource = Record<string, string | undefined>;

export function readEnv(source: EnvSource = process.env): GuestlistEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid guestlist configuration: ${details}`);
  }
  return parsed.data;
}

export function redactEnvForLogs(env: GuestlistEnv): Record<string, unknown> {
  return {
    ...env,
    GUESTLIST_FIREBASE_API_KEY: env.GUESTLIST_FIREBASE_API_KEY ? "[set]" : "[unset]",
  };
}
