import admin from "firebase-admin";
import type { ServiceAccount } from "firebase-admin/app";
import type { Firestore } from "firebase-admin/firestore";
import fs from "node:fs";
import { z } from "zod";
import type { AppConfig } from "./config.js";
import { ConfigError } from "./errors.js";

export type FirebaseConfig = Pick<AppConfig, "FIREBASE_SERVICE_ACCOUNT_JSON" | "GOOGLE_APPLICATION_CREDENTIALS">;

const serviceAccountSchema = z.object({
  project_id: z.string(),
  client_email: z.string(),
  private_key: z.string(),
});

function parseServiceAccount(json: string): ServiceAccount {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new ConfigError("FIREBASE_SERVICE_ACCOUNT_JSON is not valid JSON", { cause: err });
  }
  const parsed = serviceAccountSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("FIREBASE_SERVICE_ACCOUNT_JSON is missing project_id, client_email or private_key");
  }
  return {
    projectId: parsed.data.project_id,
    clientEmail: parsed.data.client_email,
    privateKey: parsed.data.private_key,
  };
}

/** Returns null when no Firebase credentials are configured. */
export function initializeFirestore(config: FirebaseConfig): Firestore | null {
  if (admin.apps.length) {
    return admin.firestore(admin.app());
  }

  let credential: admin.credential.Credential;

  if (config.FIREBASE_SERVICE_ACCOUNT_JSON) {
    credential = admin.credential.cert(parseServiceAccount(config.FIREBASE_SERVICE_ACCOUNT_JSON));
  } else if (config.GOOGLE_APPLICATION_CREDENTIALS) {
    const p = config.GOOGLE_APPLICATION_CREDENTIALS;
    if (!fs.existsSync(p)) {
      throw new ConfigError(`GOOGLE_APPLICATION_CREDENTIALS not found at: ${p}`);
    }
    credential = admin.credential.cert(p);
  } else {
    return null;
  }

  return admin.firestore(admin.initializeApp({ credential }));
}
