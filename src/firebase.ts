import admin from "firebase-admin";
import fs from "node:fs";
import { z } from "zod";
import { AppConfig } from "./config.js";

const serviceAccountSchema = z
  .object({
    project_id: z.string(),
    client_email: z.string(),
    private_key: z.string(),
  })
  .transform((v) => ({ projectId: v.project_id, clientEmail: v.client_email, privateKey: v.private_key }));

/**
 * Returns a Firestore handle when Firebase credentials are configured, or
 * null so callers fall back to the filesystem.
 */
export function createFirestore(config: AppConfig): FirebaseFirestore.Firestore | null {
  let credential: admin.credential.Credential;

  if (config.firebaseServiceAccountJson) {
    let json: unknown;
    try {
      json = JSON.parse(config.firebaseServiceAccountJson);
    } catch {
      throw new Error("FIREBASE_SERVICE_ACCOUNT_JSON is not a service account key");
    }
    const parsed = serviceAccountSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error("FIREBASE_SERVICE_ACCOUNT_JSON is not a service account key");
    }
    credential = admin.credential.cert(parsed.data);
  } else if (config.googleApplicationCredentials) {
    const p = config.googleApplicationCredentials;
    if (!fs.existsSync(p)) {
      throw new Error(`GOOGLE_APPLICATION_CREDENTIALS not found at: ${p}`);
    }
    credential = admin.credential.cert(p);
  } else {
    return null;
  }

  const app = admin.apps.length ? admin.app() : admin.initializeApp({ credential });
  return admin.firestore(app);
}
