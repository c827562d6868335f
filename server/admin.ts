import admin from "firebase-admin";
import type { App, Credential, ServiceAccount } from "firebase-admin/app";
import type { Env } from "./config/env";
import logger from "./logger";

/**
 * Detect obviously invalid placeholder values that aren't real credentials.
 * A valid service-account JSON is typically 2000+ chars and starts with '{'.
 */
export function isPlaceholder(value: string | undefined): boolean {
  if (!value) return true;
  const trimmed = value.trim();
  if (trimmed.length < 100) return true;
  if (/^x{4,}/.test(trimmed)) return true;
  if (!trimmed.startsWith("{")) return true;
  return false;
}

function resolveCredential(config: Env): { credential: Credential; source: string } {
  if (config.FIREBASE_ADMIN_KEY && !isPlaceholder(config.FIREBASE_ADMIN_KEY)) {
    try {
      const serviceAccount: ServiceAccount = JSON.parse(config.FIREBASE_ADMIN_KEY);
      return { credential: admin.credential.cert(serviceAccount), source: "FIREBASE_ADMIN_KEY (JSON)" };
    } catch (error) {
      logger.warn("FIREBASE_ADMIN_KEY is set but contains invalid JSON, skipping", {
        length: config.FIREBASE_ADMIN_KEY.length,
        error,
      });
    }
  }

  const projectId = config.FIREBASE_PROJECT_ID;
  const clientEmail = config.FIREBASE_CLIENT_EMAIL;
  const privateKey = config.FIREBASE_PRIVATE_KEY?.replace(/\\n/g, "\n");
  if (projectId && clientEmail && privateKey) {
    return {
      credential: admin.credential.cert({ projectId, clientEmail, privateKey }),
      source: "individual env vars (PROJECT_ID + CLIENT_EMAIL + PRIVATE_KEY)",
    };
  }

  // Works on GCP; signing URLs then goes through the IAM signBlob API
  return {
    credential: admin.credential.applicationDefault(),
    source: "Application Default Credentials",
  };
}

/**
 * Initialise the Firebase Admin app once and return it. The storage client of
 * this app backs the object store.
 */
export function initFirebaseAdmin(config: Env): App {
  if (admin.apps.length > 0) {
    return admin.app();
  }

  const { credential, source } = resolveCredential(config);
  const app = admin.initializeApp({ credential, projectId: config.FIREBASE_PROJECT_ID });
  logger.info(`Firebase Admin SDK initialized via ${source}`);
  return app;
}
