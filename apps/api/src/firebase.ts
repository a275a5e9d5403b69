import fs from 'node:fs';
import admin from 'firebase-admin';
import { z } from 'zod';
import { getEnv } from './env.js';
import { createLogger } from './logger.js';

const log = createLogger('firebase');

const serviceAccountSchema = z
  .object({
    project_id: z.string().min(1),
    client_email: z.string().min(1),
    private_key: z.string().min(1)
  })
  .transform(
    (sa): admin.ServiceAccount => ({
      projectId: sa.project_id,
      clientEmail: sa.client_email,
      privateKey: sa.private_key
    })
  );

let app: admin.app.App | undefined;

function parseServiceAccount(json: string, origin: string): admin.ServiceAccount {
  const parsed = serviceAccountSchema.safeParse(JSON.parse(json));
  if (!parsed.success) {
    throw new Error(`Invalid Firebase service account (${origin}): ${parsed.error.message}`);
  }
  return parsed.data;
}

function initFirebaseApp(): admin.app.App {
  if (app) return app;

  const env = getEnv();

  if (env.FIREBASE_SERVICE_ACCOUNT_JSON) {
    const serviceAccount = parseServiceAccount(env.FIREBASE_SERVICE_ACCOUNT_JSON, 'FIREBASE_SERVICE_ACCOUNT_JSON');
    app = admin.initializeApp({ credential: admin.credential.cert(serviceAccount) });
    log.info('initialized with service account json');
    return app;
  }

  if (env.FIREBASE_SERVICE_ACCOUNT_PATH) {
    const json = fs.readFileSync(env.FIREBASE_SERVICE_ACCOUNT_PATH, { encoding: 'utf8' });
    const serviceAccount = parseServiceAccount(json, env.FIREBASE_SERVICE_ACCOUNT_PATH);
    app = admin.initializeApp({ credential: admin.credential.cert(serviceAccount) });
    log.info({ path: env.FIREBASE_SERVICE_ACCOUNT_PATH }, 'initialized with service account file');
    return app;
  }

  // Application default credentials (GOOGLE_APPLICATION_CREDENTIALS, GCP runtimes).
  app = admin.initializeApp({
    credential: admin.credential.applicationDefault(),
    projectId: env.FIREBASE_PROJECT_ID
  });
  log.info('initialized with application default credentials');
  return app;
}

export function getFirestore(): admin.firestore.Firestore {
  return initFirebaseApp().firestore();
}
