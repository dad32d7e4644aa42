import { cert, getApps, initializeApp, type App } from 'firebase-admin/app';
import { getFirestore } from 'firebase-admin/firestore';
import { z } from 'zod';
import { createLogger } from '../logging-config.js';
import { withTimeout } from '../utils.js';
import type { DocumentStore, GetDocumentOptions, StoredDocument } from './views.js';

const logger = createLogger('structura.store.firestore');

const APP_NAME = 'structura';

/** The slice of the Firestore client this store reads through. */
export interface FirestoreLike {
  collection(path: string): {
    doc(id: string): {
      get(): Promise<{ exists: boolean; data(): StoredDocument | undefined }>;
    };
  };
}

const ServiceAccountSchema = z.object({
  project_id: z.string().min(1),
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export interface FirestoreConnectionOptions {
  projectId?: string;
  /** Service account key file contents, as JSON text. */
  credentialsJson?: string;
}

const parseServiceAccount = (credentialsJson: string) => {
  let raw: unknown;
  try {
    raw = JSON.parse(credentialsJson);
  } catch (error) {
    throw new Error('FIREBASE_CREDENTIALS_JSON is not valid JSON', { cause: error });
  }
  return ServiceAccountSchema.parse(raw);
};

/**
 * Initialise (once per process) the firebase-admin app and return its
 * Firestore client. Without explicit credentials the application default
 * credentials are used.
 */
export const connectFirestore = (options: FirestoreConnectionOptions): FirestoreLike => {
  const existing = getApps().find((app) => app.name === APP_NAME);
  let app: App;
  if (existing) {
    app = existing;
  } else if (options.credentialsJson) {
    const account = parseServiceAccount(options.credentialsJson);
    app = initializeApp(
      {
        credential: cert({
          projectId: account.project_id,
          clientEmail: account.client_email,
          privateKey: account.private_key,
        }),
        projectId: options.projectId ?? account.project_id,
      },
      APP_NAME
    );
  } else {
    app = initializeApp({ projectId: options.projectId }, APP_NAME);
  }
  logger.debug(`Connected Firestore client for project ${app.options.projectId ?? '(default)'}`);
  return getFirestore(app);
};

export class FirestoreDocumentStore implements DocumentStore {
  readonly name = 'firestore';

  constructor(
    private readonly firestore: FirestoreLike,
    private readonly timeoutMs = 10000
  ) {}

  async getDocument(
    collection: string,
    id: string,
    options: GetDocumentOptions = {}
  ): Promise<StoredDocument | null> {
    // A slash would address a nested path, never a document of this collection.
    if (!id || id.includes('/')) {
      return null;
    }
    const snapshot = await withTimeout(
      this.firestore.collection(collection).doc(id).get(),
      this.timeoutMs,
      `Firestore read ${collection}/${id}`,
      options.signal
    );
    if (!snapshot.exists) {
      return null;
    }
    return snapshot.data() ?? null;
  }
}
