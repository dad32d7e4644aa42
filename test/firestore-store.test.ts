import { describe, expect, it, vi } from 'vitest';
import { CancelledError } from '../src/exceptions.js';
import { FirestoreDocumentStore, type FirestoreLike } from '../src/store/firestore.js';
import type { StoredDocument } from '../src/store/views.js';
import { TimeoutError } from '../src/utils.js';
import { rejectionOf } from './helpers.js';

const fakeFirestore = (
  read: (path: string) => Promise<{ exists: boolean; data(): StoredDocument | undefined }>
) => {
  const paths: string[] = [];
  const firestore: FirestoreLike = {
    collection: (collection) => ({
      doc: (id) => ({
        get: () => {
          paths.push(`${collection}/${id}`);
          return read(`${collection}/${id}`);
        },
      }),
    }),
  };
  return { firestore, paths };
};

const snapshot = (data?: StoredDocument) => ({ exists: data !== undefined, data: () => data });

describe('FirestoreDocumentStore', () => {
  it('returns the document data', async () => {
    const { firestore, paths } = fakeFirestore(async () => snapshot({ schema: '{}' }));
    const store = new FirestoreDocumentStore(firestore);

    await expect(store.getDocument('blueprints', 'medical')).resolves.toEqual({ schema: '{}' });
    expect(paths).toEqual(['blueprints/medical']);
  });

  it('returns null for a missing document', async () => {
    const { firestore } = fakeFirestore(async () => snapshot());
    const store = new FirestoreDocumentStore(firestore);

    await expect(store.getDocument('api_keys', 'unknown')).resolves.toBeNull();
  });

  it('never reads ids that would address another path', async () => {
    const { firestore, paths } = fakeFirestore(async () => snapshot({ active: true }));
    const store = new FirestoreDocumentStore(firestore);

    await expect(store.getDocument('api_keys', 'a/b')).resolves.toBeNull();
    await expect(store.getDocument('api_keys', '')).resolves.toBeNull();
    expect(paths).toEqual([]);
  });

  it('times out a slow read', async () => {
    vi.useFakeTimers();
    try {
      const { firestore } = fakeFirestore(() => new Promise(() => undefined));
      const store = new FirestoreDocumentStore(firestore, 50);

      const pending = rejectionOf(store.getDocument('blueprints', 'medical'));
      await vi.advanceTimersByTimeAsync(50);

      const error = await pending;
      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toHaveProperty('message', 'Firestore read blueprints/medical timed out after 50ms');
    } finally {
      vi.useRealTimers();
    }
  });

  it('stops waiting once the signal aborts', async () => {
    const { firestore } = fakeFirestore(() => new Promise(() => undefined));
    const store = new FirestoreDocumentStore(firestore);
    const controller = new AbortController();

    const pending = rejectionOf(
      store.getDocument('blueprints', 'medical', { signal: controller.signal })
    );
    controller.abort();

    expect(await pending).toBeInstanceOf(CancelledError);
  });
});
