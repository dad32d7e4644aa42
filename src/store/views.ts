export type StoredDocument = Record<string, unknown>;

export interface GetDocumentOptions {
  signal?: AbortSignal;
}

/**
 * Read-only key/value access to the remote registry holding protected
 * blueprints and API keys.
 */
export interface DocumentStore {
  readonly name: string;
  /** Resolves to null when the document does not exist. */
  getDocument(
    collection: string,
    id: string,
    options?: GetDocumentOptions
  ): Promise<StoredDocument | null>;
}
