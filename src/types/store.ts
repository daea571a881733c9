/**
 * Document Store Type Definitions
 *
 * Contract of the version-controlled document store the service persists to,
 * and the shapes the record store adapter exchanges with its callers.
 *
 * @module types/store
 */

/**
 * Result of reading a file from the document store
 */
export type ReadFileResult =
  | {
      readonly found: true;
      readonly content: string;
      /**
       * Opaque token identifying the version that was read
       */
      readonly versionTag: string;
    }
  | { readonly found: false };

/**
 * Successful write; carries the version tag of the newly written content
 */
export interface WriteFileSuccess {
  readonly versionTag: string;
}

/**
 * Document store contract
 *
 * Implementations throw `StoreTransportError` when the store cannot be
 * reached and `StoreConflictError` when a conditional write loses the race.
 */
export interface DocumentStore {
  /**
   * Read a file; a missing file is not an error
   */
  readFile(path: string): Promise<ReadFileResult>;

  /**
   * Replace a file, provided its current version still matches `versionTag`
   */
  writeFile(path: string, content: string, versionTag: string, message: string): Promise<WriteFileSuccess>;

  /**
   * Create a file that must not exist yet
   */
  createFile(path: string, content: string, message: string): Promise<WriteFileSuccess>;
}

/**
 * A decoded collection and the version it was read at
 *
 * `versionTag` is null when the collection does not exist yet.
 */
export interface CollectionSnapshot<T> {
  readonly rows: readonly T[];
  readonly versionTag: string | null;
}

/**
 * Outcome of writing a collection back to the store
 */
export type CollectionWriteResult =
  | { readonly status: 'success'; readonly versionTag: string }
  | { readonly status: 'conflict'; readonly message: string }
  | { readonly status: 'transport_error'; readonly message: string };
