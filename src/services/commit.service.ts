/**
 * Versioned Commit Module
 *
 * The read-version-write sequence every mutation goes through: re-read the
 * collection, refuse to write if it moved on since the snapshot the change was
 * validated against, write with the fresh version tag, then drop the cached
 * snapshot whatever the outcome.
 *
 * @module services/commit
 */

import type { ServiceErrorCode } from '../types/index.js';
import type { CollectionWriteResult } from '../types/store.js';
import type { SnapshotCache } from './snapshot.service.js';

/**
 * Anything read together with the version it was read at
 */
export interface Versioned {
  readonly versionTag: string | null;
}

export interface CommitOptions<S extends Versioned> {
  /**
   * Collection name used in messages
   */
  readonly collection: string;

  /**
   * Version the change was validated against
   */
  readonly expectedVersion: string | null;

  readonly read: () => Promise<S>;

  /**
   * Write the changed collection, given its freshly read state
   */
  readonly write: (current: S) => Promise<CollectionWriteResult>;

  readonly cache: SnapshotCache;

  readonly correlationId?: string;
}

/**
 * Run a versioned commit
 *
 * @throws {StoreTransportError} If the re-read cannot reach the store
 * @throws {RecordFormatError} If the re-read finds malformed content
 */
export async function commitChange<S extends Versioned>(options: CommitOptions<S>): Promise<CollectionWriteResult> {
  try {
    const current = await options.read();

    if (current.versionTag !== options.expectedVersion) {
      console.warn('[COMMIT] Collection changed since snapshot was loaded:', {
        collection: options.collection,
        expectedVersion: options.expectedVersion,
        currentVersion: current.versionTag,
        correlationId: options.correlationId,
        timestamp: new Date().toISOString(),
      });

      return {
        status: 'conflict',
        message: `${options.collection} changed since it was loaded; reload and try again`,
      };
    }

    return await options.write(current);
  } finally {
    options.cache.invalidate();
  }
}

/**
 * Service error code for a failed write
 */
export function writeFailureCode(result: Exclude<CollectionWriteResult, { status: 'success' }>): ServiceErrorCode {
  return result.status === 'conflict' ? 'STORE_CONFLICT' : 'STORE_TRANSPORT_ERROR';
}
