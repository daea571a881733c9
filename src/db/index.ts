/**
 * Document Store Client Module
 *
 * Persists collections as files in a GitHub repository through the Contents
 * API. The blob `sha` GitHub returns for a file is used as its version tag:
 * updates must supply the sha that was read, so a concurrent writer makes the
 * update fail instead of being overwritten.
 *
 * @module db
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';

import { getStoreConfig, type StoreConfig } from '../config/store.js';
import type { DocumentStore, ReadFileResult, WriteFileSuccess } from '../types/store.js';
import { StoreConflictError, StoreTransportError, getErrorMessage } from '../utils/errors.js';

/**
 * File entry returned by `GET /repos/{owner}/{repo}/contents/{path}`
 */
interface ContentsFile {
  readonly type: 'file';
  readonly sha: string;
  readonly encoding: string;
  readonly content: string;
}

function isContentsFile(value: unknown): value is ContentsFile {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'file' &&
    'sha' in value &&
    typeof value.sha === 'string' &&
    'encoding' in value &&
    typeof value.encoding === 'string' &&
    'content' in value &&
    typeof value.content === 'string'
  );
}

/**
 * Extract the new blob sha from a `PUT` response body
 */
function getCommittedSha(value: unknown): string | null {
  if (typeof value !== 'object' || value === null || !('content' in value)) {
    return null;
  }
  const content = value.content;
  if (typeof content !== 'object' || content === null || !('sha' in content)) {
    return null;
  }
  return typeof content.sha === 'string' ? content.sha : null;
}

function encodeBase64(content: string): string {
  return Buffer.from(content, 'utf-8').toString('base64');
}

function decodeBase64(content: string): string {
  // GitHub wraps the payload at 60 characters; Buffer skips the newlines
  return Buffer.from(content, 'base64').toString('utf-8');
}

/**
 * GitHub Contents API document store
 */
export class GitHubDocumentStore implements DocumentStore {
  private readonly client: AxiosInstance;

  constructor(private readonly config: StoreConfig = getStoreConfig()) {
    this.client = axios.create({
      baseURL: config.apiUrl,
      timeout: config.timeoutMs,
      headers: {
        Accept: 'application/vnd.github+json',
        Authorization: `token ${config.token}`,
        'X-GitHub-Api-Version': '2022-11-28',
      },
      // Status codes are interpreted below; only network failures throw
      validateStatus: () => true,
    });
  }

  private contentsUrl(path: string): string {
    const encodedPath = path
      .split('/')
      .filter((segment) => segment.length > 0)
      .map(encodeURIComponent)
      .join('/');
    return `/repos/${encodeURIComponent(this.config.owner)}/${encodeURIComponent(this.config.repo)}/contents/${encodedPath}`;
  }

  async readFile(path: string): Promise<ReadFileResult> {
    const startTime = Date.now();

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(this.contentsUrl(path), {
        params: this.config.branch ? { ref: this.config.branch } : undefined,
      });
    } catch (error) {
      console.error('[GITHUB_STORE] Read request failed:', {
        path,
        error: getErrorMessage(error),
        timestamp: new Date().toISOString(),
      });
      throw new StoreTransportError(`Failed to read ${path}: ${getErrorMessage(error)}`, {
        details: { path },
        cause: error,
      });
    }

    if (response.status === 404) {
      console.log('[GITHUB_STORE] File not found:', { path, timestamp: new Date().toISOString() });
      return { found: false };
    }

    if (response.status !== 200) {
      console.error('[GITHUB_STORE] Unexpected read status:', {
        path,
        status: response.status,
        timestamp: new Date().toISOString(),
      });
      throw new StoreTransportError(`Failed to read ${path}: HTTP ${response.status}`, {
        details: { path, status: response.status },
      });
    }

    if (!isContentsFile(response.data)) {
      throw new StoreTransportError(`Unexpected contents response for ${path}`, { details: { path } });
    }

    // Files over 1 MB come back with encoding "none" and no content
    if (response.data.encoding !== 'base64') {
      throw new StoreTransportError(
        `Unsupported contents encoding "${response.data.encoding}" for ${path}`,
        { details: { path, encoding: response.data.encoding } }
      );
    }

    console.log('[GITHUB_STORE] File read:', {
      path,
      sha: response.data.sha,
      executionTimeMs: Date.now() - startTime,
      timestamp: new Date().toISOString(),
    });

    return {
      found: true,
      content: decodeBase64(response.data.content),
      versionTag: response.data.sha,
    };
  }

  async writeFile(path: string, content: string, versionTag: string, message: string): Promise<WriteFileSuccess> {
    return this.putFile(path, content, message, versionTag);
  }

  async createFile(path: string, content: string, message: string): Promise<WriteFileSuccess> {
    return this.putFile(path, content, message, null);
  }

  private async putFile(
    path: string,
    content: string,
    message: string,
    versionTag: string | null
  ): Promise<WriteFileSuccess> {
    const startTime = Date.now();
    const body: Record<string, string> = {
      message,
      content: encodeBase64(content),
    };
    if (versionTag !== null) {
      body.sha = versionTag;
    }
    if (this.config.branch) {
      body.branch = this.config.branch;
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.put<unknown>(this.contentsUrl(path), body);
    } catch (error) {
      console.error('[GITHUB_STORE] Write request failed:', {
        path,
        error: getErrorMessage(error),
        timestamp: new Date().toISOString(),
      });
      throw new StoreTransportError(`Failed to write ${path}: ${getErrorMessage(error)}`, {
        details: { path },
        cause: error,
      });
    }

    // 409: sha does not match the current blob; 422: sha missing for an
    // existing file, i.e. a create that lost the race
    if (response.status === 409 || response.status === 422) {
      console.warn('[GITHUB_STORE] Write rejected as stale:', {
        path,
        status: response.status,
        expectedSha: versionTag,
        timestamp: new Date().toISOString(),
      });
      throw new StoreConflictError(
        versionTag === null
          ? `${path} already exists`
          : `${path} was modified since version ${versionTag} was read`,
        { details: { path, status: response.status } }
      );
    }

    if (response.status !== 200 && response.status !== 201) {
      console.error('[GITHUB_STORE] Unexpected write status:', {
        path,
        status: response.status,
        timestamp: new Date().toISOString(),
      });
      throw new StoreTransportError(`Failed to write ${path}: HTTP ${response.status}`, {
        details: { path, status: response.status },
      });
    }

    const sha = getCommittedSha(response.data);
    if (!sha) {
      throw new StoreTransportError(`Unexpected commit response for ${path}`, { details: { path } });
    }

    console.log('[GITHUB_STORE] File written:', {
      path,
      created: versionTag === null,
      sha,
      executionTimeMs: Date.now() - startTime,
      timestamp: new Date().toISOString(),
    });

    return { versionTag: sha };
  }
}

/**
 * Singleton document store
 */
let documentStoreInstance: DocumentStore | null = null;

/**
 * Get the process-wide document store, creating the GitHub client on first use
 */
export function getDocumentStore(): DocumentStore {
  if (!documentStoreInstance) {
    documentStoreInstance = new GitHubDocumentStore();
  }
  return documentStoreInstance;
}
