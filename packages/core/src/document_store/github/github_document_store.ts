/**
 * GitHubDocumentStore - GitHub Contents API implementation of VersionedDocumentStore
 *
 * Key behaviors:
 * - read: GET contents, base64 decode. 404 -> null.
 * - create: PUT contents without SHA. 422 (path taken) -> ALREADY_EXISTS.
 * - write: PUT contents with the expected blob SHA. 409/422 -> VERSION_CONFLICT.
 * - Version token is the blob SHA returned by GitHub.
 */

import type { Octokit } from '../../github';
import type { VersionedDocumentStore, DocumentSnapshot, DocumentWriteOptions } from '../document_store';
import type { GitHubDocumentStoreOptions } from './github_document_store.types';
import { isOctokitRequestError } from '../../github';
import { DocumentStoreError } from '../document_store.errors';

type WriteKind = 'create' | 'write';

/**
 * GitHub Contents API-backed document store.
 *
 * @example
 * ```typescript
 * const octokit = new Octokit({ auth: token });
 * const store = new GitHubDocumentStore(
 *   { owner: 'openshift', repo: 'release-tests', ref: 'z-stream' },
 *   octokit,
 * );
 * const snapshot = await store.read('_releases/4.19/statebox/4.19.1.yaml');
 * ```
 */
export class GitHubDocumentStore implements VersionedDocumentStore {
  private readonly owner: string;
  private readonly repo: string;
  private readonly ref: string;
  private readonly defaultMessage: string;
  private readonly octokit: Octokit;

  constructor(options: GitHubDocumentStoreOptions, octokit: Octokit) {
    this.owner = options.owner;
    this.repo = options.repo;
    this.ref = options.ref ?? 'main';
    this.defaultMessage = options.defaultMessage ?? 'Update state';
    this.octokit = octokit;
  }

  async exists(path: string): Promise<boolean> {
    return (await this.read(path)) !== null;
  }

  async read(path: string): Promise<DocumentSnapshot | null> {
    let data: Awaited<ReturnType<Octokit['rest']['repos']['getContent']>>['data'];
    try {
      ({ data } = await this.octokit.rest.repos.getContent({
        owner: this.owner,
        repo: this.repo,
        path,
        ref: this.ref,
      }));
    } catch (error: unknown) {
      if (isOctokitRequestError(error) && error.status === 404) {
        return null;
      }
      throw this.mapError(error, `GET ${path}`);
    }

    if (Array.isArray(data) || !('content' in data)) {
      throw new DocumentStoreError(`Not a file: ${path}`, 'INVALID_RESPONSE');
    }
    if (data.encoding !== 'base64') {
      throw new DocumentStoreError(
        `File content unavailable (encoding "${data.encoding}", file may exceed 1MB): ${path}`,
        'INVALID_RESPONSE',
      );
    }

    return {
      content: Buffer.from(data.content, 'base64').toString('utf-8'),
      version: data.sha,
    };
  }

  async create(path: string, content: string, opts?: DocumentWriteOptions): Promise<string> {
    return this.put('create', path, content, undefined, opts);
  }

  async write(path: string, content: string, expectedVersion: string, opts?: DocumentWriteOptions): Promise<string> {
    return this.put('write', path, content, expectedVersion, opts);
  }

  // ─────────────────────────────────────────────────────────
  // Private helpers
  // ─────────────────────────────────────────────────────────

  private async put(
    kind: WriteKind,
    path: string,
    content: string,
    sha: string | undefined,
    opts: DocumentWriteOptions | undefined,
  ): Promise<string> {
    let response: Awaited<ReturnType<Octokit['rest']['repos']['createOrUpdateFileContents']>>;
    try {
      response = await this.octokit.rest.repos.createOrUpdateFileContents({
        owner: this.owner,
        repo: this.repo,
        path,
        message: opts?.message ?? this.defaultMessage,
        content: Buffer.from(content, 'utf-8').toString('base64'),
        branch: this.ref,
        ...(sha !== undefined ? { sha } : {}),
      });
    } catch (error: unknown) {
      throw this.mapError(error, `PUT ${path}`, kind);
    }

    const newSha = response.data.content?.sha;
    if (!newSha) {
      throw new DocumentStoreError(`Response carries no blob SHA: PUT ${path}`, 'INVALID_RESPONSE');
    }
    return newSha;
  }

  /**
   * Maps Octokit errors to DocumentStoreError.
   * 422 means "path taken" on create and "stale SHA" on write.
   */
  private mapError(error: unknown, context: string, kind?: WriteKind): DocumentStoreError {
    if (!isOctokitRequestError(error)) {
      const message = error instanceof Error ? error.message : String(error);
      return new DocumentStoreError(`Network error: ${context}: ${message}`, 'NETWORK_ERROR');
    }

    const status = error.status;
    if (status === 401 || status === 403) {
      return new DocumentStoreError(`Permission denied: ${context}`, 'PERMISSION_DENIED', status);
    }
    if (status === 404) {
      return new DocumentStoreError(`Not found: ${context}`, 'NOT_FOUND', status);
    }
    if (status === 409) {
      return new DocumentStoreError(`Conflict: ${context}`, 'VERSION_CONFLICT', status);
    }
    if (status === 422) {
      return kind === 'create'
        ? new DocumentStoreError(`Document already exists: ${context}`, 'ALREADY_EXISTS', status)
        : new DocumentStoreError(`Conflict: ${context}`, 'VERSION_CONFLICT', status);
    }
    if (status >= 500) {
      return new DocumentStoreError(`Server error (${status}): ${context}`, 'SERVER_ERROR', status);
    }
    return new DocumentStoreError(`GitHub API error (${status}): ${context}`, 'SERVER_ERROR', status);
  }
}
