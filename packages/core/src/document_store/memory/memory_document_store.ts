import { createHash } from 'crypto';
import type { VersionedDocumentStore, DocumentSnapshot } from '../document_store';
import { DocumentStoreError } from '../document_store.errors';

/**
 * Options for MemoryDocumentStore
 */
export interface MemoryDocumentStoreOptions {
  /** Initial documents by path */
  initial?: Map<string, string>;
}

type StoredDocument = {
  content: string;
  version: string;
};

/**
 * MemoryDocumentStore - In-memory implementation of VersionedDocumentStore
 *
 * Designed for unit tests and for running several StateBox instances against
 * one shared document inside a single process. Every write produces a new
 * version token, so stale writers are rejected exactly like on GitHub.
 *
 * @example
 * const store = new MemoryDocumentStore();
 * const v1 = await store.create('a.yaml', 'x: 1');
 * await store.write('a.yaml', 'x: 2', v1);
 * await store.write('a.yaml', 'x: 3', v1); // throws VERSION_CONFLICT
 */
export class MemoryDocumentStore implements VersionedDocumentStore {
  private readonly data: Map<string, StoredDocument> = new Map();
  private revision = 0;

  constructor(options: MemoryDocumentStoreOptions = {}) {
    for (const [path, content] of options.initial ?? []) {
      this.data.set(path, { content, version: this.nextVersion(path, content) });
    }
  }

  async exists(path: string): Promise<boolean> {
    return this.data.has(path);
  }

  async read(path: string): Promise<DocumentSnapshot | null> {
    const stored = this.data.get(path);
    return stored ? { content: stored.content, version: stored.version } : null;
  }

  async create(path: string, content: string): Promise<string> {
    if (this.data.has(path)) {
      throw new DocumentStoreError(`Document already exists: ${path}`, 'ALREADY_EXISTS');
    }
    const version = this.nextVersion(path, content);
    this.data.set(path, { content, version });
    return version;
  }

  async write(path: string, content: string, expectedVersion: string): Promise<string> {
    const stored = this.data.get(path);
    if (!stored) {
      throw new DocumentStoreError(`Not found: ${path}`, 'NOT_FOUND');
    }
    if (stored.version !== expectedVersion) {
      throw new DocumentStoreError(
        `Version conflict on ${path} (expected ${expectedVersion}, found ${stored.version})`,
        'VERSION_CONFLICT',
      );
    }
    const version = this.nextVersion(path, content);
    this.data.set(path, { content, version });
    return version;
  }

  // ─────────────────────────────────────────────────────────
  // Test Helpers (not part of VersionedDocumentStore)
  // ─────────────────────────────────────────────────────────

  /**
   * Overwrites a document unconditionally, as another writer would.
   * @returns The new version token
   */
  setContent(path: string, content: string): string {
    const version = this.nextVersion(path, content);
    this.data.set(path, { content, version });
    return version;
  }

  /** Returns the stored content, or null */
  getContent(path: string): string | null {
    return this.data.get(path)?.content ?? null;
  }

  /** Clears all documents */
  clear(): void {
    this.data.clear();
  }

  /** Returns the number of documents */
  size(): number {
    return this.data.size;
  }

  private nextVersion(path: string, content: string): string {
    this.revision += 1;
    return createHash('sha1').update(`${this.revision}:${path}:${content}`).digest('hex');
  }
}
