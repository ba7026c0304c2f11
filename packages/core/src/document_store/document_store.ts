/**
 * VersionedDocumentStore Interface
 *
 * Abstraction for a remote store holding single text documents addressed by
 * path. Every read returns an opaque version token; writes take the token as
 * a precondition, which is the only coordination primitive StateBox relies on.
 *
 * Implementations:
 * - GitHubDocumentStore: GitHub Contents API (version = blob SHA)
 * - FsDocumentStore: local directory (version = content SHA-256)
 * - MemoryDocumentStore: in-memory for tests
 */

/**
 * A document as last seen by the reader.
 */
export type DocumentSnapshot = {
  content: string;
  /** Opaque version token, passed back as `expectedVersion` on write */
  version: string;
};

/**
 * Options for write operations.
 */
export type DocumentWriteOptions = {
  /** Commit message for backends that keep history */
  message?: string;
};

export interface VersionedDocumentStore {
  /**
   * Checks whether a document exists at `path`
   */
  exists(path: string): Promise<boolean>;

  /**
   * Reads a document
   * @returns The content and version, or null if nothing exists at `path`
   */
  read(path: string): Promise<DocumentSnapshot | null>;

  /**
   * Creates a new document
   * @returns The version token of the created document
   * @throws DocumentStoreError ALREADY_EXISTS when `path` is taken
   */
  create(path: string, content: string, opts?: DocumentWriteOptions): Promise<string>;

  /**
   * Replaces an existing document if it is still at `expectedVersion`
   * @returns The new version token
   * @throws DocumentStoreError VERSION_CONFLICT when the stored version differs
   */
  write(path: string, content: string, expectedVersion: string, opts?: DocumentWriteOptions): Promise<string>;
}
