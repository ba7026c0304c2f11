import * as fs from 'fs/promises';
import * as path from 'path';
import { createHash, randomBytes } from 'crypto';
import type { VersionedDocumentStore, DocumentSnapshot } from '../document_store';
import { DocumentStoreError } from '../document_store.errors';

/**
 * Options for FsDocumentStore
 */
export interface FsDocumentStoreOptions {
  /** Directory that document paths are resolved against */
  rootDir: string;
}

// fs errors may come from another realm (Jest sandboxes), so match on shape
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

function versionOf(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * FsDocumentStore - Filesystem implementation of VersionedDocumentStore
 *
 * Version token is the SHA-256 of the file content. `create` uses an exclusive
 * open; `write` compares the current hash, then replaces the file through a
 * temp file and rename. The compare and the rename are two steps, so this
 * backend is only safe for writers on a single host that do not race within
 * that window.
 *
 * @example
 * const store = new FsDocumentStore({ rootDir: '/tmp/release-state' });
 * const snapshot = await store.read('_releases/4.19/statebox/4.19.1.yaml');
 */
export class FsDocumentStore implements VersionedDocumentStore {
  private readonly rootDir: string;

  constructor(options: FsDocumentStoreOptions) {
    this.rootDir = path.resolve(options.rootDir);
  }

  async exists(docPath: string): Promise<boolean> {
    return (await this.read(docPath)) !== null;
  }

  async read(docPath: string): Promise<DocumentSnapshot | null> {
    const filePath = this.resolvePath(docPath);
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      return { content, version: versionOf(content) };
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw this.mapFsError(error, `read ${docPath}`);
    }
  }

  async create(docPath: string, content: string): Promise<string> {
    const filePath = this.resolvePath(docPath);
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        throw new DocumentStoreError(`Document already exists: ${docPath}`, 'ALREADY_EXISTS');
      }
      throw this.mapFsError(error, `create ${docPath}`);
    }
    return versionOf(content);
  }

  async write(docPath: string, content: string, expectedVersion: string): Promise<string> {
    const current = await this.read(docPath);
    if (!current) {
      throw new DocumentStoreError(`Not found: ${docPath}`, 'NOT_FOUND');
    }
    if (current.version !== expectedVersion) {
      throw new DocumentStoreError(
        `Version conflict on ${docPath} (expected ${expectedVersion.slice(0, 8)}, found ${current.version.slice(0, 8)})`,
        'VERSION_CONFLICT',
      );
    }

    const filePath = this.resolvePath(docPath);
    const tempPath = `${filePath}.${randomBytes(6).toString('hex')}.tmp`;
    try {
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw this.mapFsError(error, `write ${docPath}`);
    }
    return versionOf(content);
  }

  /**
   * Resolves a document path inside rootDir.
   * Rejects absolute paths and `..` segments.
   */
  private resolvePath(docPath: string): string {
    if (!docPath || path.isAbsolute(docPath) || docPath.split(/[\/\\]/).includes('..')) {
      throw new DocumentStoreError(`Invalid document path: "${docPath}"`, 'INVALID_PATH');
    }
    return path.join(this.rootDir, docPath);
  }

  private mapFsError(error: unknown, context: string): DocumentStoreError {
    if (isErrnoException(error) && (error.code === 'EACCES' || error.code === 'EPERM')) {
      return new DocumentStoreError(`Permission denied: ${context}`, 'PERMISSION_DENIED');
    }
    const message = error instanceof Error ? error.message : String(error);
    return new DocumentStoreError(`Filesystem error: ${context}: ${message}`, 'SERVER_ERROR');
  }
}
