/**
 * Error codes for VersionedDocumentStore operations.
 * Semantic codes that abstract the backend (HTTP status, errno, ...).
 */
export type DocumentStoreErrorCode =
  | 'VERSION_CONFLICT'
  | 'ALREADY_EXISTS'
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'INVALID_PATH'
  | 'INVALID_RESPONSE';

/**
 * Typed error for VersionedDocumentStore operations.
 */
export class DocumentStoreError extends Error {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: DocumentStoreErrorCode,
    /** HTTP status code (if applicable) */
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'DocumentStoreError';
    Object.setPrototypeOf(this, DocumentStoreError.prototype);
  }
}

/**
 * True for the two ways a backend reports that another writer got there first:
 * a stale version on write, or an existing document on create.
 */
export function isVersionConflict(error: unknown): error is DocumentStoreError {
  return (
    error instanceof DocumentStoreError &&
    (error.code === 'VERSION_CONFLICT' || error.code === 'ALREADY_EXISTS')
  );
}
