/**
 * DocumentStore - versioned single-document persistence
 *
 * Interface, error type and the three backends.
 */
export type { VersionedDocumentStore, DocumentSnapshot, DocumentWriteOptions } from './document_store';
export { DocumentStoreError, isVersionConflict } from './document_store.errors';
export type { DocumentStoreErrorCode } from './document_store.errors';

export { MemoryDocumentStore } from './memory/memory_document_store';
export type { MemoryDocumentStoreOptions } from './memory/memory_document_store';
export { FsDocumentStore } from './fs/fs_document_store';
export type { FsDocumentStoreOptions } from './fs/fs_document_store';
export { GitHubDocumentStore } from './github';
export type { GitHubDocumentStoreOptions } from './github';
