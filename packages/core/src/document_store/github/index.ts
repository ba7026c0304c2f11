/**
 * GitHub DocumentStore implementation
 */
export { GitHubDocumentStore } from './github_document_store';
export type { GitHubDocumentStoreOptions } from './github_document_store.types';
