/**
 * GitHubDocumentStore Types
 */

/**
 * Options for constructing a GitHubDocumentStore instance.
 */
export type GitHubDocumentStoreOptions = {
  /** GitHub repository owner (user or organization) */
  owner: string;
  /** GitHub repository name */
  repo: string;
  /** Branch to read/write. Default: 'main' */
  ref?: string;
  /** Commit message used when a write passes none. Default: 'Update state' */
  defaultMessage?: string;
};
