import { Octokit } from '@octokit/rest';
import type { StateBoxConfig } from '../config/config';
import type { VersionedDocumentStore } from '../document_store/document_store';
import type { StateBoxOptions } from '../state_box/state_box.types';
import { FsDocumentStore } from '../document_store/fs/fs_document_store';
import { GitHubDocumentStore } from '../document_store/github/github_document_store';
import { StateBox } from '../state_box/state_box';

/**
 * Builds the document store selected by `config`.
 */
export function createDocumentStore(config: StateBoxConfig): VersionedDocumentStore {
  const { backend } = config;
  if (backend.kind === 'fs') {
    return new FsDocumentStore({ rootDir: backend.rootDir });
  }

  const octokit = new Octokit({
    auth: backend.token,
    userAgent: 'statebox',
    ...(backend.apiUrl ? { baseUrl: backend.apiUrl } : {}),
  });
  return new GitHubDocumentStore(
    { owner: backend.owner, repo: backend.repo, ref: backend.ref },
    octokit,
  );
}

/**
 * StateBox for `release` on the configured backend.
 *
 * @example
 * const box = createStateBox('4.19.1', loadStateBoxConfig());
 */
export function createStateBox(
  release: string,
  config: StateBoxConfig,
  options: Omit<StateBoxOptions, 'release' | 'store' | 'pathPrefix'> = {},
): StateBox {
  return new StateBox({
    ...options,
    release,
    store: createDocumentStore(config),
    pathPrefix: config.pathPrefix,
  });
}
