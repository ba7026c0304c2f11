/**
 * StateBox configuration from the environment.
 *
 * | Variable                  | Default                   |
 * |---------------------------|---------------------------|
 * | STATEBOX_GITHUB_TOKEN     | GITHUB_TOKEN              |
 * | STATEBOX_REPO             | openshift/release-tests   |
 * | STATEBOX_BRANCH           | z-stream                  |
 * | STATEBOX_PATH_PREFIX      | _releases                 |
 * | STATEBOX_API_URL          | (GitHub public API)       |
 * | STATEBOX_LOCAL_DIR        | (unset: GitHub backend)   |
 */

import { validationError } from '../state_box/state_box.errors';
import { DEFAULT_PATH_PREFIX } from '../utils/release_utils';

export const DEFAULT_REPOSITORY = 'openshift/release-tests';
export const DEFAULT_BRANCH = 'z-stream';

export type GitHubBackendConfig = {
  kind: 'github';
  owner: string;
  repo: string;
  ref: string;
  token: string;
  apiUrl?: string;
};

export type FsBackendConfig = {
  kind: 'fs';
  rootDir: string;
};

export type StateBoxConfig = {
  backend: GitHubBackendConfig | FsBackendConfig;
  pathPrefix: string;
};

/**
 * Values that win over the environment (CLI flags).
 */
export type StateBoxConfigOverrides = {
  localDir?: string;
  repository?: string;
  branch?: string;
  pathPrefix?: string;
};

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Splits "owner/repo".
 * @throws StateBoxError VALIDATION for anything else
 */
export function parseRepository(value: string): { owner: string; repo: string } {
  const match = /^([\w.-]+)\/([\w.-]+)$/.exec(value.trim());
  if (!match?.[1] || !match[2]) {
    throw validationError('repository', `Invalid repository "${value}" (expected owner/repo)`, value);
  }
  return { owner: match[1], repo: match[2] };
}

/**
 * @throws StateBoxError VALIDATION when the GitHub backend is selected without a token,
 * or the repository is malformed
 */
export function loadStateBoxConfig(
  env: Env = process.env,
  overrides: StateBoxConfigOverrides = {},
): StateBoxConfig {
  const pathPrefix = overrides.pathPrefix ?? readEnv(env, 'STATEBOX_PATH_PREFIX') ?? DEFAULT_PATH_PREFIX;

  const localDir = overrides.localDir ?? readEnv(env, 'STATEBOX_LOCAL_DIR');
  if (localDir) {
    return { backend: { kind: 'fs', rootDir: localDir }, pathPrefix };
  }

  const { owner, repo } = parseRepository(overrides.repository ?? readEnv(env, 'STATEBOX_REPO') ?? DEFAULT_REPOSITORY);
  const token = readEnv(env, 'STATEBOX_GITHUB_TOKEN') ?? readEnv(env, 'GITHUB_TOKEN');
  if (!token) {
    throw validationError(
      'token',
      'GitHub token not configured. Set STATEBOX_GITHUB_TOKEN or GITHUB_TOKEN, or use a local directory',
    );
  }

  const apiUrl = readEnv(env, 'STATEBOX_API_URL');
  return {
    backend: {
      kind: 'github',
      owner,
      repo,
      ref: overrides.branch ?? readEnv(env, 'STATEBOX_BRANCH') ?? DEFAULT_BRANCH,
      token,
      ...(apiUrl ? { apiUrl } : {}),
    },
    pathPrefix,
  };
}
