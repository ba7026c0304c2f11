export { loadStateBoxConfig, parseRepository, DEFAULT_REPOSITORY, DEFAULT_BRANCH } from './config';
export type { StateBoxConfig, StateBoxConfigOverrides, GitHubBackendConfig, FsBackendConfig } from './config';
