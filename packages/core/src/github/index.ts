export { isOctokitRequestError } from './github.types';
export type { Octokit } from './github.types';
