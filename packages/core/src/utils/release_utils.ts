/**
 * Release version helpers.
 *
 * @module utils/release_utils
 */

import { validationError } from '../state_box/state_box.errors';

const RELEASE_PATTERN = /^(\d+)\.(\d+)\.(\d+)(?:-[0-9A-Za-z.-]+)?$/;

export const DEFAULT_PATH_PREFIX = '_releases';

/**
 * Returns the major.minor line of a release ("4.19" for "4.19.1").
 * @throws StateBoxError VALIDATION when `release` is not X.Y.Z[-suffix]
 */
export function getYStream(release: string): string {
  const match = RELEASE_PATTERN.exec(release);
  if (!match) {
    throw validationError('release', `Invalid release version "${release}" (expected X.Y.Z)`, release);
  }
  return `${match[1]}.${match[2]}`;
}

/**
 * Path of a release's state document inside the store.
 *
 * @example
 * buildStatePath('4.19.1') // '_releases/4.19/statebox/4.19.1.yaml'
 */
export function buildStatePath(release: string, prefix: string = DEFAULT_PATH_PREFIX): string {
  const yStream = getYStream(release);
  const trimmed = prefix.replace(/^\/+|\/+$/g, '');
  return `${trimmed ? `${trimmed}/` : ''}${yStream}/statebox/${release}.yaml`;
}
