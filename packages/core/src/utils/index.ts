export { extractStartTimestamp, extractEndTimestamp, maskSensitiveData, EMAIL_REDACTED } from './text_utils';
export { formatTimestamp, isValidTimestamp, systemClock } from './time_utils';
export type { Clock } from './time_utils';
export { getYStream, buildStatePath, DEFAULT_PATH_PREFIX } from './release_utils';
