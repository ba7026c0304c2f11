/**
 * Shared helpers for the GitHub-backed implementations.
 *
 * Octokit is injected as an instance, never constructed here, so tests can
 * pass a stub and callers share auth/base-URL config.
 */

export type { Octokit } from '@octokit/rest';

/**
 * Type guard: checks if an error is an Octokit RequestError (duck-typing).
 * Avoids runtime import of ESM-only @octokit/request-error.
 */
export function isOctokitRequestError(error: unknown): error is Error & { status: number } {
  return error instanceof Error && 'status' in error && typeof error.status === 'number';
}
