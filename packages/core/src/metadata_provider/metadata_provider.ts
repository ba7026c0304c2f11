/**
 * ReleaseMetadataProvider
 *
 * Source of the initial metadata written into a release's state document on
 * its first save (ticket, advisories, release date, candidate builds, ...).
 * Production callers back it with their release configuration; the static
 * provider covers the CLI and tests.
 */

import type { StateMetadata } from '../state_box/state_box.types';

export interface ReleaseMetadataProvider {
  getReleaseMetadata(release: string): Promise<StateMetadata>;
}

/**
 * Metadata keys every new document starts with.
 */
export function defaultMetadata(): StateMetadata {
  return {
    jiraTicket: null,
    advisoryIds: {},
    releaseDate: null,
    candidateBuilds: {},
    shipmentMr: null,
  };
}

/**
 * Serves the same metadata for every release, layered over defaultMetadata().
 *
 * @example
 * const provider = new StaticReleaseMetadataProvider({ jiraTicket: 'ART-1234' });
 */
export class StaticReleaseMetadataProvider implements ReleaseMetadataProvider {
  constructor(private readonly values: StateMetadata = {}) { }

  async getReleaseMetadata(): Promise<StateMetadata> {
    return structuredClone({ ...defaultMetadata(), ...this.values });
  }
}
