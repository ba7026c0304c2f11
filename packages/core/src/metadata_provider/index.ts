export { StaticReleaseMetadataProvider, defaultMetadata } from './metadata_provider';
export type { ReleaseMetadataProvider } from './metadata_provider';
