export * from './types';
export * from './errors';
export { BufferedLogger } from './utils/logger';
export type { Logger, LoggerOptions } from './utils/logger';
export { formatTimestamp, formatOffset, toTimestamp } from './utils/formatters';
export {
  DETECTION_ORDER,
  detectProvider,
  initProvider,
  providerMetadataFromEnv,
  nameWithOwnerFromGitURL,
  parsePullRequestNumber,
} from './providers';
export type { ProviderDefinition, ProviderMetadata, ProviderName } from './providers';
export { RepositoryCommitResolver, StaticCommitResolver } from './metadata/commit-resolver';
export type { CommitResolver } from './metadata/commit-resolver';
export { buildMetadata } from './metadata/metadata';
export type { Metadata, BuildMetadataOptions } from './metadata/metadata';
export { marshalYAML } from './metadata/serializer';
export { getVersion, formatVersion } from './metadata/version';
export { buildArchive, discoverCoverage, discoverTestResults } from './archive/archive';
export type { ArchiveEntry, ArchiveContents } from './archive/archive';
export { ArchiveUploader } from './cloud/uploader';
export type { Uploader, UploaderOptions } from './cloud/uploader';
export { Submit, defaultCommitResolverFactory, parseSubmitArgs } from './submit/submit';
export type { CommitResolverFactory, SubmitOptions } from './submit/submit';
