import type { Clock, CommitSource, Env, Timestamp, Version } from '../types';
import { describeError } from '../errors';
import { providerMetadataFromEnv } from '../providers';
import type { ProviderMetadata } from '../providers';
import { toTimestamp } from '../utils/formatters';
import type { Logger } from '../utils/logger';
import type { CommitResolver } from './commit-resolver';

/**
 * Everything reported about one set of test results: which CI provider ran
 * the build, the commit under test, when, and by which reporter.
 */
export interface Metadata {
  authoredAt?: Timestamp;
  authorEmail: string;
  authorName: string;
  branch: string;
  buildURL: string;
  check: string;
  ciProvider: string;
  commitMessage: string;
  commitMetadataSource: CommitSource;
  commitSHA: string;
  committedAt?: Timestamp;
  committerEmail: string;
  committerName: string;
  quotaID: string;
  repoNameWithOwner: string;
  reporterOS: string;
  reporterVersion: string;
  tags: string[];
  timestamp: Timestamp;
  treeSHA: string;
  /** False when the commit lookup failed and only the SHA is known */
  commitResolved: boolean;
  provider: ProviderMetadata;
}

export interface BuildMetadataOptions {
  version: Version;
  env: Env;
  tags?: string[];
  quotaID?: string;
  commitResolver: CommitResolver;
  now: Clock;
  logger: Logger;
}

type CommitFields = Pick<
  Metadata,
  | 'authoredAt'
  | 'authorEmail'
  | 'authorName'
  | 'commitMessage'
  | 'commitSHA'
  | 'committedAt'
  | 'committerEmail'
  | 'committerName'
  | 'treeSHA'
  | 'commitResolved'
>;

const LOOKUP_FAILURE_BANNER = [
  'Test results will not be analyzed for this build. Please get in touch at https://buildpulse.io/contact so we can resolve this problem together.',
  'In a future release, this issue will become a fatal error with a nonzero exit code.',
];

function logLookupFailure(logger: Logger, err: unknown): void {
  logger.log('❌');
  logger.log(`❌ Commit lookup unsuccessful: ${describeError(err)}`);
  for (const line of LOOKUP_FAILURE_BANNER) {
    logger.log('❌');
    logger.log(`❌ ${line}`);
  }
  logger.log('❌');
}

/**
 * Look up the commit under test. A failed lookup is not fatal: it is logged
 * and the record carries only the SHA.
 */
async function resolveCommit(resolver: CommitResolver, sha: string, logger: Logger): Promise<CommitFields> {
  try {
    const commit = await resolver.lookup(sha);
    return {
      authoredAt: commit.authoredAt,
      authorEmail: commit.authorEmail,
      authorName: commit.authorName,
      commitMessage: commit.message.trim(),
      commitSHA: commit.sha,
      committedAt: commit.committedAt,
      committerEmail: commit.committerEmail,
      committerName: commit.committerName,
      treeSHA: commit.treeSHA,
      commitResolved: true,
    };
  } catch (err) {
    logLookupFailure(logger, err);
    return {
      authorEmail: '',
      authorName: '',
      commitMessage: '',
      commitSHA: sha,
      committerEmail: '',
      committerName: '',
      treeSHA: '',
      commitResolved: false,
    };
  }
}

/**
 * Assemble the metadata for this build.
 *
 * Throws when the provider's environment is incomplete or malformed. Commit
 * lookup failures are logged and never thrown.
 */
export async function buildMetadata(options: BuildMetadataOptions): Promise<Metadata> {
  const { version, env, commitResolver, now, logger } = options;

  const provider = providerMetadataFromEnv(env, logger);
  const commit = await resolveCommit(commitResolver, provider.commitSHA, logger);

  return {
    ...commit,
    branch: provider.branch,
    buildURL: provider.buildURL,
    check: env.BUILDPULSE_CHECK_NAME || provider.name,
    ciProvider: provider.name,
    commitMetadataSource: commitResolver.source(),
    quotaID: options.quotaID ?? '',
    repoNameWithOwner: provider.repoNameWithOwner,
    reporterOS: version.os,
    reporterVersion: version.number,
    tags: options.tags ?? [],
    timestamp: toTimestamp(now()),
    provider,
  };
}
