import * as fs from 'fs';
import * as path from 'path';
import type { Clock, Commit, Env, Version } from '../types';
import { ArgumentError, describeError } from '../errors';
import { buildArchive, discoverCoverage, discoverTestResults } from '../archive/archive';
import { ArchiveUploader } from '../cloud/uploader';
import type { Uploader, UploaderOptions } from '../cloud/uploader';
import { RepositoryCommitResolver, StaticCommitResolver } from '../metadata/commit-resolver';
import type { CommitResolver } from '../metadata/commit-resolver';
import { buildMetadata } from '../metadata/metadata';
import { marshalYAML } from '../metadata/serializer';
import { formatVersion } from '../metadata/version';
import { BufferedLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

/** Creates the commit resolvers `submit` chooses between */
export interface CommitResolverFactory {
  fromRepository(repoPath: string, logger: Logger): Promise<CommitResolver>;
  fromStaticValue(commit: Partial<Commit>): CommitResolver;
}

export const defaultCommitResolverFactory: CommitResolverFactory = {
  fromRepository: (repoPath, logger) => RepositoryCommitResolver.open(repoPath, logger),
  fromStaticValue: (commit) => new StaticCommitResolver(commit),
};

export interface SubmitOptions {
  version: Version;
  logger?: Logger;                 // Default: BufferedLogger echoing to stdout
  now?: Clock;                     // Default: () => new Date()
  cwd?: string;                    // Default: process.cwd(); base for coverage globs
  createUploader?: (options: UploaderOptions, logger: Logger) => Uploader;
}

/** Flags accepted by `submit`; each takes a value */
const FLAGS = ['--account-id', '--repository-id', '--repository-dir', '--tree', '--coverage-files', '--tags', '--quota-id'] as const;
type FlagName = (typeof FLAGS)[number];

function isFlagName(name: string): name is FlagName {
  return FLAGS.some((flag) => flag === name);
}

const TREE_SHA = /^[0-9a-f]{40}$/;

/**
 * Split `submit` arguments into leading paths and `--flag value` /
 * `--flag=value` pairs.
 */
export function parseSubmitArgs(args: string[]): { paths: string[]; flags: Map<FlagName, string> } {
  const paths: string[] = [];
  let i = 0;
  while (i < args.length && !args[i].startsWith('-')) {
    paths.push(args[i]);
    i++;
  }

  const flags = new Map<FlagName, string>();
  for (; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    if (!isFlagName(name)) {
      throw new ArgumentError(`flag provided but not defined: ${name}`);
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else if (i + 1 < args.length) {
      value = args[++i];
    } else {
      throw new ArgumentError(`flag needs an argument: ${name}`);
    }
    flags.set(name, value);
  }

  return { paths, flags };
}

function parseID(flags: Map<FlagName, string>, name: FlagName): number {
  const raw = flags.get(name);
  if (raw === undefined || raw === '') {
    throw new ArgumentError(`missing required flag: ${name}`);
  }

  const value = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(value) || value === 0) {
    throw new ArgumentError(`invalid value "${raw}" for flag ${name}: should be a positive integer`);
  }
  return value;
}

function requireEnv(env: Env, variable: string): string {
  const value = env[variable];
  if (!value) {
    throw new ArgumentError(`missing required environment variable: ${variable}`);
  }
  return value;
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function splitList(value: string | undefined): string[] {
  return (value ?? '').split(/\s+/).filter((item) => item !== '');
}

/**
 * The `submit` command: gather results, describe the build, package both and
 * upload the package.
 */
export class Submit {
  private readonly version: Version;
  private readonly logger: Logger;
  private readonly now: Clock;
  private readonly cwd: string;
  private readonly createUploader: (options: UploaderOptions, logger: Logger) => Uploader;

  private env: Env = {};
  private paths: string[] = [];
  private coveragePatterns: string[] = [];
  private tags: string[] = [];
  private quotaID = '';
  private uploaderOptions?: UploaderOptions;
  private commitResolver?: CommitResolver;

  constructor(options: SubmitOptions) {
    this.version = options.version;
    this.logger = options.logger ?? new BufferedLogger();
    this.now = options.now ?? (() => new Date());
    this.cwd = options.cwd ?? process.cwd();
    this.createUploader = options.createUploader ?? ((opts, logger) => new ArchiveUploader(opts, logger));

    this.logger.log(`Current version: ${formatVersion(this.version)}`);
    this.logger.log('Initiating `submit`');
  }

  /**
   * Validate arguments and environment. Throws ArgumentError describing the
   * first problem found.
   */
  async init(args: string[], env: Env, resolverFactory: CommitResolverFactory = defaultCommitResolverFactory): Promise<void> {
    this.logger.log(`args: ${JSON.stringify(args)}`);
    this.logger.log(`working directory: ${this.cwd}`);

    const { paths, flags } = parseSubmitArgs(args);
    if (paths.length === 0) {
      throw new ArgumentError('missing TEST_RESULTS_DIR');
    }
    for (const p of paths) {
      if (!isDirectory(p)) {
        throw new ArgumentError(`path is not a directory: ${p}`);
      }
    }

    const accountID = parseID(flags, '--account-id');
    const repositoryID = parseID(flags, '--repository-id');
    const accessKeyID = requireEnv(env, 'BUILDPULSE_ACCESS_KEY_ID');
    const secretAccessKey = requireEnv(env, 'BUILDPULSE_SECRET_ACCESS_KEY');

    const tree = flags.get('--tree');
    if (flags.has('--repository-dir') && tree !== undefined) {
      throw new ArgumentError('invalid use of flag --repository-dir with flag --tree: use one or the other, but not both');
    }
    if (tree !== undefined && !TREE_SHA.test(tree)) {
      throw new ArgumentError(`invalid value "${tree}" for flag --tree: should be a 40-character SHA-1 hash`);
    }

    const repositoryDir = flags.get('--repository-dir') ?? '.';
    if (!isDirectory(repositoryDir)) {
      throw new ArgumentError(`invalid value for flag --repository-dir: ${repositoryDir} is not a directory`);
    }

    if (tree !== undefined) {
      this.commitResolver = resolverFactory.fromStaticValue({ treeSHA: tree });
    } else {
      try {
        this.commitResolver = await resolverFactory.fromRepository(repositoryDir, this.logger);
      } catch (err) {
        // An unusable checkout shouldn't stop the upload; carry on without commit details
        const warning = `invalid value for flag --repository-dir: ${describeError(err)}`;
        this.logger.log(`warning: ${warning}`);
        console.warn(warning);
        this.commitResolver = resolverFactory.fromStaticValue({});
      }
    }

    this.env = env;
    this.paths = paths;
    this.coveragePatterns = splitList(flags.get('--coverage-files'));
    this.tags = splitList(flags.get('--tags'));
    this.quotaID = flags.get('--quota-id') ?? '';
    this.uploaderOptions = {
      accountID,
      repositoryID,
      credentials: { accessKeyID, secretAccessKey },
      bucket: env.BUILDPULSE_BUCKET || undefined,
    };
  }

  /**
   * Package the results with their metadata and upload them. Returns the key
   * of the uploaded archive.
   */
  async run(): Promise<string> {
    if (!this.commitResolver || !this.uploaderOptions) {
      throw new Error('Submit.run() called before init()');
    }

    const metadata = await buildMetadata({
      version: this.version,
      env: this.env,
      tags: this.tags,
      quotaID: this.quotaID,
      commitResolver: this.commitResolver,
      now: this.now,
      logger: this.logger,
    });
    const document = marshalYAML(metadata);

    const files = [
      ...(await discoverTestResults(this.paths)),
      ...(await discoverCoverage(this.coveragePatterns, this.cwd)),
    ];
    this.logger.log(`Found ${files.length} file(s) to submit`);

    const archivePath = await buildArchive({ metadata: document, log: this.logger.text(), files });
    try {
      return await this.createUploader(this.uploaderOptions, this.logger).upload(archivePath);
    } finally {
      fs.rmSync(path.dirname(archivePath), { recursive: true, force: true });
    }
  }
}
