import * as fs from 'fs';
import * as path from 'path';
import * as git from 'isomorphic-git';
import type { Commit, CommitSource } from '../types';
import { CommitNotFoundError, RepositoryNotFoundError, describeError } from '../errors';
import { toTimestamp } from '../utils/formatters';
import type { Logger } from '../utils/logger';

/**
 * Looks up the details of a commit by its SHA.
 */
export interface CommitResolver {
  lookup(sha: string): Promise<Commit>;
  source(): CommitSource;
}

/** Author or committer as recorded in a git commit object */
interface GitSignature {
  name: string;
  email: string;
  timestamp: number;       // seconds since the epoch
  timezoneOffset: number;  // minutes, sign as in Date#getTimezoneOffset
}

function signatureTimestamp(signature: GitSignature) {
  // `|| 0` keeps UTC from coming out as -0
  return toTimestamp(new Date(signature.timestamp * 1000), -signature.timezoneOffset || 0);
}

/**
 * Resolves commits from a local git checkout.
 */
export class RepositoryCommitResolver implements CommitResolver {
  private constructor(
    private readonly dir: string,
    private readonly logger: Logger
  ) {}

  /**
   * Open the repository containing `repoPath` (the path itself or any parent).
   * Throws RepositoryNotFoundError when no repository is found.
   */
  static async open(repoPath: string, logger: Logger): Promise<RepositoryCommitResolver> {
    let dir: string;
    try {
      dir = await git.findRoot({ fs, filepath: path.resolve(repoPath) });
    } catch (err) {
      throw new RepositoryNotFoundError(repoPath, { cause: err });
    }

    return new RepositoryCommitResolver(dir, logger);
  }

  async lookup(sha: string): Promise<Commit> {
    this.logger.log(`Looking up info for commit \`${sha}\` in git repository`);

    let result: git.ReadCommitResult;
    try {
      result = await git.readCommit({ fs, dir: this.dir, oid: sha });
    } catch (err) {
      await this.logHead();
      throw new CommitNotFoundError(sha, err);
    }
    this.logger.log('Found commit info');

    const { author, committer, message, tree } = result.commit;
    return {
      sha: result.oid,
      treeSHA: tree,
      authorName: author.name,
      authorEmail: author.email,
      authoredAt: signatureTimestamp(author),
      committerName: committer.name,
      committerEmail: committer.email,
      committedAt: signatureTimestamp(committer),
      message,
    };
  }

  source(): CommitSource {
    return 'Repository';
  }

  /** Log where HEAD points, to help diagnose a failed lookup */
  private async logHead(): Promise<void> {
    try {
      const oid = await git.resolveRef({ fs, dir: this.dir, ref: 'HEAD' });
      const branch = await git.currentBranch({ fs, dir: this.dir, fullname: true });
      this.logger.log(`Repository's HEAD reference is ${typeof branch === 'string' ? branch : 'HEAD'} ${oid}`);
    } catch (err) {
      this.logger.log(`Unable to read repository's HEAD reference: ${describeError(err)}`);
    }
  }
}

/**
 * Produces commits from fixed values, for builds without a usable checkout.
 * Every lookup yields the template with the requested SHA filled in.
 */
export class StaticCommitResolver implements CommitResolver {
  private readonly template: Partial<Commit>;

  constructor(template: Partial<Commit> = {}) {
    this.template = template;
  }

  async lookup(sha: string): Promise<Commit> {
    return {
      treeSHA: this.template.treeSHA ?? '',
      authorName: this.template.authorName ?? '',
      authorEmail: this.template.authorEmail ?? '',
      authoredAt: this.template.authoredAt,
      committerName: this.template.committerName ?? '',
      committerEmail: this.template.committerEmail ?? '',
      committedAt: this.template.committedAt,
      message: this.template.message ?? '',
      sha,
    };
  }

  source(): CommitSource {
    return 'Static';
  }
}
