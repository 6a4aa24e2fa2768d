// ============================================================================
// Environment
// ============================================================================

/**
 * Read-only view of the process environment. Keys are exact variable names
 * (e.g. `GITHUB_SHA`, `CIRCLE_BRANCH`); unset variables read as `undefined`.
 */
export type Env = Readonly<Record<string, string | undefined>>;

/** Current-time source, injected so tests can pin the clock */
export type Clock = () => Date;

/** A scalar parsed from an environment variable */
export type FieldValue = string | number | boolean;

// ============================================================================
// Commits
// ============================================================================

/**
 * A point in time together with the UTC offset it was recorded in.
 * Git stores commit times with the author's offset; we keep it rather than
 * normalizing to UTC.
 */
export interface Timestamp {
  instant: Date;
  offsetMinutes: number;  // e.g. -300 for UTC-05:00
}

export interface Commit {
  sha: string;
  treeSHA: string;
  authorName: string;
  authorEmail: string;
  authoredAt?: Timestamp;
  committerName: string;
  committerEmail: string;
  committedAt?: Timestamp;
  message: string;
}

/** Where commit details came from: a local checkout, or values supplied on the command line */
export type CommitSource = 'Repository' | 'Static';

// ============================================================================
// Reporter identity
// ============================================================================

export interface Version {
  number: string;          // e.g. "v1.2.3"
  commit: string;          // commit the reporter itself was built from
  os: string;              // process.platform
  runtimeVersion: string;  // process.version
}
