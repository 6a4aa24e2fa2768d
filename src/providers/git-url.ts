import { MalformedURLError } from '../errors';

const GITHUB_URL = /github\.com[:/](.*)/;

/**
 * Extract "owner/repo" from a GitHub remote URL.
 *
 * Handles both https://github.com/owner/repo.git and
 * git@github.com:owner/repo.git.
 */
export function nameWithOwnerFromGitURL(url: string): string {
  const match = GITHUB_URL.exec(url);
  if (!match) {
    throw new MalformedURLError(url);
  }

  return match[1].replace(/\.git$/, '');
}

/**
 * Parse a pull request number exposed as a string. Providers use values like
 * "false" when the build isn't for a pull request, so anything that isn't a
 * plain unsigned integer yields undefined rather than an error.
 */
export function parsePullRequestNumber(raw: string): number | undefined {
  if (!/^\d+$/.test(raw)) return undefined;

  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : undefined;
}
