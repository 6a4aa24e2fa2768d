import * as fs from 'fs';
import * as path from 'path';
import type { Env, Version } from '../types';

function readPackageVersion(): string {
  try {
    const pkgPath = path.resolve(__dirname, '../../package.json');
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return `v${pkg.version}`;
    }
  } catch {
    return 'unknown';
  }
  return 'unknown';
}

/**
 * Identify the running reporter. The commit is stamped into the environment
 * at release time as TEST_REPORTER_COMMIT.
 */
export function getVersion(env: Env = process.env): Version {
  return {
    number: readPackageVersion(),
    commit: env.TEST_REPORTER_COMMIT || 'unknown',
    os: process.platform,
    runtimeVersion: process.version,
  };
}

/** Text printed for --version */
export function formatVersion(version: Version): string {
  return `test-reporter ${version.number} (${version.os} ${version.commit} ${version.runtimeVersion})`;
}
