import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import fg from 'fast-glob';
import * as tar from 'tar';

export const METADATA_FILENAME = 'buildpulse.yml';
export const LOG_FILENAME = 'buildpulse.log';

/** A file to include in the archive, and where it goes inside it */
export interface ArchiveEntry {
  source: string;  // absolute path on disk
  name: string;    // path inside the archive, always with forward slashes
}

export interface ArchiveContents {
  metadata: string;  // serialized metadata document
  log: string;       // diagnostics for this run
  files: ArchiveEntry[];
}

function toArchivePath(relative: string): string {
  return relative.split(path.sep).join('/');
}

/**
 * Find JUnit XML reports (any `.xml` file, extension in any case) beneath each
 * results directory. With several directories, each directory's files are
 * placed under its index to keep their names apart.
 */
export async function discoverTestResults(dirs: string[]): Promise<ArchiveEntry[]> {
  const entries: ArchiveEntry[] = [];

  for (const [index, dir] of dirs.entries()) {
    const root = path.resolve(dir);
    const matches = await fg('**/*.xml', { cwd: root, caseSensitiveMatch: false, onlyFiles: true, dot: true });
    const prefix = dirs.length > 1 ? `test_results/${index}` : 'test_results';

    for (const match of matches.sort()) {
      entries.push({ source: path.join(root, match), name: `${prefix}/${match}` });
    }
  }

  return entries;
}

/**
 * Find coverage reports matching any of the glob patterns, relative to `cwd`.
 * Files outside `cwd` are archived under their base name.
 */
export async function discoverCoverage(patterns: string[], cwd: string = process.cwd()): Promise<ArchiveEntry[]> {
  if (patterns.length === 0) return [];

  const root = path.resolve(cwd);
  const matches = await fg(patterns, { cwd: root, onlyFiles: true, absolute: true, unique: true });

  return matches.sort().map((source) => {
    const relative = path.relative(root, source);
    const inside = relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
    return {
      source,
      name: `coverage/${inside ? toArchivePath(relative) : path.basename(source)}`,
    };
  });
}

/**
 * Write a gzipped tarball holding the metadata document, the log and every
 * discovered file, with entries in path order. Returns the archive's path;
 * the caller owns the temporary directory it sits in.
 */
export async function buildArchive(contents: ArchiveContents): Promise<string> {
  const staging = fs.mkdtempSync(path.join(os.tmpdir(), 'test-reporter-staging-'));

  try {
    fs.writeFileSync(path.join(staging, METADATA_FILENAME), contents.metadata);
    fs.writeFileSync(path.join(staging, LOG_FILENAME), contents.log);

    const names = new Set<string>([METADATA_FILENAME, LOG_FILENAME]);
    for (const file of contents.files) {
      const dest = path.join(staging, ...file.name.split('/'));
      fs.mkdirSync(path.dirname(dest), { recursive: true });
      fs.copyFileSync(file.source, dest);
      names.add(file.name);
    }

    const outDir = fs.mkdtempSync(path.join(os.tmpdir(), 'test-reporter-'));
    const archivePath = path.join(outDir, 'buildpulse.tar.gz');
    await tar.create({ gzip: true, file: archivePath, cwd: staging, portable: true }, [...names].sort());

    return archivePath;
  } finally {
    fs.rmSync(staging, { recursive: true, force: true });
  }
}
