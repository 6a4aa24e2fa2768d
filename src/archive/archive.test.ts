import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as tar from 'tar';
import { buildArchive, discoverCoverage, discoverTestResults } from './archive';

function writeFile(root: string, relative: string, content: string): string {
  const file = path.join(root, relative);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
  return file;
}

async function listArchive(file: string): Promise<string[]> {
  const names: string[] = [];
  await tar.list({ file, onReadEntry: (entry) => { names.push(entry.path); } });
  return names;
}

describe('archive', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'archive-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('discoverTestResults', () => {
    it('finds XML reports recursively, in any extension case', async () => {
      const results = path.join(tmpDir, 'results');
      writeFile(results, 'a.xml', '<testsuites/>');
      writeFile(results, 'nested/B.XML', '<testsuites/>');
      writeFile(results, 'notes.txt', 'not a report');

      expect(await discoverTestResults([results])).toEqual([
        { source: path.join(results, 'a.xml'), name: 'test_results/a.xml' },
        { source: path.join(results, 'nested/B.XML'), name: 'test_results/nested/B.XML' },
      ]);
    });

    it('separates several directories by index', async () => {
      const unit = path.join(tmpDir, 'unit');
      const e2e = path.join(tmpDir, 'e2e');
      writeFile(unit, 'report.xml', '<testsuites/>');
      writeFile(e2e, 'report.xml', '<testsuites/>');

      const names = (await discoverTestResults([unit, e2e])).map((entry) => entry.name);
      expect(names).toEqual(['test_results/0/report.xml', 'test_results/1/report.xml']);
    });

    it('returns nothing for a directory without reports', async () => {
      expect(await discoverTestResults([tmpDir])).toEqual([]);
    });
  });

  describe('discoverCoverage', () => {
    it('matches glob patterns relative to the working directory', async () => {
      writeFile(tmpDir, 'coverage/lcov.info', 'TN:');
      writeFile(tmpDir, 'reports/cobertura.xml', '<coverage/>');
      writeFile(tmpDir, 'reports/other.txt', '');

      const entries = await discoverCoverage(['coverage/*.info', 'reports/*.xml'], tmpDir);
      expect(entries.map((entry) => entry.name)).toEqual([
        'coverage/coverage/lcov.info',
        'coverage/reports/cobertura.xml',
      ]);
    });

    it('returns nothing without patterns', async () => {
      expect(await discoverCoverage([], tmpDir)).toEqual([]);
    });
  });

  describe('buildArchive', () => {
    it('packs metadata, log and files in path order', async () => {
      const report = writeFile(tmpDir, 'results/report.xml', '<testsuites tests="1"/>');
      const coverage = writeFile(tmpDir, 'lcov.info', 'TN:');

      const archivePath = await buildArchive({
        metadata: ':commit: abc123\n',
        log: 'line one\nline two',
        files: [
          { source: report, name: 'test_results/report.xml' },
          { source: coverage, name: 'coverage/lcov.info' },
        ],
      });

      expect(path.basename(archivePath)).toBe('buildpulse.tar.gz');
      expect(await listArchive(archivePath)).toEqual([
        'buildpulse.log',
        'buildpulse.yml',
        'coverage/lcov.info',
        'test_results/report.xml',
      ]);

      const outDir = path.join(tmpDir, 'extracted');
      fs.mkdirSync(outDir);
      await tar.extract({ file: archivePath, cwd: outDir });

      expect(fs.readFileSync(path.join(outDir, 'buildpulse.yml'), 'utf-8')).toBe(':commit: abc123\n');
      expect(fs.readFileSync(path.join(outDir, 'buildpulse.log'), 'utf-8')).toBe('line one\nline two');
      expect(fs.readFileSync(path.join(outDir, 'test_results/report.xml'), 'utf-8')).toBe('<testsuites tests="1"/>');

      fs.rmSync(path.dirname(archivePath), { recursive: true, force: true });
    });
  });
});
