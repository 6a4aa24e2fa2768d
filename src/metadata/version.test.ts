import { describe, it, expect } from 'vitest';
import { formatVersion, getVersion } from './version';

describe('getVersion', () => {
  it('reads the version number from package.json', () => {
    expect(getVersion({}).number).toBe('v0.1.0');
  });

  it('describes the running platform', () => {
    const version = getVersion({});
    expect(version.os).toBe(process.platform);
    expect(version.runtimeVersion).toBe(process.version);
  });

  it('takes the build commit from the environment', () => {
    expect(getVersion({ TEST_REPORTER_COMMIT: 'abc1234' }).commit).toBe('abc1234');
    expect(getVersion({}).commit).toBe('unknown');
  });
});

describe('formatVersion', () => {
  it('formats the --version line', () => {
    expect(formatVersion({ number: 'v1.2.3', commit: 'abc1234', os: 'linux', runtimeVersion: 'v20.11.0' })).toBe(
      'test-reporter v1.2.3 (linux abc1234 v20.11.0)'
    );
  });
});
