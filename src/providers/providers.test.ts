import { describe, it, expect } from 'vitest';
import type { Env } from '../types';
import { EnvValidationError, MalformedURLError } from '../errors';
import { BufferedLogger } from '../utils/logger';
import { DETECTION_ORDER, detectProvider, initProvider, providerMetadataFromEnv } from './index';
import type { ProviderName } from './index';
import { awsCodeBuild } from './aws-codebuild';
import { azurePipelines } from './azure-pipelines';
import { buildkite } from './buildkite';
import { circleci } from './circleci';
import { custom } from './custom';
import { githubActions } from './github-actions';
import { jenkins } from './jenkins';
import { travisCI } from './travis-ci';

const SHA = '1f192ff735f887dd7a25229b2ece0422d17931f5';

function quietLogger(): BufferedLogger {
  return new BufferedLogger({ echo: false });
}

describe('detectProvider', () => {
  const cases: Array<[Env, ProviderName]> = [
    [{ BUILDKITE: 'true' }, 'buildkite'],
    [{ CIRCLECI: 'true' }, 'circleci'],
    [{ GITHUB_ACTIONS: 'true' }, 'github-actions'],
    [{ JENKINS_HOME: '/var/lib/jenkins' }, 'jenkins'],
    [{ SEMAPHORE: 'true' }, 'semaphore'],
    [{ TRAVIS: 'true' }, 'travis-ci'],
    [{ WEBAPPIO: 'true' }, 'webapp.io'],
    [{ CODEBUILD_BUILD_ID: 'some-project:1' }, 'aws-codebuild'],
    [{ BITBUCKET_BUILD_NUMBER: '42' }, 'bitbucket.org'],
    [{ BUILD_BUILDID: '42' }, 'azure-pipelines'],
    [{}, 'custom'],
  ];

  it.each(cases)('detects %j as %s', (env, name) => {
    expect(detectProvider(env).name).toBe(name);
  });

  it('takes the first match in detection order', () => {
    expect(detectProvider({ BUILDKITE: 'true', CIRCLECI: 'true' }).name).toBe('buildkite');
    expect(detectProvider({ JENKINS_HOME: '/var/lib/jenkins', GITHUB_ACTIONS: 'true' }).name).toBe('github-actions');
  });

  it('requires flag variables to be exactly "true"', () => {
    expect(detectProvider({ CIRCLECI: '1' }).name).toBe('custom');
    expect(detectProvider({ TRAVIS: 'TRUE' }).name).toBe('custom');
  });

  it('ignores empty presence variables', () => {
    expect(detectProvider({ JENKINS_HOME: '' }).name).toBe('custom');
  });

  it('lists every provider except the fallback', () => {
    expect(DETECTION_ORDER.map((p) => p.name)).not.toContain('custom');
    expect(DETECTION_ORDER).toHaveLength(10);
  });
});

describe('providerMetadataFromEnv', () => {
  it('logs the detected provider and commit variable', () => {
    const logger = quietLogger();
    providerMetadataFromEnv({ CIRCLECI: 'true', CIRCLE_SHA1: SHA }, logger);

    expect(logger.text()).toBe(
      `Detected build environment: circleci\nUsing $CIRCLE_SHA1 environment variable as commit SHA: ${SHA}`
    );
  });

  it('fails with every missing custom variable', () => {
    expect(() => providerMetadataFromEnv({}, quietLogger())).toThrow(
      'env: environment variable "GIT_BRANCH" should not be empty; environment variable "GIT_COMMIT" should not be empty; environment variable "BUILD_URL" should not be empty; environment variable "ORGANIZATION_NAME" should not be empty; environment variable "REPOSITORY_NAME" should not be empty'
    );
  });
});

describe('buildkite', () => {
  const env = {
    BUILDKITE: 'true',
    BUILDKITE_COMMIT: SHA,
    BUILDKITE_REPO: 'git@github.com:some-owner/some-repo.git',
  };

  it('records the pull request number for pull request builds', () => {
    const metadata = initProvider(buildkite, { ...env, BUILDKITE_PULL_REQUEST: '123' }, quietLogger());
    expect(metadata.fields[':buildkite_pull_request_number']).toBe(123);
  });

  it('leaves the pull request number out otherwise', () => {
    const metadata = initProvider(buildkite, { ...env, BUILDKITE_PULL_REQUEST: 'false' }, quietLogger());
    expect(metadata.fields).not.toHaveProperty(':buildkite_pull_request_number');
  });

  it('rejects a non-GitHub repository URL', () => {
    expect(() =>
      initProvider(buildkite, { ...env, BUILDKITE_REPO: 'https://example.com/some-repo.git' }, quietLogger())
    ).toThrow(MalformedURLError);
  });

  it('rejects malformed counts', () => {
    expect(() => initProvider(buildkite, { ...env, BUILDKITE_RETRY_COUNT: 'two' }, quietLogger())).toThrow(
      EnvValidationError
    );
  });
});

describe('circleci', () => {
  it('builds the name with owner from the project variables', () => {
    const metadata = initProvider(
      circleci,
      { CIRCLE_PROJECT_USERNAME: 'some-owner', CIRCLE_PROJECT_REPONAME: 'some-repo', CIRCLE_PR_NUMBER: '9' },
      quietLogger()
    );

    expect(metadata.repoNameWithOwner).toBe('some-owner/some-repo');
    expect(metadata.fields[':circle_pr_number']).toBe(9);
  });
});

describe('github-actions', () => {
  const base = {
    GITHUB_REPOSITORY: 'some-owner/some-repo',
    GITHUB_RUN_ID: '8675309',
    GITHUB_RUN_ATTEMPT: '2',
    GITHUB_SHA: SHA,
  };

  it('takes the branch from the head ref for pull requests', () => {
    const metadata = initProvider(
      githubActions,
      { ...base, GITHUB_EVENT_NAME: 'pull_request', GITHUB_HEAD_REF: 'some-feature', GITHUB_REF: 'refs/pull/7/merge' },
      quietLogger()
    );
    expect(metadata.branch).toBe('some-feature');
  });

  it('strips the prefix from branch refs', () => {
    const metadata = initProvider(
      githubActions,
      { ...base, GITHUB_EVENT_NAME: 'push', GITHUB_REF: 'refs/heads/feature/nested' },
      quietLogger()
    );
    expect(metadata.branch).toBe('feature/nested');
  });

  it('reports no branch for tag pushes', () => {
    const metadata = initProvider(
      githubActions,
      { ...base, GITHUB_EVENT_NAME: 'push', GITHUB_REF: 'refs/tags/v1.0.0' },
      quietLogger()
    );
    expect(metadata.branch).toBe('');
  });

  it('reports no branch without a ref', () => {
    const metadata = initProvider(githubActions, { GITHUB_SHA: SHA }, quietLogger());
    expect(metadata.branch).toBe('');
  });

  it('reports no branch for pushes to non-branch refs', () => {
    const metadata = initProvider(
      githubActions,
      { ...base, GITHUB_EVENT_NAME: 'push', GITHUB_REF: 'refs/pull/7/merge' },
      quietLogger()
    );
    expect(metadata.branch).toBe('');
  });

  it('defaults the server URL', () => {
    const metadata = initProvider(githubActions, base, quietLogger());

    expect(metadata.buildURL).toBe('https://github.com/some-owner/some-repo/actions/runs/8675309/attempts/2');
    expect(metadata.fields[':github_repo_url']).toBe('https://github.com/some-owner/some-repo');
  });

  it('uses a GitHub Enterprise server URL when set', () => {
    const metadata = initProvider(
      githubActions,
      { ...base, GITHUB_SERVER_URL: 'https://github.example.com' },
      quietLogger()
    );
    expect(metadata.buildURL).toBe('https://github.example.com/some-owner/some-repo/actions/runs/8675309/attempts/2');
  });
});

describe('jenkins', () => {
  it('requires the build URL', () => {
    expect(() =>
      initProvider(jenkins, { GIT_URL: 'https://github.com/some-owner/some-repo.git' }, quietLogger())
    ).toThrow('env: environment variable "BUILD_URL" should not be empty');
  });
});

describe('travis-ci', () => {
  it('records pull request details for pull request builds', () => {
    const metadata = initProvider(
      travisCI,
      { TRAVIS_PULL_REQUEST: '55', TRAVIS_PULL_REQUEST_BRANCH: 'some-feature', TRAVIS_SUDO: 'false' },
      quietLogger()
    );

    expect(metadata.fields[':travis_pull_request_number']).toBe(55);
    expect(metadata.fields[':travis_pull_request_branch']).toBe('some-feature');
    expect(metadata.fields[':travis_sudo']).toBe(false);
  });
});

describe('aws-codebuild', () => {
  it('reads owner and repository from the public build URL', () => {
    const metadata = initProvider(
      awsCodeBuild,
      { CODEBUILD_PUBLIC_BUILD_URL: 'https://example.com/some-owner/some-repo.git/builds/1' },
      quietLogger()
    );
    expect(metadata.repoNameWithOwner).toBe('some-owner/some-repo');
  });

  it('leaves the name with owner empty when the URL is unusable', () => {
    const logger = quietLogger();
    const unparseable = initProvider(awsCodeBuild, { CODEBUILD_PUBLIC_BUILD_URL: 'not a url' }, logger);
    const short = initProvider(awsCodeBuild, { CODEBUILD_PUBLIC_BUILD_URL: 'https://example.com/only-one' }, logger);

    expect(unparseable.repoNameWithOwner).toBe('');
    expect(short.repoNameWithOwner).toBe('');
    expect(logger.text()).toContain(
      'Unable to determine repository from build URL "https://example.com/only-one": path has too few segments'
    );
  });
});

describe('azure-pipelines', () => {
  it('uses repository names that already include the owner', () => {
    const metadata = initProvider(azurePipelines, { BUILD_REPOSITORY_NAME: 'some-owner/some-repo' }, quietLogger());
    expect(metadata.repoNameWithOwner).toBe('some-owner/some-repo');
  });

  it('qualifies bare repository names with the collection URI', () => {
    const metadata = initProvider(
      azurePipelines,
      { BUILD_REPOSITORY_NAME: 'some-repo', SYSTEM_TEAMFOUNDATIONCOLLECTIONURI: 'https://dev.azure.com/some-org' },
      quietLogger()
    );
    expect(metadata.repoNameWithOwner).toBe('https://dev.azure.com/some-org/some-repo');
  });
});

describe('custom', () => {
  it('combines organization and repository names', () => {
    const metadata = initProvider(
      custom,
      {
        GIT_BRANCH: 'main',
        GIT_COMMIT: SHA,
        BUILD_URL: 'https://ci.example.com/builds/1',
        ORGANIZATION_NAME: 'some-owner',
        REPOSITORY_NAME: 'some-repo',
      },
      quietLogger()
    );

    expect(metadata).toMatchObject({
      name: 'custom',
      branch: 'main',
      buildURL: 'https://ci.example.com/builds/1',
      commitSHA: SHA,
      repoNameWithOwner: 'some-owner/some-repo',
    });
  });
});
