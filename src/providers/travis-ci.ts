import { bool, derived, str, uint } from '../metadata/env-schema';
import { parsePullRequestNumber } from './git-url';
import type { ProviderDefinition, ProviderDerivation } from './types';

export const travisCI: ProviderDefinition = {
  name: 'travis-ci',
  commitVariable: 'TRAVIS_COMMIT',
  detect: (env) => env.TRAVIS === 'true',
  fields: [
    str('TRAVIS_BRANCH'),
    str('TRAVIS_BUILD_DIR', ':travis_build_dir'),
    uint('TRAVIS_BUILD_ID', ':travis_build_id'),
    uint('TRAVIS_BUILD_NUMBER', ':travis_build_number'),
    str('TRAVIS_BUILD_WEB_URL', ':travis_build_web_url'),
    str('TRAVIS_COMMIT'),
    str('TRAVIS_COMMIT_RANGE', ':travis_commit_range'),
    str('TRAVIS_CPU_ARCH', ':travis_cpu_arch'),
    str('TRAVIS_DIST', ':travis_dist'),
    str('TRAVIS_EVENT_TYPE', ':travis_event_type'),
    uint('TRAVIS_JOB_ID', ':travis_job_id'),
    str('TRAVIS_JOB_NAME', ':travis_job_name'),
    str('TRAVIS_JOB_NUMBER', ':travis_job_number'),
    str('TRAVIS_JOB_WEB_URL'),
    str('TRAVIS_OS_NAME', ':travis_os_name'),
    str('TRAVIS_PULL_REQUEST'),
    str('TRAVIS_PULL_REQUEST_BRANCH', ':travis_pull_request_branch', { omitEmpty: true }),
    derived(':travis_pull_request_number', 'uint', { omitEmpty: true }),
    str('TRAVIS_PULL_REQUEST_SHA', ':travis_pull_request_sha', { omitEmpty: true }),
    str('TRAVIS_PULL_REQUEST_SLUG', ':travis_pull_request_slug', { omitEmpty: true }),
    str('TRAVIS_REPO_SLUG'),
    bool('TRAVIS_SUDO', ':travis_sudo'),
    str('TRAVIS_TAG', ':travis_tag'),
    uint('TRAVIS_TEST_RESULT', ':travis_test_result'),
  ],
  derive(vars): ProviderDerivation {
    const pullRequestNumber = parsePullRequestNumber(vars.string('TRAVIS_PULL_REQUEST'));

    return {
      branch: vars.string('TRAVIS_BRANCH'),
      buildURL: vars.string('TRAVIS_JOB_WEB_URL'),
      repoNameWithOwner: vars.string('TRAVIS_REPO_SLUG'),
      derivedFields:
        pullRequestNumber === undefined ? {} : { ':travis_pull_request_number': pullRequestNumber },
    };
  },
};
