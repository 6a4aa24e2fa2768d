import { derived, str, uint } from '../metadata/env-schema';
import { nameWithOwnerFromGitURL, parsePullRequestNumber } from './git-url';
import type { ProviderDefinition, ProviderDerivation } from './types';

export const buildkite: ProviderDefinition = {
  name: 'buildkite',
  commitVariable: 'BUILDKITE_COMMIT',
  detect: (env) => env.BUILDKITE === 'true',
  fields: [
    str('BUILDKITE_BRANCH'),
    str('BUILDKITE_BUILD_ID', ':buildkite_build_id'),
    uint('BUILDKITE_BUILD_NUMBER', ':buildkite_build_number'),
    str('BUILDKITE_BUILD_URL'),
    str('BUILDKITE_COMMIT'),
    str('BUILDKITE_JOB_ID', ':buildkite_job_id'),
    str('BUILDKITE_LABEL', ':buildkite_label'),
    str('BUILDKITE_ORGANIZATION_SLUG', ':buildkite_organization_slug'),
    str('BUILDKITE_PIPELINE_ID', ':buildkite_pipeline_id'),
    str('BUILDKITE_PIPELINE_SLUG', ':buildkite_pipeline_slug'),
    str('BUILDKITE_PROJECT_SLUG', ':buildkite_project_slug'),
    str('BUILDKITE_PULL_REQUEST'),
    str('BUILDKITE_PULL_REQUEST_BASE_BRANCH', ':buildkite_pull_request_base_branch', { omitEmpty: true }),
    derived(':buildkite_pull_request_number', 'uint', { omitEmpty: true }),
    str('BUILDKITE_PULL_REQUEST_REPO', ':buildkite_pull_request_repo', { omitEmpty: true }),
    str('BUILDKITE_REBUILT_FROM_BUILD_ID', ':buildkite_rebuilt_from_build_id', { omitEmpty: true }),
    uint('BUILDKITE_REBUILT_FROM_BUILD_NUMBER', ':buildkite_rebuilt_from_build_number', { omitEmpty: true }),
    str('BUILDKITE_REPO'),
    uint('BUILDKITE_RETRY_COUNT', ':buildkite_retry_count'),
    str('BUILDKITE_TAG', ':buildkite_tag', { omitEmpty: true }),
  ],
  derive(vars): ProviderDerivation {
    // "false" when the build isn't for a pull request
    const pullRequestNumber = parsePullRequestNumber(vars.string('BUILDKITE_PULL_REQUEST'));

    return {
      branch: vars.string('BUILDKITE_BRANCH'),
      buildURL: vars.string('BUILDKITE_BUILD_URL'),
      repoNameWithOwner: nameWithOwnerFromGitURL(vars.string('BUILDKITE_REPO')),
      derivedFields:
        pullRequestNumber === undefined ? {} : { ':buildkite_pull_request_number': pullRequestNumber },
    };
  },
};
