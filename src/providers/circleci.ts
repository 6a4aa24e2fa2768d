import { str, uint } from '../metadata/env-schema';
import type { ProviderDefinition } from './types';

export const circleci: ProviderDefinition = {
  name: 'circleci',
  commitVariable: 'CIRCLE_SHA1',
  detect: (env) => env.CIRCLECI === 'true',
  fields: [
    str('CIRCLE_BRANCH'),
    uint('CIRCLE_BUILD_NUM', ':circle_build_num'),
    str('CIRCLE_BUILD_URL'),
    str('CIRCLE_JOB', ':circle_job'),
    str('CIRCLE_PROJECT_REPONAME'),
    str('CIRCLE_PROJECT_USERNAME'),
    // Only set for pull requests from forks
    uint('CIRCLE_PR_NUMBER', ':circle_pr_number', { omitEmpty: true }),
    str('CIRCLE_PR_REPONAME', ':circle_pr_reponame', { omitEmpty: true }),
    str('CIRCLE_PULL_REQUEST', ':circle_pull_request', { omitEmpty: true }),
    str('CIRCLE_PR_USERNAME', ':circle_pr_username', { omitEmpty: true }),
    str('CIRCLE_REPOSITORY_URL', ':circle_repository_url'),
    str('CIRCLE_SHA1'),
    str('CIRCLE_TAG', ':circle_tag', { omitEmpty: true }),
    str('CIRCLE_USERNAME', ':circle_username'),
    str('CIRCLE_WORKFLOW_ID', ':circle_workflow_id'),
  ],
  derive(vars) {
    return {
      branch: vars.string('CIRCLE_BRANCH'),
      buildURL: vars.string('CIRCLE_BUILD_URL'),
      repoNameWithOwner: `${vars.string('CIRCLE_PROJECT_USERNAME')}/${vars.string('CIRCLE_PROJECT_REPONAME')}`,
    };
  },
};
