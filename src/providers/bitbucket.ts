import { str, uint } from '../metadata/env-schema';
import type { ProviderDefinition } from './types';

export const bitbucket: ProviderDefinition = {
  name: 'bitbucket.org',
  commitVariable: 'BITBUCKET_COMMIT',
  detect: (env) => !!env.BITBUCKET_BUILD_NUMBER,
  fields: [
    uint('BITBUCKET_BUILD_NUMBER', ':bitbucket_build_number'),
    str('BITBUCKET_CLONE_DIR', ':bitbucket_clone_dir', { omitEmpty: true }),
    str('BITBUCKET_COMMIT', ':bitbucket_commit'),
    str('BITBUCKET_WORKSPACE', ':bitbucket_workspace'),
    str('BITBUCKET_REPO_SLUG', ':bitbucket_repo_slug'),
    str('BITBUCKET_REPO_UUID', ':bitbucket_repo_uuid', { omitEmpty: true }),
    str('BITBUCKET_REPO_FULL_NAME', ':bitbucket_repo_full_name', { omitEmpty: true }),
    str('BITBUCKET_BRANCH', ':bitbucket_branch'),
    str('BITBUCKET_TAG', ':bitbucket_tag', { omitEmpty: true }),
    str('BITBUCKET_BOOKMARK', ':bitbucket_bookmark', { omitEmpty: true }),
    str('BITBUCKET_PARALLEL_STEP', ':bitbucket_parallel_step', { omitEmpty: true }),
    str('BITBUCKET_PARALLEL_STEP_COUNT', ':bitbucket_parallel_step_count', { omitEmpty: true }),
    str('BITBUCKET_PR_ID', ':bitbucket_pr_id', { omitEmpty: true }),
    str('BITBUCKET_PR_DESTINATION_BRANCH', ':bitbucket_pr_destination_branch', { omitEmpty: true }),
    str('BITBUCKET_GIT_HTTP_ORIGIN', ':bitbucket_git_http_origin'),
    str('BITBUCKET_GIT_SSH_ORIGIN', ':bitbucket_git_ssh_origin', { omitEmpty: true }),
    str('BITBUCKET_EXIT_CODE', ':bitbucket_exit_code', { omitEmpty: true }),
    str('BITBUCKET_STEP_UUID', ':bitbucket_step_uuid', { omitEmpty: true }),
    str('BITBUCKET_PIPELINE_UUID', ':bitbucket_pipeline_uuid', { omitEmpty: true }),
    str('BITBUCKET_DEPLOYMENT_ENVIRONMENT', ':bitbucket_deployment_environment', { omitEmpty: true }),
    str('BITBUCKET_DEPLOYMENT_ENVIRONMENT_UUID', ':bitbucket_deployment_environment_uuid', { omitEmpty: true }),
    str('BITBUCKET_PROJECT_KEY', ':bitbucket_project_key', { omitEmpty: true }),
    str('BITBUCKET_PROJECT_UUID', ':bitbucket_project_uuid', { omitEmpty: true }),
    str('BITBUCKET_STEP_TRIGGERER_UUID', ':bitbucket_step_triggerer_uuid', { omitEmpty: true }),
    str('BITBUCKET_STEP_OIDC_TOKEN', ':bitbucket_step_oidc_token', { omitEmpty: true }),
    str('BITBUCKET_SSH_KEY_FILE', ':bitbucket_ssh_key_file', { omitEmpty: true }),
  ],
  derive(vars) {
    return {
      branch: vars.string('BITBUCKET_BRANCH'),
      buildURL: `${vars.string('BITBUCKET_GIT_HTTP_ORIGIN')}/addon/pipelines/home#!/results/${vars.uint('BITBUCKET_BUILD_NUMBER')}`,
      repoNameWithOwner: `${vars.string('BITBUCKET_WORKSPACE')}/${vars.string('BITBUCKET_REPO_SLUG')}`,
    };
  },
};
