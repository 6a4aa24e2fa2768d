import { str, uint } from '../metadata/env-schema';
import type { ProviderDefinition } from './types';

export const semaphore: ProviderDefinition = {
  name: 'semaphore',
  commitVariable: 'SEMAPHORE_GIT_SHA',
  detect: (env) => env.SEMAPHORE === 'true',
  fields: [
    str('SEMAPHORE_AGENT_MACHINE_ENVIRONMENT_TYPE', ':semaphore_agent_machine_environment_type'),
    str('SEMAPHORE_AGENT_MACHINE_OS_IMAGE', ':semaphore_agent_machine_os_image'),
    str('SEMAPHORE_AGENT_MACHINE_TYPE', ':semaphore_agent_machine_type'),
    str('SEMAPHORE_GIT_BRANCH'),
    str('SEMAPHORE_GIT_COMMIT_RANGE', ':semaphore_git_commit_range'),
    str('SEMAPHORE_GIT_DIR', ':semaphore_git_dir'),
    str('SEMAPHORE_GIT_REF', ':semaphore_git_ref'),
    str('SEMAPHORE_GIT_REF_TYPE', ':semaphore_git_ref_type'),
    str('SEMAPHORE_GIT_REPO_SLUG'),
    str('SEMAPHORE_GIT_SHA'),
    str('SEMAPHORE_GIT_URL', ':semaphore_git_url'),
    str('SEMAPHORE_JOB_ID', ':semaphore_job_id'),
    str('SEMAPHORE_JOB_NAME', ':semaphore_job_name'),
    str('SEMAPHORE_JOB_RESULT', ':semaphore_job_result'),
    str('SEMAPHORE_ORGANIZATION_URL', ':semaphore_organization_url'),
    str('SEMAPHORE_PROJECT_ID', ':semaphore_project_id'),
    str('SEMAPHORE_PROJECT_NAME', ':semaphore_project_name'),
    str('SEMAPHORE_WORKFLOW_ID', ':semaphore_workflow_id'),
    uint('SEMAPHORE_WORKFLOW_NUMBER', ':semaphore_workflow_number'),
  ],
  derive(vars) {
    return {
      branch: vars.string('SEMAPHORE_GIT_BRANCH'),
      buildURL: `${vars.string('SEMAPHORE_ORGANIZATION_URL')}/workflows/${vars.string('SEMAPHORE_WORKFLOW_ID')}`,
      repoNameWithOwner: vars.string('SEMAPHORE_GIT_REPO_SLUG'),
    };
  },
};
